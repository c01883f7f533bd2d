/**
 * Type definitions for the crawl pipeline
 * Producer-Consumer Pipeline Architecture
 */

import type { HttpFetcher } from "../http/fetcher.js";
import type { SbomRetriever } from "../sbom/retriever.js";
import type { SearchClient } from "../search/search-client.js";
import type { Artifact, Gav } from "../search/types.js";
import type { VersionPolicy, WorkerState } from "../types/enums.js";
import type { SearchError } from "../types/errors.js";
import type { Result } from "../types/result.js";

/**
 * Counters for the queue
 */
export interface QueueProgress {
  enqueued: number;
  dequeued: number;
  pending: number;
  closed: boolean;
}

/**
 * Running totals reported while the crawl is in progress
 */
export interface CrawlProgress {
  totalArtifacts: number;
  processedArtifacts: number;
  accepted: number;
  rejected: number;
  failed: number;
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  outputDir: string;
  minComponents?: number;
  workers?: number;
  versionPolicy?: VersionPolicy;
  pageSize?: number;
  maxPages?: number;
  retries?: number;
  retryDelayMs?: number;
  searchUrl?: string;
  repositoryUrl?: string;
  queueCapacity?: number;
  signal?: AbortSignal;
  onProgress?: (progress: CrawlProgress) => void;
}

/**
 * Collaborators the Coordinator builds by default; tests swap them out
 */
export interface CoordinatorDependencies {
  fetcher?: HttpFetcher;
  searchClient?: SearchClient;
  retriever?: SbomRetriever;
}

/**
 * Result from the Coordinator run
 */
export interface CoordinatorResult {
  totalArtifacts: number;
  totalVersions: number;
  acceptedSboms: number;
  rejectedSboms: number;
  failedSboms: number;
  failedArtifacts: number;
  duration: number;
  workersUsed: number;
}

/**
 * Turns one artifact into the GAVs worth downloading
 */
export type VersionExpander = (
  artifact: Artifact,
) => Promise<Result<Gav[], SearchError>>;

/**
 * Events a worker emits as it goes
 */
export type WorkerEvent =
  | { type: "state"; workerId: string; state: WorkerState }
  | { type: "artifact-done"; workerId: string; artifact: Artifact }
  | { type: "sbom-accepted"; workerId: string; gav: Gav }
  | { type: "sbom-rejected"; workerId: string; gav: Gav }
  | { type: "sbom-failed"; workerId: string; gav: Gav };

/**
 * Options for individual workers
 */
export interface WorkerOptions {
  expandVersions: VersionExpander;
  retriever: SbomRetriever;
  signal?: AbortSignal;
  onEvent?: (event: WorkerEvent) => void;
}

/**
 * Options for the WorkerPool
 */
export type WorkerPoolOptions = WorkerOptions;

/**
 * Result from a worker run
 */
export interface WorkerResult {
  workerId: string;
  artifactsProcessed: number;
  artifactsFailed: number;
  versionsDiscovered: number;
  sbomsAccepted: number;
  sbomsRejected: number;
  sbomsFailed: number;
}

/**
 * Result from the WorkerPool
 */
export interface WorkerPoolResult {
  totalWorkers: number;
  workers: WorkerResult[];
}
