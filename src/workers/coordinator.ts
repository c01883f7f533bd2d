import chalk from "chalk";
import { HttpFetcher } from "../http/fetcher.js";
import { SbomRetriever } from "../sbom/retriever.js";
import { SearchClient, hasSbomClassifier } from "../search/search-client.js";
import { formatArtifact, type Artifact } from "../search/types.js";
import { DEFAULT_CONCURRENCY } from "../types/constants.js";
import type { VersionPolicy } from "../types/enums.js";
import type { SearchError } from "../types/errors.js";
import { err, ok, type Result } from "../types/result.js";
import { logger } from "../utils/logger";
import { TaskQueue } from "./task-queue.js";
import { WorkerPool } from "./worker-pool.js";
import type {
  CoordinatorDependencies,
  CoordinatorOptions,
  CoordinatorResult,
  CrawlProgress,
  VersionExpander,
  WorkerEvent,
} from "./types.js";

/**
 * Coordinator (Producer)
 *
 * Runs one crawl:
 * 1. Starts the worker pool
 * 2. Collects every artifact from the search index
 * 3. Feeds the artifacts through the bounded queue, then closes it
 * 4. Waits for the workers to drain the queue
 * 5. Shows a summary
 *
 * A failed artifact search ends the run with an error result; the caller
 * decides how to exit. Everything after that point is per-item.
 */
export class Coordinator {
  private options: CoordinatorOptions;
  private versionPolicy: VersionPolicy;
  private workerCount: number;
  private searchClient: SearchClient;
  private retriever: SbomRetriever;
  private startTime: number;
  private progress: CrawlProgress;

  constructor(
    options: CoordinatorOptions,
    dependencies: CoordinatorDependencies = {},
  ) {
    this.options = options;
    this.versionPolicy = options.versionPolicy ?? "allQualifying";
    this.workerCount = options.workers ?? DEFAULT_CONCURRENCY;

    const fetcher =
      dependencies.fetcher ??
      new HttpFetcher({
        retries: options.retries,
        retryDelayMs: options.retryDelayMs,
        signal: options.signal,
      });
    this.searchClient =
      dependencies.searchClient ??
      new SearchClient(fetcher, {
        baseUrl: options.searchUrl,
        pageSize: options.pageSize,
        maxPages: options.maxPages,
      });
    this.retriever =
      dependencies.retriever ??
      new SbomRetriever(fetcher, {
        outputDir: options.outputDir,
        minComponents: options.minComponents,
        repositoryUrl: options.repositoryUrl,
      });

    this.startTime = Date.now();
    this.progress = {
      totalArtifacts: 0,
      processedArtifacts: 0,
      accepted: 0,
      rejected: 0,
      failed: 0,
    };
  }

  /**
   * Main run method
   */
  async run(): Promise<Result<CoordinatorResult, SearchError>> {
    this.startTime = Date.now();

    const queue = new TaskQueue<Artifact>(this.options.queueCapacity ?? 1);
    const workerPool = new WorkerPool(queue, this.workerCount, {
      expandVersions: this.createVersionExpander(),
      retriever: this.retriever,
      signal: this.options.signal,
      onEvent: (event) => this.handleWorkerEvent(event),
    });

    // Phase 1: Start workers; they block on the empty queue
    workerPool.start();

    // Phase 2: Collect artifacts
    logger.info(chalk.blue("Searching for artifacts with a CycloneDX SBOM..."));
    const artifacts = await this.searchClient.searchArtifacts();
    if (!artifacts.ok) {
      queue.close();
      await workerPool.waitForCompletion();
      return err(artifacts.error);
    }

    this.progress.totalArtifacts = artifacts.data.length;
    this.reportProgress();
    logger.info(chalk.green(`✓ Found ${artifacts.data.length} artifacts\n`));

    // Phase 3: Producer loop
    for (const artifact of artifacts.data) {
      if (this.options.signal?.aborted) {
        logger.warn(chalk.yellow("Crawl aborted, not queueing further artifacts"));
        break;
      }
      await queue.put(artifact);
    }

    // Phase 4: Signal completion and wait for workers
    queue.close();
    const poolResult = await workerPool.waitForCompletion();

    const totals = poolResult.workers.reduce(
      (acc, worker) => ({
        versions: acc.versions + worker.versionsDiscovered,
        accepted: acc.accepted + worker.sbomsAccepted,
        rejected: acc.rejected + worker.sbomsRejected,
        failed: acc.failed + worker.sbomsFailed,
        failedArtifacts: acc.failedArtifacts + worker.artifactsFailed,
      }),
      { versions: 0, accepted: 0, rejected: 0, failed: 0, failedArtifacts: 0 },
    );

    const result: CoordinatorResult = {
      totalArtifacts: artifacts.data.length,
      totalVersions: totals.versions,
      acceptedSboms: totals.accepted,
      rejectedSboms: totals.rejected,
      failedSboms: totals.failed,
      failedArtifacts: totals.failedArtifacts,
      duration: Date.now() - this.startTime,
      workersUsed: poolResult.totalWorkers,
    };

    // Phase 5: Show summary
    this.showSummary(result);

    return ok(result);
  }

  /**
   * Totals observed so far
   */
  getProgress(): CrawlProgress {
    return { ...this.progress };
  }

  /**
   * Version discovery for the configured policy
   */
  private createVersionExpander(): VersionExpander {
    if (this.versionPolicy === "latestOnly") {
      return async (artifact) => {
        const version = artifact.latestVersion;
        if (!version) {
          logger.warn(
            chalk.yellow(
              `Skipping ${formatArtifact(artifact)}: search record has no latest version`,
            ),
          );
          return ok([]);
        }
        if (!hasSbomClassifier(artifact.extensions)) {
          return ok([]);
        }
        return ok([
          {
            groupId: artifact.groupId,
            artifactId: artifact.artifactId,
            version,
          },
        ]);
      };
    }

    return (artifact) => this.searchClient.searchVersions(artifact);
  }

  private handleWorkerEvent(event: WorkerEvent): void {
    switch (event.type) {
      case "state":
        return;
      case "artifact-done":
        this.progress.processedArtifacts++;
        break;
      case "sbom-accepted":
        this.progress.accepted++;
        break;
      case "sbom-rejected":
        this.progress.rejected++;
        break;
      case "sbom-failed":
        this.progress.failed++;
        break;
    }
    this.reportProgress();
  }

  private reportProgress(): void {
    this.options.onProgress?.({ ...this.progress });
  }

  /**
   * Show final summary
   */
  private showSummary(result: CoordinatorResult): void {
    const row = (label: string, value: string | number): string =>
      `║   ${`${label}: ${value}`.padEnd(46)} ║`;

    logger.info(
      chalk.white("\n╔══════════════════════════════════════════════════╗"),
    );
    logger.info(
      chalk.white("║                     SUMMARY                      ║"),
    );
    logger.info(
      chalk.white("╠══════════════════════════════════════════════════╣"),
    );
    logger.info(chalk.white(row("Artifacts", result.totalArtifacts)));
    logger.info(chalk.white(row("Versions with SBOM", result.totalVersions)));
    logger.info(chalk.white(row("✓ Saved", result.acceptedSboms)));
    logger.info(chalk.white(row("- Discarded", result.rejectedSboms)));
    const failures = result.failedSboms + result.failedArtifacts;
    logger.info(
      failures > 0
        ? chalk.red(row("✗ Failed", failures))
        : chalk.white(row("✗ Failed", 0)),
    );
    logger.info(chalk.white(row("Workers Used", result.workersUsed)));
    logger.info(
      chalk.white(row("Duration", this.formatDuration(result.duration))),
    );
    logger.info(
      chalk.white("╚══════════════════════════════════════════════════╝"),
    );
    logger.info("");
  }

  /**
   * Format duration for display
   */
  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);
    const hours = Math.floor(minutes / 60);

    if (hours > 0) {
      return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
    } else if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    } else {
      return `${seconds}s`;
    }
  }
}
