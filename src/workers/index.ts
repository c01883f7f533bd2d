/**
 * Crawl Pipeline Module
 *
 * Producer-Consumer Pipeline for harvesting SBOMs.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator({
 *     outputDir: "./sboms",
 *     minComponents: 10,
 *     workers: 5,
 *     versionPolicy: "allQualifying",
 *   });
 *
 *   const result = await coordinator.run();
 */

// Main classes
export { Coordinator } from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { TaskQueue } from "./task-queue.js";

// Worker function
export { runWorker } from "./worker.js";

// Types
export type {
  QueueProgress,
  CrawlProgress,
  CoordinatorOptions,
  CoordinatorDependencies,
  CoordinatorResult,
  VersionExpander,
  WorkerEvent,
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerOptions,
  WorkerResult,
} from "./types.js";
