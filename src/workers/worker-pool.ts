import chalk from "chalk";
import type { Artifact } from "../search/types.js";
import { MAX_CONCURRENCY } from "../types/constants.js";
import { logger } from "../utils/logger";
import type { TaskQueue } from "./task-queue.js";
import { runWorker } from "./worker.js";
import type {
  WorkerPoolOptions,
  WorkerPoolResult,
  WorkerResult,
} from "./types.js";

/**
 * Worker Pool Manager
 *
 * Runs a fixed number of workers against one shared queue and collects
 * their tallies once every worker has drained it.
 */
export class WorkerPool {
  private queue: TaskQueue<Artifact>;
  private workerCount: number;
  private options: WorkerPoolOptions;
  private running: Map<string, Promise<WorkerResult>>;

  constructor(
    queue: TaskQueue<Artifact>,
    workerCount: number,
    options: WorkerPoolOptions,
  ) {
    this.queue = queue;
    this.workerCount = Math.max(1, Math.min(MAX_CONCURRENCY, workerCount));
    this.options = options;
    this.running = new Map();
  }

  /**
   * Start all workers
   */
  start(): void {
    logger.debug(chalk.blue(`Starting ${this.workerCount} workers...`));

    for (let i = 0; i < this.workerCount; i++) {
      const workerId = `worker-${i + 1}`;
      this.running.set(workerId, runWorker(workerId, this.queue, this.options));
    }

    logger.debug(chalk.green(`✓ All ${this.workerCount} workers started`));
  }

  /**
   * Wait for all workers to complete
   */
  async waitForCompletion(): Promise<WorkerPoolResult> {
    logger.debug(chalk.blue("Waiting for workers to complete..."));

    const workers = await Promise.all(this.running.values());
    this.running.clear();

    const failed = workers.reduce(
      (sum, worker) => sum + worker.sbomsFailed + worker.artifactsFailed,
      0,
    );
    logger.debug(
      chalk.green(`✓ All workers completed (${failed} failures recorded)`),
    );

    return { totalWorkers: this.workerCount, workers };
  }
}
