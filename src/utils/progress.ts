import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import type { CrawlProgress } from "../workers/types.js";

export const ARTIFACT_TASK = "Artifacts";
export const SBOM_TASK = "SBOMs";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Harvest Progress ",
    });
    mpb.addTask(ARTIFACT_TASK, {
      type: "percentage",
      barTransformFn: chalk.blue,
      nameTransformFn: chalk.blue.bold,
      message: "searching...",
    });
    mpb.addTask(SBOM_TASK, {
      type: "indefinite",
      barTransformFn: chalk.green,
      nameTransformFn: chalk.green.bold,
      message: "0 saved",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Reflect crawl totals in the bars
 */
export function updateCrawlProgress(progress: CrawlProgress): void {
  if (!mpb) return;

  if (progress.totalArtifacts > 0) {
    mpb.updateTask(ARTIFACT_TASK, {
      percentage: progress.processedArtifacts / progress.totalArtifacts,
      message: `${progress.processedArtifacts}/${progress.totalArtifacts} artifacts`,
    });
  }

  mpb.updateTask(SBOM_TASK, {
    message: `${progress.accepted} saved, ${progress.rejected} discarded, ${progress.failed} failed`,
  });
}

/**
 * Mark both bars as done
 */
export function finishProgressBars(progress: CrawlProgress): void {
  if (!mpb) return;
  mpb.done(ARTIFACT_TASK, {
    message: `${progress.processedArtifacts} artifacts ✓`,
    barTransformFn: chalk.blue,
  });
  mpb.done(SBOM_TASK, {
    message: `${progress.accepted} saved ✓`,
    barTransformFn: chalk.green,
  });
}
