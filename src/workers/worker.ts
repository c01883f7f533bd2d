/**
 * Worker
 *
 * Drains artifacts from the shared queue. For each artifact it:
 * 1. Expands the artifact into the versions that publish an SBOM
 * 2. Downloads and filters each version's SBOM, one after another
 * 3. Goes back to the queue
 *
 * Exits once the queue is closed and empty. Failures stay local to the
 * artifact or version that caused them.
 */

import chalk from "chalk";
import { formatArtifact, formatGav } from "../search/types.js";
import type { WorkerState } from "../types/enums.js";
import { describeError } from "../types/errors.js";
import { createTaggedLogger } from "../utils/logger";
import type { TaskQueue } from "./task-queue.js";
import type { Artifact } from "../search/types.js";
import type { WorkerOptions, WorkerResult } from "./types.js";

async function runWorker(
  workerId: string,
  queue: TaskQueue<Artifact>,
  options: WorkerOptions,
): Promise<WorkerResult> {
  const log = createTaggedLogger(workerId);
  const { expandVersions, retriever, signal, onEvent } = options;

  const result: WorkerResult = {
    workerId,
    artifactsProcessed: 0,
    artifactsFailed: 0,
    versionsDiscovered: 0,
    sbomsAccepted: 0,
    sbomsRejected: 0,
    sbomsFailed: 0,
  };

  const setState = (state: WorkerState): void => {
    onEvent?.({ type: "state", workerId, state });
  };

  setState("idle");
  log.debug(chalk.gray("Started"));

  while (true) {
    setState("dequeuing");
    const artifact = await queue.take();
    if (!artifact) {
      break;
    }

    // Keep draining after an abort so the producer is never left blocked
    if (signal?.aborted) {
      setState("idle");
      continue;
    }

    result.artifactsProcessed++;

    setState("expanding-versions");
    const versions = await expandVersions(artifact);
    if (!versions.ok) {
      const message = describeError(versions.error);
      result.artifactsFailed++;
      log.error(
        chalk.red(
          `Failed to collect versions for ${formatArtifact(artifact)}: ${message}`,
        ),
      );
      onEvent?.({ type: "artifact-done", workerId, artifact });
      setState("idle");
      continue;
    }

    result.versionsDiscovered += versions.data.length;
    log.debug(
      chalk.gray(
        `${formatArtifact(artifact)}: ${versions.data.length} version(s) with SBOM`,
      ),
    );

    setState("downloading");
    for (const gav of versions.data) {
      if (signal?.aborted) {
        break;
      }

      const outcome = await retriever.retrieve(gav);
      if (!outcome.ok) {
        const message = describeError(outcome.error);
        result.sbomsFailed++;
        log.error(
          chalk.red(`Failed to download SBOM for ${formatGav(gav)}: ${message}`),
        );
        onEvent?.({ type: "sbom-failed", workerId, gav });
        continue;
      }

      if (outcome.data.status === "accepted") {
        result.sbomsAccepted++;
        onEvent?.({ type: "sbom-accepted", workerId, gav });
      } else {
        result.sbomsRejected++;
        onEvent?.({ type: "sbom-rejected", workerId, gav });
      }
    }

    onEvent?.({ type: "artifact-done", workerId, artifact });
    setState("idle");
  }

  setState("done");
  log.debug(
    chalk.gray(
      `Finished: ${result.sbomsAccepted} saved, ${result.sbomsRejected} discarded, ${result.sbomsFailed} failed`,
    ),
  );

  return result;
}

export { runWorker };
