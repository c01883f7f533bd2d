#!/usr/bin/env tsx
/**
 * SBOM Harvester CLI
 *
 * Crawls the Maven Central search index for artifacts that publish a
 * CycloneDX SBOM, downloads the SBOM of each qualifying version and keeps
 * the ones that declare enough components.
 *
 * @module index
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { PromptType, type VersionPolicy } from "./src/types/enums";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_PAGES,
  DEFAULT_MIN_COMPONENTS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_RETRIES,
  MAX_CONCURRENCY,
} from "./src/types/constants";
import { describeError } from "./src/types/errors";
import { logger, setVerboseMode } from "./src/utils/logger";
import { prompt } from "./src/utils/prompt";
import {
  parseIntegerOption,
  resolveConfig,
  type RawCliOptions,
} from "./src/utils/config";
import {
  closeProgressBars,
  finishProgressBars,
  initProgressBars,
  updateCrawlProgress,
} from "./src/utils/progress.js";
import { showConfiguration, showHeader } from "./src/utils/helpers";
import { Coordinator } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

/** Application version from package.json */
const packageJsonPath = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  "package.json",
);
const VERSION = readVersion(packageJsonPath);

function readVersion(file: string): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  } catch (error) {
    logger.debug(`Could not read ${file}:`, error);
  }
  return "0.0.0";
}

/** Commander.js program instance */
const program = new Command();

// ============================================================================
// SECTION 3: INTERACTIVE MODE
// ============================================================================

/**
 * Prompts for the crawl settings, pre-filled from any flags given.
 */
async function runInteractiveMode(
  initialOptions: RawCliOptions,
): Promise<RawCliOptions> {
  logger.info(chalk.cyan("\nInteractive Mode\n"));
  logger.info(
    chalk.gray("Press Enter to accept default values shown in brackets.\n"),
  );

  const output = await prompt({
    type: PromptType.Input,
    message: "Output directory (must exist):",
    default: initialOptions.output ?? ".",
    validate: (value) => {
      if (!value || value.trim() === "") {
        return "Output directory is required";
      }
      return true;
    },
  });

  const minComponents = await prompt({
    type: PromptType.Input,
    message: "Minimum number of components:",
    default: String(initialOptions.minComponents ?? DEFAULT_MIN_COMPONENTS),
    validate: (value) => {
      const num = parseIntegerOption(value);
      if (num === undefined || num < 0) {
        return "Please enter a non-negative number";
      }
      return true;
    },
  });

  const versionPolicy = await prompt<VersionPolicy>({
    type: PromptType.Select,
    message: "Versions to harvest:",
    choices: [
      { name: "Every version with an SBOM", value: "allQualifying" },
      { name: "Latest version only", value: "latestOnly" },
    ],
    default: initialOptions.latestOnly ? "latestOnly" : "allQualifying",
  });

  const concurrency = await prompt({
    type: PromptType.Input,
    message: `Number of parallel workers (1-${MAX_CONCURRENCY}):`,
    default: String(initialOptions.concurrency ?? DEFAULT_CONCURRENCY),
    validate: (value) => {
      const num = parseIntegerOption(value);
      if (num === undefined || num < 1 || num > MAX_CONCURRENCY) {
        return `Please enter a number between 1 and ${MAX_CONCURRENCY}`;
      }
      return true;
    },
  });

  const verbose = await prompt({
    type: PromptType.Confirm,
    message: "Enable verbose output?",
    default: initialOptions.verbose ?? false,
  });

  return {
    ...initialOptions,
    output,
    minComponents,
    concurrency,
    latestOnly: versionPolicy === "latestOnly",
    verbose,
  };
}

// ============================================================================
// SECTION 4: MAIN APPLICATION
// ============================================================================

/**
 * Main application entry point.
 * Handles CLI setup, signal handling and the crawl itself.
 */
async function main(): Promise<number> {
  // -------------------------------------------------------------------------
  // CLI Setup
  // -------------------------------------------------------------------------
  program
    .name("sbom-harvester")
    .description(
      "Download CycloneDX SBOMs published to Maven Central, keeping those with enough components",
    )
    .version(VERSION)
    .option(
      "--min-components <number>",
      "Minimum number of components in an SBOM",
      String(DEFAULT_MIN_COMPONENTS),
    )
    .option("-o, --output <path>", "Output directory (must exist)", ".")
    .option(
      "-c, --concurrency <number>",
      "How many artifacts to process concurrently",
      String(DEFAULT_CONCURRENCY),
    )
    .option(
      "--latest-only",
      "Only fetch the latest version of each artifact (skips the version search)",
      false,
    )
    .option(
      "--page-size <number>",
      "Search results per page",
      String(DEFAULT_PAGE_SIZE),
    )
    .option(
      "--max-pages <number>",
      "Upper bound on search pages per query",
      String(DEFAULT_MAX_PAGES),
    )
    .option(
      "--retries <number>",
      "Attempts per request for transient failures",
      String(DEFAULT_RETRIES),
    )
    .option("--search-url <url>", "Search API endpoint")
    .option("--repository-url <url>", "Artifact repository base URL")
    .option("--no-progress", "Disable progress bars")
    .option("-v, --verbose", "Show verbose debug output", false)
    .option(
      "-i, --interactive",
      "Interactive mode: prompt for options (flags provided will be pre-filled)",
      false,
    )
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Defaults (every version, 10+ components, current directory): npm start
    - Interactive mode: npm start -- -i
    - Custom threshold and directory: npm start -- --min-components 50 -o ./sboms
    - Latest versions only, 10 workers: npm start -- --latest-only -c 10
    - Output files: {output}/{group}_{artifact}_{version}.cdx.json
      `,
    )
    .parse();

  const options = program.opts<RawCliOptions & { interactive: boolean }>();

  showHeader(VERSION);

  const rawOptions = options.interactive
    ? await runInteractiveMode(options)
    : options;

  // -------------------------------------------------------------------------
  // Validate Options
  // -------------------------------------------------------------------------
  const configResult = resolveConfig(rawOptions);
  if (!configResult.ok) {
    logger.error(chalk.red(`Error: ${describeError(configResult.error)}`));
    return 1;
  }
  const config = configResult.data;

  setVerboseMode(config.verbose);
  showConfiguration(config);

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  const controller = new AbortController();
  let interruptCode = 0;

  const interrupt = (code: number, label: string): void => {
    if (controller.signal.aborted) {
      closeProgressBars();
      logger.info(chalk.gray("Exiting..."));
      process.exit(code);
    }
    interruptCode = code;
    logger.info(chalk.yellow(`\n\n⚠ ${label}, finishing in-flight work`));
    logger.info(chalk.gray("Press Ctrl+C again to exit immediately"));
    controller.abort();
  };

  process.on("SIGINT", () => interrupt(130, "Interrupted by user (Ctrl+C)"));
  process.on("SIGTERM", () => interrupt(143, "Received SIGTERM"));

  // -------------------------------------------------------------------------
  // Run the Crawl
  // -------------------------------------------------------------------------
  logger.info(chalk.green("\nStarting harvest...\n"));

  if (config.progress) {
    initProgressBars();
  }

  const coordinator = new Coordinator({
    outputDir: config.outputDir,
    minComponents: config.minComponents,
    workers: config.concurrency,
    versionPolicy: config.versionPolicy,
    pageSize: config.pageSize,
    maxPages: config.maxPages,
    retries: config.retries,
    searchUrl: config.searchUrl,
    repositoryUrl: config.repositoryUrl,
    signal: controller.signal,
    onProgress: config.progress ? updateCrawlProgress : undefined,
  });

  const result = await coordinator.run();

  finishProgressBars(coordinator.getProgress());
  closeProgressBars();

  if (!result.ok) {
    logger.error(
      chalk.red(`Failed to collect artifacts: ${describeError(result.error)}`),
    );
    return interruptCode || 1;
  }

  if (interruptCode) {
    return interruptCode;
  }

  logger.info(chalk.green.bold("Harvest completed."));
  return 0;
}

// ============================================================================
// SECTION 5: ERROR HANDLING
// ============================================================================

process.on("unhandledRejection", (reason) => {
  closeProgressBars();
  logger.error(reason);
  process.exit(1);
});

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    closeProgressBars();
    logger.error(chalk.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  });
