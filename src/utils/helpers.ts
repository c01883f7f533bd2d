import chalk from "chalk";
import type { CrawlerConfig } from "./config";
import { getAsciiArt } from "./ascii.js";
import { logger } from "./logger";

export function showHeader(version: string): void {
  logger.info(chalk.cyan(getAsciiArt("SBOM Harvester")));
  logger.info(
    chalk.cyan.bold(`CycloneDX SBOM harvester for Maven Central (Version ${version})\n`),
  );
}

export function showConfiguration(config: CrawlerConfig): void {
  logger.info(chalk.cyan("Configuration:"));
  logger.info(chalk.white(`  Output directory: ${config.outputDir}`));
  logger.info(chalk.white(`  Minimum components: ${config.minComponents}`));
  if (config.versionPolicy === "latestOnly") {
    logger.info(chalk.white(`  Versions: latest only`));
  } else {
    logger.info(chalk.white(`  Versions: every version with an SBOM`));
  }
  logger.info(chalk.white(`  Workers: ${config.concurrency}`));
  logger.info(chalk.white(`  Page size: ${config.pageSize} (max ${config.maxPages} pages)`));
  logger.info(chalk.white(`  Search API: ${config.searchUrl}`));
  logger.info(chalk.white(`  Repository: ${config.repositoryUrl}`));
  logger.info(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}`));
}
