import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_PAGES,
  DEFAULT_MIN_COMPONENTS,
  DEFAULT_PAGE_SIZE,
  DEFAULT_RETRIES,
  MAVEN_REPOSITORY_URL,
  MAVEN_SEARCH_URL,
  MAX_CONCURRENCY,
} from "../types/constants";
import type { VersionPolicy } from "../types/enums";
import type { ConfigError } from "../types/errors";
import { err, ok, type Result } from "../types/result";

/**
 * Options as commander hands them over: numbers still unparsed strings
 */
export type RawCliOptions = {
  minComponents?: string | number;
  output?: string;
  concurrency?: string | number;
  latestOnly?: boolean;
  pageSize?: string | number;
  maxPages?: string | number;
  retries?: string | number;
  searchUrl?: string;
  repositoryUrl?: string;
  verbose?: boolean;
  progress?: boolean;
};

export interface CrawlerConfig {
  outputDir: string;
  minComponents: number;
  concurrency: number;
  versionPolicy: VersionPolicy;
  pageSize: number;
  maxPages: number;
  retries: number;
  searchUrl: string;
  repositoryUrl: string;
  verbose: boolean;
  progress: boolean;
}

/**
 * Whole decimal number, or undefined for anything else ("", "12abc", "1.5").
 * Shared by flag validation and the interactive prompts.
 */
export function parseIntegerOption(value: string): number | undefined {
  return /^\s*-?\d+\s*$/.test(value) ? Number(value) : undefined;
}

const integerOption = (min: number, max?: number) => {
  const base = z.number({ invalid_type_error: "Expected an integer" }).int().min(min);
  return z.preprocess(
    (value) =>
      typeof value === "string" ? (parseIntegerOption(value) ?? value) : value,
    max === undefined ? base : base.max(max),
  );
};

const ConfigSchema = z.object({
  minComponents: integerOption(0).default(DEFAULT_MIN_COMPONENTS),
  output: z.string().min(1).default("."),
  concurrency: integerOption(1, MAX_CONCURRENCY).default(DEFAULT_CONCURRENCY),
  latestOnly: z.boolean().default(false),
  pageSize: integerOption(1).default(DEFAULT_PAGE_SIZE),
  maxPages: integerOption(1).default(DEFAULT_MAX_PAGES),
  retries: integerOption(1).default(DEFAULT_RETRIES),
  searchUrl: z.string().url(),
  repositoryUrl: z.string().url(),
  verbose: z.boolean().default(false),
  progress: z.boolean().default(true),
});

/**
 * Validate CLI options into a crawler configuration.
 *
 * Endpoint URLs fall back to SBOM_HARVESTER_SEARCH_URL and
 * SBOM_HARVESTER_REPOSITORY_URL, then to Maven Central.
 */
export function resolveConfig(
  raw: RawCliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Result<CrawlerConfig, ConfigError> {
  const parsed = ConfigSchema.safeParse({
    ...raw,
    searchUrl:
      raw.searchUrl ?? env.SBOM_HARVESTER_SEARCH_URL ?? MAVEN_SEARCH_URL,
    repositoryUrl:
      raw.repositoryUrl ??
      env.SBOM_HARVESTER_REPOSITORY_URL ??
      MAVEN_REPOSITORY_URL,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? String(issue.path[0] ?? "options") : "options";
    return err({
      type: "invalid-option",
      option: toOptionName(field),
      message: issue?.message ?? "invalid value",
    });
  }

  const options = parsed.data;
  const outputDir = path.resolve(options.output);
  if (!isDirectory(outputDir)) {
    return err({ type: "missing-output-directory", path: outputDir });
  }

  return ok({
    outputDir,
    minComponents: options.minComponents,
    concurrency: options.concurrency,
    versionPolicy: options.latestOnly ? "latestOnly" : "allQualifying",
    pageSize: options.pageSize,
    maxPages: options.maxPages,
    retries: options.retries,
    searchUrl: options.searchUrl,
    repositoryUrl: options.repositoryUrl,
    verbose: options.verbose,
    progress: options.progress,
  });
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

/** minComponents -> min-components */
export function toOptionName(field: string): string {
  return field.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}
