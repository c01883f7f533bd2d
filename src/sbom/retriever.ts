import chalk from "chalk";
import fs from "fs";
import path from "path";
import { z } from "zod";
import type { HttpFetcher } from "../http/fetcher";
import { formatGav, type Gav } from "../search/types";
import { DEFAULT_MIN_COMPONENTS, MAVEN_REPOSITORY_URL } from "../types/constants";
import { errorMessage, type RetrieveError } from "../types/errors";
import { err, ok, type Result } from "../types/result";
import { logger } from "../utils/logger";

/**
 * Only the component list is interpreted; every other field passes through untouched.
 */
const SbomDocumentSchema = z
  .object({
    components: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export type SbomDocument = z.infer<typeof SbomDocumentSchema>;

export type RetrieveOutcome =
  | { status: "accepted"; gav: Gav; componentCount: number; filePath: string }
  | { status: "rejected"; gav: Gav; componentCount: number };

export interface SbomRetrieverOptions {
  outputDir: string;
  minComponents?: number;
  repositoryUrl?: string;
}

export function buildSbomUrl(repositoryUrl: string, gav: Gav): string {
  const base = repositoryUrl.replace(/\/+$/, "");
  const groupPath = gav.groupId.replaceAll(".", "/");
  return `${base}/${groupPath}/${gav.artifactId}/${gav.version}/${gav.artifactId}-${gav.version}-cyclonedx.json`;
}

export function buildOutputFileName(gav: Gav): string {
  return `${gav.groupId}_${gav.artifactId}_${gav.version}.cdx.json`;
}

export function countComponents(document: SbomDocument): number {
  return document.components?.length ?? 0;
}

/**
 * SBOM Retriever
 *
 * Downloads the CycloneDX document of one GAV, counts its components and,
 * when the count reaches the threshold, writes the downloaded bytes as-is
 * into the output directory.
 */
export class SbomRetriever {
  private fetcher: HttpFetcher;
  private outputDir: string;
  private minComponents: number;
  private repositoryUrl: string;

  constructor(fetcher: HttpFetcher, options: SbomRetrieverOptions) {
    this.fetcher = fetcher;
    this.outputDir = options.outputDir;
    this.minComponents = options.minComponents ?? DEFAULT_MIN_COMPONENTS;
    this.repositoryUrl = options.repositoryUrl ?? MAVEN_REPOSITORY_URL;
  }

  async retrieve(gav: Gav): Promise<Result<RetrieveOutcome, RetrieveError>> {
    const url = buildSbomUrl(this.repositoryUrl, gav);
    logger.debug(chalk.gray(`Downloading SBOM for ${formatGav(gav)}`));

    const response = await this.fetcher.get(url);
    if (!response.ok) {
      return response;
    }

    const decoded = decodeSbom(response.data, url);
    if (!decoded.ok) {
      return decoded;
    }

    const componentCount = countComponents(decoded.data);
    if (componentCount < this.minComponents) {
      logger.info(
        chalk.gray(
          `Discarding SBOM for ${formatGav(gav)}: too few components (${componentCount}/${this.minComponents})`,
        ),
      );
      return ok({ status: "rejected", gav, componentCount });
    }

    const filePath = path.join(this.outputDir, buildOutputFileName(gav));
    try {
      await fs.promises.writeFile(filePath, response.data);
    } catch (error) {
      return err({ type: "io-error", filePath, message: errorMessage(error) });
    }

    logger.info(
      chalk.green(
        `✓ Saved SBOM for ${formatGav(gav)} (${componentCount} components)`,
      ),
    );
    return ok({ status: "accepted", gav, componentCount, filePath });
  }
}

function decodeSbom(
  body: Buffer,
  url: string,
): Result<SbomDocument, RetrieveError> {
  let json: unknown;
  try {
    json = JSON.parse(body.toString("utf8"));
  } catch (error) {
    return err({ type: "invalid-sbom", url, message: errorMessage(error) });
  }

  const parsed = SbomDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return err({
      type: "invalid-sbom",
      url,
      message: parsed.error.issues.map((issue) => issue.message).join("; "),
    });
  }

  return ok(parsed.data);
}
