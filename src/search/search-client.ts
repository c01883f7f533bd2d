import chalk from "chalk";
import { z } from "zod";
import type { HttpFetcher } from "../http/fetcher";
import {
  ARTIFACT_SEARCH_TERM,
  CYCLONEDX_CLASSIFIER,
  DEFAULT_MAX_PAGES,
  DEFAULT_PAGE_SIZE,
  MAVEN_SEARCH_URL,
} from "../types/constants";
import { errorMessage, type SearchError } from "../types/errors";
import { err, ok, type Result } from "../types/result";
import { logger } from "../utils/logger";
import {
  ArtifactDocSchema,
  VersionDocSchema,
  SearchResponseSchema,
} from "./schemas";
import {
  formatArtifact,
  type Artifact,
  type Gav,
  type SearchQuery,
} from "./types";

export interface SearchClientOptions {
  baseUrl?: string;
  pageSize?: number;
  /** Upper bound on pages per collection, for servers that never return an empty page */
  maxPages?: number;
}

/**
 * Paginated Search Client
 *
 * Walks the search index with offset pagination: offsets 0, n, 2n, ... where
 * n is the number of records each page actually returned, stopping at the
 * first empty page. A failed page fails the whole collection; what to do
 * about it is up to the caller.
 */
export class SearchClient {
  private fetcher: HttpFetcher;
  private baseUrl: string;
  private pageSize: number;
  private maxPages: number;

  constructor(fetcher: HttpFetcher, options: SearchClientOptions = {}) {
    this.fetcher = fetcher;
    this.baseUrl = options.baseUrl ?? MAVEN_SEARCH_URL;
    this.pageSize = Math.max(1, options.pageSize ?? DEFAULT_PAGE_SIZE);
    this.maxPages = Math.max(1, options.maxPages ?? DEFAULT_MAX_PAGES);
  }

  buildSearchUrl(query: SearchQuery, rows: number, start: number): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set("q", query.q);
    if (query.core) {
      url.searchParams.set("core", query.core);
    }
    url.searchParams.set("rows", String(rows));
    url.searchParams.set("start", String(start));
    url.searchParams.set("wt", "json");
    return url.toString();
  }

  /**
   * Fetch and decode a single page of results.
   */
  async searchPage<T extends z.ZodTypeAny>(
    query: SearchQuery,
    docSchema: T,
    rows: number,
    start: number,
  ): Promise<Result<z.infer<T>[], SearchError>> {
    const url = this.buildSearchUrl(query, rows, start);
    const response = await this.fetcher.get(url);
    if (!response.ok) {
      return response;
    }

    let json: unknown;
    try {
      json = JSON.parse(response.data.toString("utf8"));
    } catch (error) {
      return err({ type: "invalid-json", url, message: errorMessage(error) });
    }

    const envelope = SearchResponseSchema.safeParse(json);
    if (!envelope.success) {
      return err({ type: "invalid-json", url, message: describeIssues(envelope.error) });
    }

    const docs = z.array(docSchema).safeParse(envelope.data.response.docs);
    if (!docs.success) {
      return err({ type: "invalid-json", url, message: describeIssues(docs.error) });
    }

    return ok(docs.data);
  }

  /**
   * Collect every record matching the query, page by page.
   */
  async collect<T extends z.ZodTypeAny>(
    query: SearchQuery,
    docSchema: T,
  ): Promise<Result<z.infer<T>[], SearchError>> {
    const records: z.infer<T>[] = [];
    let start = 0;

    for (let page = 0; page < this.maxPages; page++) {
      logger.debug(
        chalk.gray(
          `Fetching search results for "${query.q}": ${start} - ${start + this.pageSize}`,
        ),
      );

      const result = await this.searchPage(
        query,
        docSchema,
        this.pageSize,
        start,
      );
      if (!result.ok) {
        return result;
      }

      if (result.data.length === 0) {
        logger.debug(chalk.gray(`No more search results for "${query.q}"`));
        return ok(records);
      }

      records.push(...result.data);
      start += result.data.length;
    }

    logger.warn(
      chalk.yellow(
        `Stopped searching "${query.q}" after ${this.maxPages} pages (${records.length} records)`,
      ),
    );
    return ok(records);
  }

  /**
   * Every artifact whose latest version mentions a CycloneDX SBOM.
   */
  async searchArtifacts(): Promise<Result<Artifact[], SearchError>> {
    const result = await this.collect(
      { q: ARTIFACT_SEARCH_TERM },
      ArtifactDocSchema,
    );
    if (!result.ok) {
      return result;
    }

    return ok(
      result.data.map((doc) => ({
        groupId: doc.g,
        artifactId: doc.a,
        latestVersion: doc.latestVersion,
        extensions: doc.ec ?? [],
      })),
    );
  }

  /**
   * Every version of `artifact` that publishes a CycloneDX SBOM.
   */
  async searchVersions(
    artifact: Pick<Artifact, "groupId" | "artifactId">,
  ): Promise<Result<Gav[], SearchError>> {
    logger.debug(
      chalk.gray(`Searching versions of ${formatArtifact(artifact)} with SBOM`),
    );

    const result = await this.collect(
      {
        q: `g:${artifact.groupId} AND a:${artifact.artifactId}`,
        core: "gav",
      },
      VersionDocSchema,
    );
    if (!result.ok) {
      return result;
    }

    return ok(
      result.data
        .filter((doc) => hasSbomClassifier(doc.ec))
        .map((doc) => ({
          groupId: doc.g,
          artifactId: doc.a,
          version: doc.v,
        })),
    );
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function hasSbomClassifier(extensions: readonly string[] | undefined): boolean {
  return extensions?.includes(CYCLONEDX_CLASSIFIER) ?? false;
}
