import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import fs from "fs";
import os from "os";
import path from "path";
import type { VersionDoc } from "../../search/schemas";

export const SEARCH_URL = "https://search.test/solrsearch/select";
export const REPOSITORY_URL = "https://repo.test/maven2";

export type StubReply = { status: number; body: string | Buffer } | Error;

export type StubHandler = (url: URL) => StubReply;

/**
 * axios instance whose requests never leave the process
 */
export function createStubClient(handler: StubHandler): {
  client: AxiosInstance;
  requests: string[];
} {
  const requests: string[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const url = config.url ?? "";
    requests.push(url);
    const reply = handler(new URL(url));
    if (reply instanceof Error) {
      throw reply;
    }
    return {
      data: typeof reply.body === "string" ? Buffer.from(reply.body) : reply.body,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };
  return { client: axios.create({ adapter }), requests };
}

export interface FakeMavenData {
  /** Raw artifact records, served as given so malformed ones can be tested */
  artifacts?: unknown[];
  /** Version records keyed by "group:artifact" */
  versions?: Record<string, VersionDoc[]>;
  /** Replies keyed by repository path, e.g. "/maven2/com/example/lib/2.0.0/lib-2.0.0-cyclonedx.json" */
  files?: Record<string, StubReply>;
}

/**
 * Serves the search index and the repository from memory. Search pages are
 * sliced with the `rows` and `start` parameters like the real endpoint.
 */
export function fakeMavenHandler(data: FakeMavenData): StubHandler {
  return (url) => {
    if (url.origin === new URL(SEARCH_URL).origin) {
      const rows = Number(url.searchParams.get("rows"));
      const start = Number(url.searchParams.get("start"));
      const docs = searchDocs(data, url.searchParams);
      return json({
        response: {
          numFound: docs.length,
          start,
          docs: docs.slice(start, start + rows),
        },
      });
    }

    const file = data.files?.[url.pathname];
    return file ?? { status: 404, body: "Not Found" };
  };
}

function searchDocs(
  data: FakeMavenData,
  params: URLSearchParams,
): unknown[] {
  if (params.get("core") !== "gav") {
    return data.artifacts ?? [];
  }
  const match = /^g:(\S+) AND a:(\S+)$/.exec(params.get("q") ?? "");
  if (!match) {
    return [];
  }
  return data.versions?.[`${match[1]}:${match[2]}`] ?? [];
}

export function json(body: unknown, status = 200): StubReply {
  return { status, body: JSON.stringify(body) };
}

export function sbomWithComponents(count: number): string {
  return JSON.stringify({
    bomFormat: "CycloneDX",
    specVersion: "1.5",
    version: 1,
    components: Array.from({ length: count }, (_, i) => ({
      type: "library",
      name: `component-${i}`,
      version: "1.0.0",
    })),
  });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "sbom-harvester-"));
}
