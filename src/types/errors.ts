/**
 * Error variants carried through Result values.
 *
 * Transport failures come from the HTTP fetcher, decode failures from the
 * search client and the SBOM retriever, and I/O failures from writing output.
 */

export type FetchError =
  | { readonly type: "network-error"; readonly url: string; readonly message: string }
  | { readonly type: "invalid-status"; readonly url: string; readonly status: number }
  | { readonly type: "aborted"; readonly url: string };

export type SearchError =
  | FetchError
  | { readonly type: "invalid-json"; readonly url: string; readonly message: string };

export type RetrieveError =
  | FetchError
  | { readonly type: "invalid-sbom"; readonly url: string; readonly message: string }
  | { readonly type: "io-error"; readonly filePath: string; readonly message: string };

export type ConfigError =
  | { readonly type: "invalid-option"; readonly option: string; readonly message: string }
  | { readonly type: "missing-output-directory"; readonly path: string };

export type CrawlerError = SearchError | RetrieveError | ConfigError;

export function describeError(error: CrawlerError): string {
  switch (error.type) {
    case "network-error":
      return `request to ${error.url} failed: ${error.message}`;
    case "invalid-status":
      return `unexpected status code ${error.status} from ${error.url}`;
    case "aborted":
      return `request to ${error.url} was aborted`;
    case "invalid-json":
      return `malformed search response from ${error.url}: ${error.message}`;
    case "invalid-sbom":
      return `malformed SBOM at ${error.url}: ${error.message}`;
    case "io-error":
      return `cannot write ${error.filePath}: ${error.message}`;
    case "invalid-option":
      return `invalid value for --${error.option}: ${error.message}`;
    case "missing-output-directory":
      return `output directory does not exist: ${error.path}`;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
