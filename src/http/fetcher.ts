import axios, { type AxiosInstance } from "axios";
import chalk from "chalk";
import {
  DEFAULT_RETRIES,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
} from "../types/constants";
import { errorMessage, type FetchError } from "../types/errors";
import { err, ok, type Result } from "../types/result";
import { logger } from "../utils/logger";

export interface HttpFetcherOptions {
  /** Preconfigured axios instance; tests pass one with an in-process adapter */
  client?: AxiosInstance;
  /** Total attempts per request, including the first one */
  retries?: number;
  /** Backoff unit: attempt n waits n * retryDelayMs before the next try */
  retryDelayMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * HTTP Fetcher
 *
 * Issues GET requests and hands back the raw response body. Any status
 * outside 2xx is reported as an `invalid-status` error. Connection failures,
 * 429 and 5xx responses are retried with a linear backoff; everything else
 * is returned to the caller on the first attempt.
 */
export class HttpFetcher {
  private client: AxiosInstance;
  private retries: number;
  private retryDelayMs: number;
  private timeoutMs: number;
  private signal?: AbortSignal;

  constructor(options: HttpFetcherOptions = {}) {
    this.client = options.client ?? axios.create();
    this.retries = Math.max(1, options.retries ?? DEFAULT_RETRIES);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.signal = options.signal;
  }

  async get(url: string): Promise<Result<Buffer, FetchError>> {
    let lastError: FetchError = { type: "aborted", url };

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      const result = await this.attempt(url);
      if (result.ok || !isRetryable(result.error)) {
        return result;
      }

      lastError = result.error;
      if (attempt < this.retries) {
        logger.debug(
          chalk.yellow(
            `Attempt ${attempt}/${this.retries} failed for ${url}, retrying`,
          ),
        );
        await sleep(this.retryDelayMs * attempt, this.signal);
      }
    }

    return err(lastError);
  }

  private async attempt(url: string): Promise<Result<Buffer, FetchError>> {
    if (this.signal?.aborted) {
      return err({ type: "aborted", url });
    }

    try {
      const response = await this.client.get<unknown>(url, {
        responseType: "arraybuffer",
        timeout: this.timeoutMs,
        signal: this.signal,
        // Status is checked below so custom adapters get the same contract
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status > 299) {
        return err({ type: "invalid-status", url, status: response.status });
      }

      return ok(toBuffer(response.data));
    } catch (error) {
      if (axios.isCancel(error) || this.signal?.aborted) {
        return err({ type: "aborted", url });
      }
      return err({ type: "network-error", url, message: errorMessage(error) });
    }
  }
}

function isRetryable(error: FetchError): boolean {
  switch (error.type) {
    case "network-error":
      return true;
    case "invalid-status":
      return error.status === 429 || error.status >= 500;
    case "aborted":
      return false;
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (ArrayBuffer.isView(data)) {
    return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }
  if (typeof data === "string") {
    return Buffer.from(data, "utf8");
  }
  return Buffer.alloc(0);
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
