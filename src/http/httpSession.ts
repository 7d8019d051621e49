import { fetch as undiciFetch, type Dispatcher } from "undici";
import {
  CancelledError,
  errorMessage,
  PermanentHttpError,
  RateLimitedResponse,
  TransientNetworkError,
  type FetchError,
} from "../core/errors";
import { createFetchDispatcher } from "../core/fetch";
import { parseRetryAfter } from "./backoff";

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponseLike>;

export type FetchOutcome = { ok: true; status: number; body: string } | { ok: false; error: FetchError };

export interface PageFetcher {
  fetchPage(url: string, signal?: AbortSignal): Promise<FetchOutcome>;
  close(): Promise<void>;
}

export interface HttpSessionOptions {
  userAgent: string;
  requestTimeoutMs: number;
  maxConnections: number;
  ignoreHttpsErrors: boolean;
  fetchFn?: FetchLike;
}

function classifyStatus(response: FetchResponseLike, url: string): FetchError {
  if (response.status === 429) {
    return new RateLimitedResponse(url, parseRetryAfter(response.headers.get("retry-after")));
  }
  if (response.status === 408 || response.status >= 500) {
    return new TransientNetworkError(`HTTP ${response.status} while fetching ${url}`, response.status);
  }
  return new PermanentHttpError(response.status, url);
}

/**
 * Pooled keep-alive client for page requests. Each call gets its own timeout;
 * the session never retries, it only classifies what happened.
 */
export class HttpSession implements PageFetcher {
  private readonly userAgent: string;
  private readonly requestTimeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpSessionOptions) {
    this.userAgent = options.userAgent;
    this.requestTimeoutMs = options.requestTimeoutMs;
    if (options.fetchFn) {
      this.fetchFn = options.fetchFn;
    } else {
      this.dispatcher = createFetchDispatcher({
        maxConnections: options.maxConnections,
        ignoreHttpsErrors: options.ignoreHttpsErrors,
      });
      this.fetchFn = (url, init) => undiciFetch(url, init);
    }
  }

  async fetchPage(url: string, signal?: AbortSignal): Promise<FetchOutcome> {
    if (signal?.aborted) {
      return { ok: false, error: new CancelledError() };
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
      const body = await response.text();

      if (response.ok) {
        return { ok: true, status: response.status, body };
      }
      return { ok: false, error: classifyStatus(response, url) };
    } catch (error) {
      if (timedOut) {
        return {
          ok: false,
          error: new TransientNetworkError(`timed out after ${this.requestTimeoutMs}ms fetching ${url}`, undefined, {
            cause: error,
          }),
        };
      }
      if (signal?.aborted) {
        return { ok: false, error: new CancelledError() };
      }
      return {
        ok: false,
        error: new TransientNetworkError(`request failed for ${url}: ${errorMessage(error)}`, undefined, { cause: error }),
      };
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  async close(): Promise<void> {
    await this.dispatcher?.close();
  }
}
