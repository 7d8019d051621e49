export type ExtractorErrorCode =
  | "transient_network"
  | "permanent_http"
  | "rate_limited"
  | "parse_error"
  | "persistence_error"
  | "worker_crash"
  | "connectivity_lost"
  | "cancelled"
  | "invalid_transition"
  | "invalid_config"
  | "book_resolution";

export abstract class ExtractorError extends Error {
  abstract readonly code: ExtractorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientNetworkError extends ExtractorError {
  readonly code = "transient_network";
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

export class PermanentHttpError extends ExtractorError {
  readonly code = "permanent_http";
  readonly status: number;

  constructor(status: number, url: string) {
    super(`HTTP ${status} while fetching ${url}`);
    this.status = status;
  }
}

export class RateLimitedResponse extends ExtractorError {
  readonly code = "rate_limited";
  readonly retryAfterMs?: number;

  constructor(url: string, retryAfterMs?: number) {
    super(`HTTP 429 while fetching ${url}`);
    this.retryAfterMs = retryAfterMs;
  }
}

export class ParseError extends ExtractorError {
  readonly code = "parse_error";
  readonly pageNumber: number;

  constructor(pageNumber: number, message: string, options?: { cause?: unknown }) {
    super(`page ${pageNumber}: ${message}`, options);
    this.pageNumber = pageNumber;
  }
}

export class PersistenceError extends ExtractorError {
  readonly code = "persistence_error";
  readonly pageNumbers: number[];

  constructor(message: string, pageNumbers: number[], options?: { cause?: unknown }) {
    super(message, options);
    this.pageNumbers = pageNumbers;
  }
}

export class WorkerCrashError extends ExtractorError {
  readonly code = "worker_crash";
  readonly shardId: number;
  readonly exitCode: number | null;

  constructor(shardId: number, exitCode: number | null) {
    super(`shard ${shardId} worker exited before finishing (code ${exitCode ?? "null"})`);
    this.shardId = shardId;
    this.exitCode = exitCode;
  }
}

export class ConnectivityLostError extends ExtractorError {
  readonly code = "connectivity_lost";

  constructor(consecutiveFailures: number) {
    super(`${consecutiveFailures} consecutive pages failed on network errors`);
  }
}

export class CancelledError extends ExtractorError {
  readonly code = "cancelled";

  constructor(message = "operation cancelled") {
    super(message);
  }
}

export class PageTaskStateError extends ExtractorError {
  readonly code = "invalid_transition";
}

export class ConfigError extends ExtractorError {
  readonly code = "invalid_config";
}

export class BookResolutionError extends ExtractorError {
  readonly code = "book_resolution";
}

export type FetchError = TransientNetworkError | PermanentHttpError | RateLimitedResponse | CancelledError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRunFatal(error: unknown): error is PersistenceError | ConnectivityLostError {
  return error instanceof PersistenceError || error instanceof ConnectivityLostError;
}
