import { BookResolutionError } from "../core/errors";
import type { SleepFn } from "../core/sleep";
import { fetchWithRetry, type PageFetcher, type RateLimiter, type RetryPolicy } from "../http";
import type { Logger } from "../observability";
import { normalizeBookId, pageUrl, type Book } from "../types";
import { findLastPageNumber } from "./paginationParser";

export interface ResolveBookOptions {
  bookId: string;
  sourceBaseUrl: string;
  totalPages?: number;
  session: PageFetcher;
  limiter: RateLimiter;
  policy: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

/**
 * Builds the run's Book, reading the page count from the first page when the
 * caller does not supply it. Page 1 is fetched with the page retry policy; a
 * cancelled run rejects with CancelledError.
 */
export async function resolveBook(options: ResolveBookOptions): Promise<Book> {
  const id = normalizeBookId(options.bookId);
  const { sourceBaseUrl, logger } = options;

  if (options.totalPages !== undefined) {
    if (!Number.isInteger(options.totalPages) || options.totalPages < 1) {
      throw new BookResolutionError(`totalPages must be a positive integer (got ${options.totalPages})`);
    }
    return Object.freeze({ id, totalPages: options.totalPages, sourceBaseUrl });
  }

  const outcome = await fetchWithRetry(pageUrl({ id, sourceBaseUrl }, 1), options);
  if (!outcome.ok) {
    throw new BookResolutionError(
      `could not read the page count of book ${id} after ${outcome.attempts} attempt(s): ${outcome.error.message}`,
      { cause: outcome.error },
    );
  }

  const totalPages = findLastPageNumber(outcome.body, id) ?? 1;
  logger.info("book_resolved", { bookId: id, totalPages, attempts: outcome.attempts });
  return Object.freeze({ id, totalPages, sourceBaseUrl });
}
