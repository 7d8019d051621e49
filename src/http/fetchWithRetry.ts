import { CancelledError, PermanentHttpError, RateLimitedResponse, type FetchError } from "../core/errors";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import type { Logger } from "../observability";
import { retryDelay, type BackoffPolicy } from "./backoff";
import type { PageFetcher } from "./httpSession";
import type { RateLimiter } from "./rateLimiter";

export interface RetryPolicy extends BackoffPolicy {
  maxAttempts: number;
}

export interface FetchWithRetryOptions {
  session: PageFetcher;
  limiter: RateLimiter;
  policy: RetryPolicy;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

export type RetriedFetchOutcome =
  | { ok: true; body: string; attempts: number }
  | { ok: false; error: Exclude<FetchError, CancelledError>; attempts: number };

/**
 * Fetches a URL that is not one of the book's pages (page 1 read for the page count,
 * the book card) under the same limiter and retry policy the page
 * workers use. A permanent HTTP error or the last failed attempt comes back as
 * `ok: false`; cancellation rejects with CancelledError.
 */
export async function fetchWithRetry(url: string, options: FetchWithRetryOptions): Promise<RetriedFetchOutcome> {
  const { session, limiter, policy, logger, signal } = options;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    await limiter.acquire(signal);
    const outcome = await session.fetchPage(url, signal);
    if (outcome.ok) {
      return { ok: true, body: outcome.body, attempts: attempt };
    }

    const { error } = outcome;
    if (error instanceof CancelledError) {
      throw error;
    }
    if (error instanceof PermanentHttpError || attempt >= policy.maxAttempts) {
      return { ok: false, error, attempts: attempt };
    }

    const { delayMs, cooldownMs } = retryDelay(error, attempt, policy);
    if (cooldownMs > 0) {
      limiter.cooldown(cooldownMs);
    }
    logger.warn("fetch_retry", {
      url,
      attempt,
      delayMs,
      rateLimited: error instanceof RateLimitedResponse,
      error: error.message,
    });
    await sleep(delayMs, signal);
  }
}
