import { RateLimitedResponse, type FetchError } from "../core/errors";

export interface BackoffPolicy {
  baseBackoffMs: number;
  maxBackoffMs: number;
  rateLimitCooldownMs: number;
}

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), maxMs);
}

/** Delay before the next attempt, plus the cooldown a 429 imposes on the whole process. */
export function retryDelay(error: FetchError, attempt: number, policy: BackoffPolicy): { delayMs: number; cooldownMs: number } {
  const delayMs = backoffDelay(attempt, policy.baseBackoffMs, policy.maxBackoffMs);
  if (!(error instanceof RateLimitedResponse)) {
    return { delayMs, cooldownMs: 0 };
  }

  const cooldownMs = Math.max(error.retryAfterMs ?? 0, policy.rateLimitCooldownMs);
  return { delayMs: delayMs + cooldownMs, cooldownMs };
}

/** `Retry-After` is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null | undefined, now = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }

  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}
