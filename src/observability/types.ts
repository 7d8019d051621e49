export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  bookId?: string;
  pageNumber?: number;
  url?: string;
  attempt?: number;
  shardId?: number;
  [key: string]: unknown;
}

export const COUNTER_NAMES = [
  "pages_fetched",
  "pages_parsed",
  "pages_failed",
  "pages_persisted",
  "fetch_retries",
  "rate_limited",
  "fallback_parses",
  "batches_committed",
  "batch_commit_failures",
  "shard_crashes",
] as const;

export const TIMER_NAMES = ["page_fetch_ms", "page_parse_ms", "batch_commit_ms"] as const;

export type MetricCounterName = (typeof COUNTER_NAMES)[number];
export type MetricTimerName = (typeof TIMER_NAMES)[number];
