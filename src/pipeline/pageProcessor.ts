import type { ExtractorConfig } from "../config";
import { CancelledError, PermanentHttpError, RateLimitedResponse, type FetchError } from "../core/errors";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import { retryDelay, type PageFetcher, type RateLimiter } from "../http";
import type { Logger, MetricsRegistry } from "../observability";
import type { HtmlExtractor } from "../parse";
import { pageUrl, type Book, type ExtractedPage, type PageFailureKind } from "../types";
import { isTransportError, type ConnectivityMonitor } from "./connectivityMonitor";
import type { PageTask } from "./pageTask";

export type PageProcessResult =
  | { kind: "parsed"; page: ExtractedPage }
  | { kind: "failed"; failure: PageFailureKind; error: Error; transport: boolean }
  | { kind: "abandoned" };

export type RetrySettings = Pick<ExtractorConfig, "maxAttempts" | "baseBackoffMs" | "maxBackoffMs" | "rateLimitCooldownMs">;

export interface PageProcessorDeps {
  book: Book;
  session: PageFetcher;
  limiter: RateLimiter;
  extractor: HtmlExtractor;
  settings: RetrySettings;
  logger: Logger;
  metrics: MetricsRegistry;
  monitor?: ConnectivityMonitor;
  sleep?: SleepFn;
}

/**
 * Drives one PageTask from pending to parsed or failed. Retries are explicit
 * loop iterations over the task's own state, so the attempt count on the task
 * is always the number of requests made for the page.
 */
export class PageProcessor {
  private readonly deps: PageProcessorDeps;
  private readonly sleep: SleepFn;

  constructor(deps: PageProcessorDeps) {
    this.deps = deps;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async process(task: PageTask, signal: AbortSignal): Promise<PageProcessResult> {
    const { book, session, limiter, extractor, settings, logger, metrics, monitor } = this.deps;
    const url = pageUrl(book, task.pageNumber);

    while (true) {
      if (signal.aborted) {
        return { kind: "abandoned" };
      }

      try {
        await limiter.acquire(signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          return { kind: "abandoned" };
        }
        throw error;
      }

      task.startFetch();
      const stopFetchTimer = metrics.startTimer("page_fetch_ms");
      const outcome = await session.fetchPage(url, signal);
      const fetchMs = stopFetchTimer();

      if (outcome.ok) {
        metrics.incrementCounter("pages_fetched");
        monitor?.recordResponse();
        task.fetched();
        task.startParse();

        const stopParseTimer = metrics.startTimer("page_parse_ms");
        const parsed = extractor.extract(outcome.body, task.pageNumber);
        stopParseTimer();

        if (parsed.ok) {
          task.parsed();
          metrics.incrementCounter("pages_parsed");
          logger.debug("page_parsed", {
            bookId: book.id,
            pageNumber: task.pageNumber,
            attempt: task.attemptCount,
            durationMs: fetchMs,
          });
          return { kind: "parsed", page: parsed.page };
        }

        task.fail("parse_error", parsed.error);
        metrics.incrementCounter("pages_failed");
        logger.warn("page_parse_failed", { bookId: book.id, pageNumber: task.pageNumber, error: parsed.error.message });
        return { kind: "failed", failure: "parse_error", error: parsed.error, transport: false };
      }

      const error: FetchError = outcome.error;
      if (error instanceof CancelledError) {
        task.abandon();
        return { kind: "abandoned" };
      }

      if (error instanceof PermanentHttpError) {
        monitor?.recordResponse();
        task.fail("missing", error);
        metrics.incrementCounter("pages_failed");
        logger.warn("page_missing", { bookId: book.id, pageNumber: task.pageNumber, status: error.status, url });
        return { kind: "failed", failure: "missing", error, transport: false };
      }

      const transport = isTransportError(error);
      if (!transport) {
        monitor?.recordResponse();
      }
      if (error instanceof RateLimitedResponse) {
        metrics.incrementCounter("rate_limited");
      }

      if (task.attemptsRemaining === 0) {
        task.fail("exhausted", error);
        metrics.incrementCounter("pages_failed");
        logger.warn("page_fetch_exhausted", {
          bookId: book.id,
          pageNumber: task.pageNumber,
          attempt: task.attemptCount,
          error: error.message,
        });
        monitor?.recordExhausted(transport);
        return { kind: "failed", failure: "exhausted", error, transport };
      }

      const { delayMs, cooldownMs } = retryDelay(error, task.attemptCount, settings);
      if (cooldownMs > 0) {
        limiter.cooldown(cooldownMs);
      }
      task.retry(error);
      metrics.incrementCounter("fetch_retries");
      logger.warn("page_fetch_retry", {
        bookId: book.id,
        pageNumber: task.pageNumber,
        attempt: task.attemptCount,
        delayMs,
        error: error.message,
      });

      try {
        await this.sleep(delayMs, signal);
      } catch (sleepError) {
        if (sleepError instanceof CancelledError) {
          return { kind: "abandoned" };
        }
        throw sleepError;
      }
    }
  }
}
