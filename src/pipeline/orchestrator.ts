import os from "node:os";
import { createConfig, type ExtractorConfig } from "../config";
import { CancelledError, errorMessage, isRunFatal } from "../core/errors";
import type { SleepFn } from "../core/sleep";
import { collectBookMetadata, resolveBook } from "../crawl";
import { HttpSession, RateLimiter, type PageFetcher } from "../http";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { FallbackHtmlExtractor, type HtmlExtractor } from "../parse";
import { BatchPersister, ResumeManager } from "../persist";
import { createSink, type ExtractionEvent, type Sink } from "../sink";
import { createStore, type PageStore } from "../store";
import {
  createTierDriver,
  describeStrategy,
  ForkShardLauncher,
  selectStrategy,
  type RemotePageOutcome,
  type ShardLauncher,
  type TierContext,
} from "../tiers";
import { createExtractedPage, normalizeBookId, type Book, type ExtractionResult } from "../types";
import { ConnectivityMonitor } from "./connectivityMonitor";
import { PageProcessor } from "./pageProcessor";
import type { PageTask } from "./pageTask";
import { TaskBoard } from "./taskBoard";

export interface ExtractOptions {
  /** Skips page-count discovery. */
  totalPages?: number;
  /** Pages to attempt again even if they are at or below the checkpoint. */
  retryPages?: number[];
  signal?: AbortSignal;
  store?: PageStore;
  sink?: Sink;
  logger?: Logger;
  metrics?: MetricsRegistry;
  session?: PageFetcher;
  extractor?: HtmlExtractor;
  shardLauncher?: ShardLauncher;
  availableParallelism?: number;
  sleep?: SleepFn;
  now?: () => number;
}

/**
 * Extracts one book. Resolves with a summary in every case but two, including
 * cancellation (also during page-count discovery) and run-fatal errors; rejects
 * only when the configuration or the book itself cannot be resolved.
 */
export async function extract(
  bookId: string,
  config: Readonly<ExtractorConfig>,
  options: ExtractOptions = {},
): Promise<ExtractionResult> {
  const startedAt = Date.now();
  const settings = createConfig(config);
  const logger = (options.logger ?? new Logger({ component: "extractor", runId: createRunId() }, { level: settings.logLevel })).child(
    "extractor",
  );
  const metrics = options.metrics ?? new MetricsRegistry();

  const store = options.store ?? createStore(settings);
  const sink = options.sink ?? createSink(settings);
  const session =
    options.session ??
    new HttpSession({
      userAgent: settings.userAgent,
      requestTimeoutMs: settings.requestTimeoutMs,
      maxConnections: settings.maxConnections,
      ignoreHttpsErrors: settings.ignoreHttpsErrors,
    });

  const runController = new AbortController();
  const onExternalAbort = () => runController.abort();
  if (options.signal?.aborted) {
    runController.abort();
  } else {
    options.signal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  let fatal: Error | undefined;
  const abortRun = (error: unknown) => {
    if (!fatal) {
      fatal = error instanceof Error ? error : new Error(String(error));
      logger.error(isRunFatal(error) ? "run_fatal" : "run_unexpected_error", { error: errorMessage(error) });
    }
    runController.abort();
  };

  const publishing: Array<Promise<void>> = [];
  const publish = (event: ExtractionEvent) => {
    publishing.push(
      sink.publish([event]).catch((error: unknown) => {
        logger.warn("sink_publish_failed", { event: event.type, error: errorMessage(error) });
      }),
    );
  };

  try {
    const limiter = new RateLimiter({
      requestsPerSecond: settings.requestsPerSecond,
      burst: settings.rateLimitBurst,
      now: options.now,
      sleep: options.sleep,
    });
    const fetchOptions = {
      session,
      limiter,
      policy: settings,
      logger,
      signal: runController.signal,
      sleep: options.sleep,
    };

    let book: Book;
    try {
      book = await resolveBook({
        ...fetchOptions,
        bookId,
        sourceBaseUrl: settings.sourceBaseUrl,
        totalPages: options.totalPages,
      });
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        throw error;
      }
      const id = normalizeBookId(bookId);
      const result: ExtractionResult = {
        bookId: id,
        strategy: selectStrategy(0, settings, 1).kind,
        pagesTotal: 0,
        pagesSucceeded: 0,
        pagesFailed: 0,
        pagesIncomplete: 0,
        pagesSkipped: 0,
        failedPageNumbers: [],
        incompletePageNumbers: [],
        checkpoint: (await store.lastCheckpoint(id)) ?? 0,
        flushes: [],
        durationMs: Date.now() - startedAt,
        cancelled: true,
      };
      logger.info("extraction_cancelled_before_start", { bookId: id, checkpoint: result.checkpoint });
      publish({ type: "run_completed", bookId: id, runId: logger.runId, result, completedAt: new Date().toISOString() });
      await Promise.all(publishing);
      return result;
    }

    if (settings.collectBookMetadata && !runController.signal.aborted) {
      try {
        await store.saveBookMetadata(await collectBookMetadata({ ...fetchOptions, book }));
      } catch (error) {
        if (!(error instanceof CancelledError)) {
          logger.warn("book_metadata_failed", { bookId: book.id, error: errorMessage(error) });
        }
      }
    }

    const resume = new ResumeManager({ bookId: book.id, store, logger });
    await resume.load();
    const board = new TaskBoard(resume.planPages(book.totalPages, options.retryPages), settings.maxAttempts);
    const strategy = selectStrategy(
      book.totalPages,
      settings,
      options.availableParallelism ?? os.availableParallelism(),
    );

    const persister = new BatchPersister({
      bookId: book.id,
      store,
      resume,
      batchSize: settings.batchSize,
      maxAttempts: settings.persistMaxAttempts,
      retryDelayMs: settings.persistRetryDelayMs,
      logger,
      metrics,
      sleep: options.sleep,
    });
    persister.onCommitted((commit) => {
      board.markPersisted(commit.pageNumbers);
      publish({ type: "batch_committed", runId: logger.runId, ...commit });
    });

    const monitor = new ConnectivityMonitor(settings.maxConsecutiveNetworkFailures, abortRun);
    const processor = new PageProcessor({
      book,
      session,
      limiter,
      extractor:
        options.extractor ?? new FallbackHtmlExtractor({ useFastParser: settings.useFastParser, metrics, logger }),
      settings,
      logger,
      metrics,
      monitor,
      sleep: options.sleep,
    });

    const context: TierContext = {
      signal: runController.signal,
      logger,
      runPage: async (task) => {
        try {
          const result = await processor.process(task, runController.signal);
          if (result.kind === "parsed") {
            await persister.add(result.page);
          }
        } catch (error) {
          abortRun(error);
        }
      },
    };

    const onRemoteOutcome = async (task: PageTask, outcome: RemotePageOutcome): Promise<void> => {
      if (outcome.kind === "failed") {
        metrics.incrementCounter("pages_failed");
        if (outcome.failure === "exhausted") {
          monitor.recordExhausted(outcome.transport);
        } else {
          monitor.recordResponse();
        }
        logger.warn("page_failed_in_shard", { pageNumber: task.pageNumber, failure: outcome.failure, error: outcome.error });
        return;
      }

      metrics.incrementCounter("pages_parsed");
      monitor.recordResponse();
      try {
        const { page } = outcome;
        await persister.add(createExtractedPage(page.pageNumber, page.text, page.structuralMetadata));
      } catch (error) {
        abortRun(error);
      }
    };

    const driver = createTierDriver(strategy, () => ({
      launcher: options.shardLauncher ?? new ForkShardLauncher({ logger }),
      book,
      config: settings,
      runId: logger.runId,
      metrics,
      onRemoteOutcome,
    }));

    logger.info("extraction_start", {
      bookId: book.id,
      totalPages: book.totalPages,
      checkpoint: resume.current,
      planned: board.size,
      strategy: describeStrategy(strategy),
    });

    try {
      await driver.run(board.all(), context);
    } catch (error) {
      abortRun(error);
    }

    try {
      await persister.flush();
    } catch (error) {
      abortRun(error);
    }

    const tally = board.tally();
    const result: ExtractionResult = {
      bookId: book.id,
      strategy: strategy.kind,
      pagesTotal: book.totalPages,
      pagesSucceeded: tally.succeeded.length,
      pagesFailed: tally.failed.length,
      pagesIncomplete: tally.incomplete.length,
      pagesSkipped: book.totalPages - board.size,
      failedPageNumbers: tally.failed,
      incompletePageNumbers: tally.incomplete,
      checkpoint: resume.current,
      flushes: persister.flushSizes,
      durationMs: Date.now() - startedAt,
      cancelled: options.signal?.aborted ?? false,
      fatalError: fatal?.message,
    };

    publish({ type: "run_completed", bookId: book.id, runId: logger.runId, result, completedAt: new Date().toISOString() });
    await Promise.all(publishing);

    logger.info("extraction_complete", {
      bookId: book.id,
      succeeded: result.pagesSucceeded,
      failed: result.pagesFailed,
      incomplete: result.pagesIncomplete,
      skipped: result.pagesSkipped,
      checkpoint: result.checkpoint,
      cancelled: result.cancelled,
      durationMs: result.durationMs,
    });
    return result;
  } finally {
    options.signal?.removeEventListener("abort", onExternalAbort);
    if (!options.session) {
      await session.close();
    }
    if (!options.sink) {
      await sink.close();
    }
    if (!options.store) {
      await store.close();
    }
  }
}
