import { errorMessage, PersistenceError } from "../core/errors";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import type { Logger, MetricsRegistry } from "../observability";
import type { PageStore } from "../store";
import type { ExtractedPage } from "../types";
import type { ResumeManager } from "./resumeManager";

export interface BatchCommit {
  bookId: string;
  pageNumbers: number[];
  checkpoint: number;
  committedAt: string;
}

export type BatchCommitListener = (commit: BatchCommit) => void;

export interface BatchPersisterOptions {
  bookId: string;
  store: PageStore;
  resume: ResumeManager;
  batchSize: number;
  maxAttempts: number;
  retryDelayMs: number;
  logger: Logger;
  metrics: MetricsRegistry;
  sleep?: SleepFn;
}

/**
 * Buffers parsed pages and commits them in page order, `batchSize` at a time.
 *
 * `add` and `flush` run one at a time in call order, so a caller that arrives
 * while a commit is in progress waits for it; that wait is the backpressure
 * the tiers rely on. After `maxAttempts` failed commits the persister is
 * failed for good and every later call rejects with the same PersistenceError.
 */
export class BatchPersister {
  private readonly options: BatchPersisterOptions;
  private readonly sleep: SleepFn;
  private readonly listeners: BatchCommitListener[] = [];
  private buffer: ExtractedPage[] = [];
  private chain: Promise<void> = Promise.resolve();
  private failure?: PersistenceError;
  private readonly sizes: number[] = [];

  constructor(options: BatchPersisterOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get flushSizes(): number[] {
    return [...this.sizes];
  }

  get bufferedPageNumbers(): number[] {
    return this.buffer.map((page) => page.pageNumber);
  }

  get failed(): PersistenceError | undefined {
    return this.failure;
  }

  onCommitted(listener: BatchCommitListener): void {
    this.listeners.push(listener);
  }

  add(page: ExtractedPage): Promise<void> {
    return this.enqueue(async () => {
      this.buffer.push(page);
      if (this.buffer.length >= this.options.batchSize) {
        await this.commitBuffer();
      }
    });
  }

  flush(): Promise<void> {
    return this.enqueue(async () => {
      if (this.buffer.length > 0) {
        await this.commitBuffer();
      }
    });
  }

  private enqueue(operation: () => Promise<void>): Promise<void> {
    const run = this.chain.then(() => {
      if (this.failure) {
        throw this.failure;
      }
      return operation();
    });
    // The caller observes the rejection through `run`; the chain only orders work.
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async commitBuffer(): Promise<void> {
    const { bookId, maxAttempts, retryDelayMs, logger, metrics } = this.options;
    const pages = [...this.buffer].sort((a, b) => a.pageNumber - b.pageNumber);
    const pageNumbers = pages.map((page) => page.pageNumber);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const stopTimer = metrics.startTimer("batch_commit_ms");
      const result = await this.writeBatch(pages);
      const durationMs = stopTimer();

      if (result.ok) {
        this.buffer = [];
        this.sizes.push(pages.length);
        metrics.incrementCounter("batches_committed");
        metrics.incrementCounter("pages_persisted", pages.length);
        logger.info("batch_committed", {
          bookId,
          size: pages.length,
          firstPage: pageNumbers[0],
          lastPage: pageNumbers[pageNumbers.length - 1],
          attempt,
          durationMs,
        });
        await this.advance(pageNumbers);
        return;
      }

      lastError = result.error;
      metrics.incrementCounter("batch_commit_failures");
      logger.warn("batch_commit_failed", { bookId, size: pages.length, attempt, error: errorMessage(result.error) });
      if (attempt < maxAttempts) {
        await this.sleep(retryDelayMs * attempt);
      }
    }

    this.failure = new PersistenceError(
      `batch of ${pages.length} pages for book ${bookId} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
      pageNumbers,
      { cause: lastError },
    );
    logger.error("batch_persist_fatal", { bookId, pageNumbers, error: this.failure.message });
    throw this.failure;
  }

  private async writeBatch(pages: ExtractedPage[]): Promise<{ ok: true } | { ok: false; error: unknown }> {
    const { bookId, store } = this.options;
    try {
      await store.beginBatch(bookId);
      for (const page of pages) {
        await store.append(page);
      }
      const result = await store.commit();
      return result.ok ? result : await this.discardBatch(result.error);
    } catch (error) {
      return this.discardBatch(error);
    }
  }

  /** Rolls the open batch back; a rollback that throws joins the commit failure rather than ending the retry loop. */
  private async discardBatch(error: unknown): Promise<{ ok: false; error: unknown }> {
    try {
      await this.options.store.rollback();
      return { ok: false, error };
    } catch (rollbackError) {
      return {
        ok: false,
        error: new Error(`${errorMessage(error)}; rollback failed: ${errorMessage(rollbackError)}`, { cause: error }),
      };
    }
  }

  private async advance(pageNumbers: number[]): Promise<void> {
    const { bookId, resume } = this.options;
    let checkpoint: number;
    try {
      checkpoint = await resume.recordPersisted(pageNumbers);
    } catch (error) {
      this.failure = new PersistenceError(`checkpoint write for book ${bookId} failed: ${errorMessage(error)}`, pageNumbers, {
        cause: error,
      });
      throw this.failure;
    }

    const commit: BatchCommit = { bookId, pageNumbers, checkpoint, committedAt: new Date().toISOString() };
    for (const listener of this.listeners) {
      listener(commit);
    }
  }
}
