import type { Logger } from "../observability";
import type { PageStore } from "../store";

export interface ResumeManagerOptions {
  bookId: string;
  store: PageStore;
  logger: Logger;
  now?: () => Date;
}

/**
 * Sole writer of a book's checkpoint: the highest page such that it and every
 * page before it have been committed. Out-of-order commits are remembered and
 * only counted once the gap below them closes.
 */
export class ResumeManager {
  private readonly bookId: string;
  private readonly store: PageStore;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly persisted = new Set<number>();
  private checkpoint = 0;
  private startedFrom = 0;

  constructor(options: ResumeManagerOptions) {
    this.bookId = options.bookId;
    this.store = options.store;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  get current(): number {
    return this.checkpoint;
  }

  get initial(): number {
    return this.startedFrom;
  }

  async load(): Promise<number> {
    const stored = await this.store.lastCheckpoint(this.bookId);
    this.checkpoint = Math.max(this.checkpoint, stored ?? 0);
    this.startedFrom = this.checkpoint;
    this.logger.info("checkpoint_loaded", { bookId: this.bookId, checkpoint: this.checkpoint });
    return this.checkpoint;
  }

  /** Pages after the checkpoint, plus explicit retries, deduplicated and ascending within 1..totalPages. */
  planPages(totalPages: number, retryPages: readonly number[] = []): number[] {
    const planned = new Set<number>();
    for (let page = this.checkpoint + 1; page <= totalPages; page += 1) {
      planned.add(page);
    }
    for (const page of retryPages) {
      if (Number.isInteger(page) && page >= 1 && page <= totalPages) {
        planned.add(page);
      }
    }
    return [...planned].sort((a, b) => a - b);
  }

  async recordPersisted(pageNumbers: readonly number[]): Promise<number> {
    for (const pageNumber of pageNumbers) {
      this.persisted.add(pageNumber);
    }

    let next = this.checkpoint;
    while (this.persisted.has(next + 1)) {
      next += 1;
    }
    if (next === this.checkpoint) {
      return this.checkpoint;
    }

    await this.store.saveCheckpoint({
      bookId: this.bookId,
      highestContiguousPersistedPage: next,
      timestamp: this.now().toISOString(),
    });
    this.logger.debug("checkpoint_advanced", { bookId: this.bookId, from: this.checkpoint, to: next });
    this.checkpoint = next;
    return next;
  }
}
