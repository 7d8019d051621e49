import { PersistenceError } from "../core/errors";
import type { BookMetadata, ExtractedPage, ResumeCheckpoint } from "../types";
import { toStoredPage, type CommitResult, type PageStore, type StoredPage } from "./types";

/** Process-local store, for dry runs and tests. */
export class InMemoryStore implements PageStore {
  private readonly pages = new Map<string, Map<number, StoredPage>>();
  private readonly checkpoints = new Map<string, number>();
  private readonly books = new Map<string, BookMetadata>();
  private openBookId?: string;
  private staged: StoredPage[] = [];

  /** Number of successful commits, in order; each entry lists the page numbers written. */
  readonly commits: number[][] = [];
  /** Every checkpoint value handed to `saveCheckpoint`, in call order. */
  readonly checkpointHistory: number[] = [];

  async beginBatch(bookId: string): Promise<void> {
    if (this.openBookId !== undefined) {
      throw new PersistenceError(`a batch for book ${this.openBookId} is already open`, []);
    }
    this.openBookId = bookId;
    this.staged = [];
  }

  async append(page: ExtractedPage): Promise<void> {
    if (this.openBookId === undefined) {
      throw new PersistenceError("append called without an open batch", [page.pageNumber]);
    }
    this.staged.push(toStoredPage(this.openBookId, page, new Date().toISOString()));
  }

  async commit(): Promise<CommitResult> {
    const bookId = this.openBookId;
    if (bookId === undefined) {
      return { ok: false, error: new PersistenceError("commit called without an open batch", []) };
    }

    const book = this.pages.get(bookId) ?? new Map<number, StoredPage>();
    for (const page of this.staged) {
      book.set(page.pageNumber, page);
    }
    this.pages.set(bookId, book);
    this.commits.push(this.staged.map((page) => page.pageNumber));
    this.openBookId = undefined;
    this.staged = [];
    return { ok: true };
  }

  async rollback(): Promise<void> {
    this.openBookId = undefined;
    this.staged = [];
  }

  async lastCheckpoint(bookId: string): Promise<number | undefined> {
    return this.checkpoints.get(bookId);
  }

  async saveCheckpoint(checkpoint: ResumeCheckpoint): Promise<void> {
    this.checkpointHistory.push(checkpoint.highestContiguousPersistedPage);
    const current = this.checkpoints.get(checkpoint.bookId) ?? 0;
    this.checkpoints.set(checkpoint.bookId, Math.max(current, checkpoint.highestContiguousPersistedPage));
  }

  async listPages(bookId: string): Promise<StoredPage[]> {
    const book = this.pages.get(bookId);
    if (!book) {
      return [];
    }
    return [...book.values()].sort((a, b) => a.pageNumber - b.pageNumber);
  }

  async countPages(bookId: string): Promise<number> {
    return this.pages.get(bookId)?.size ?? 0;
  }

  async saveBookMetadata(metadata: BookMetadata): Promise<void> {
    this.books.set(metadata.bookId, structuredClone(metadata));
  }

  async getBookMetadata(bookId: string): Promise<BookMetadata | undefined> {
    const metadata = this.books.get(bookId);
    return metadata ? structuredClone(metadata) : undefined;
  }

  async close(): Promise<void> {
    return;
  }
}
