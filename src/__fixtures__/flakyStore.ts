import { InMemoryStore, type CommitResult, type PageStore, type StoredPage } from "../store";
import type { BookMetadata, ExtractedPage, ResumeCheckpoint } from "../types";

/** InMemoryStore whose next `failCommits` commits fail, and whose rollbacks and checkpoint writes can be made to throw. */
export class FlakyStore implements PageStore {
  readonly inner = new InMemoryStore();
  failCommits: number;
  failCheckpoints = false;
  failRollbacks = false;
  commitAttempts = 0;
  rollbacks = 0;

  constructor(failCommits = 0) {
    this.failCommits = failCommits;
  }

  beginBatch(bookId: string): Promise<void> {
    return this.inner.beginBatch(bookId);
  }

  append(page: ExtractedPage): Promise<void> {
    return this.inner.append(page);
  }

  async commit(): Promise<CommitResult> {
    this.commitAttempts += 1;
    if (this.failCommits > 0) {
      this.failCommits -= 1;
      return { ok: false, error: new Error("disk full") };
    }
    return this.inner.commit();
  }

  async rollback(): Promise<void> {
    this.rollbacks += 1;
    await this.inner.rollback();
    if (this.failRollbacks) {
      throw new Error("rollback lost its connection");
    }
  }

  lastCheckpoint(bookId: string): Promise<number | undefined> {
    return this.inner.lastCheckpoint(bookId);
  }

  async saveCheckpoint(checkpoint: ResumeCheckpoint): Promise<void> {
    if (this.failCheckpoints) {
      throw new Error("checkpoint volume is read-only");
    }
    await this.inner.saveCheckpoint(checkpoint);
  }

  listPages(bookId: string): Promise<StoredPage[]> {
    return this.inner.listPages(bookId);
  }

  countPages(bookId: string): Promise<number> {
    return this.inner.countPages(bookId);
  }

  saveBookMetadata(metadata: BookMetadata): Promise<void> {
    return this.inner.saveBookMetadata(metadata);
  }

  getBookMetadata(bookId: string): Promise<BookMetadata | undefined> {
    return this.inner.getBookMetadata(bookId);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}
