import fs from "node:fs";
import path from "node:path";
import { PersistenceError } from "../core/errors";
import type { BookMetadata, ExtractedPage, ResumeCheckpoint } from "../types";
import { isBookMetadata, isStoredPage, toStoredPage, type CommitResult, type PageStore, type StoredPage } from "./types";

export interface JsonlStoreOptions {
  now?: () => Date;
}

interface CheckpointFile {
  bookId: string;
  highestContiguousPersistedPage: number;
  updatedAt: string;
}

function isCheckpointFile(value: unknown): value is CheckpointFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "highestContiguousPersistedPage" in value &&
    typeof value.highestContiguousPersistedPage === "number"
  );
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function fileSize(filePath: string): Promise<number> {
  return fs.existsSync(filePath) ? (await fs.promises.stat(filePath)).size : 0;
}

async function syncFile(filePath: string): Promise<void> {
  const handle = await fs.promises.open(filePath, "r+");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/** Writes `content` to a sibling temp file, syncs it and renames it over `filePath`. */
async function replaceFile(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const handle = await fs.promises.open(tempPath, "w");
  try {
    await handle.writeFile(content, "utf-8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fs.promises.rename(tempPath, filePath);
}

/**
 * File-per-book layout under `rootDir/<bookId>/`: an append-only `pages.jsonl`
 * (the last line for a page number wins), plus `checkpoint.json` and
 * `book.json` replaced by rename. Each batch is one append followed by an
 * fsync; a failed append is truncated back to the size the file had before it.
 */
export class JsonlStore implements PageStore {
  private readonly rootDir: string;
  private readonly now: () => Date;
  private openBookId?: string;
  private staged: StoredPage[] = [];

  constructor(rootDir: string, options: JsonlStoreOptions = {}) {
    this.rootDir = path.resolve(rootDir);
    this.now = options.now ?? (() => new Date());
  }

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
    this.staged.push(toStoredPage(this.openBookId, page, this.now().toISOString()));
  }

  async commit(): Promise<CommitResult> {
    const bookId = this.openBookId;
    if (bookId === undefined) {
      return { ok: false, error: new PersistenceError("commit called without an open batch", []) };
    }

    const rows = this.staged;
    this.openBookId = undefined;
    this.staged = [];
    if (rows.length === 0) {
      return { ok: true };
    }

    const content = rows.map((row) => JSON.stringify(row)).join("\n") + "\n";
    const filePath = this.pagesPath(bookId);
    let sizeBefore: number;
    try {
      await fs.promises.mkdir(this.bookDir(bookId), { recursive: true });
      sizeBefore = await fileSize(filePath);
    } catch (error) {
      return { ok: false, error: asError(error) };
    }

    try {
      await fs.promises.appendFile(filePath, content, "utf-8");
      await syncFile(filePath);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: await this.truncateAfterFailure(filePath, sizeBefore, asError(error)) };
    }
  }

  async rollback(): Promise<void> {
    this.openBookId = undefined;
    this.staged = [];
  }

  async lastCheckpoint(bookId: string): Promise<number | undefined> {
    const filePath = this.checkpointPath(bookId);
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    const parsed: unknown = JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
    if (!isCheckpointFile(parsed)) {
      throw new PersistenceError(`checkpoint file for book ${bookId} is malformed`, []);
    }
    return parsed.highestContiguousPersistedPage;
  }

  async saveCheckpoint(checkpoint: ResumeCheckpoint): Promise<void> {
    const existing = await this.lastCheckpoint(checkpoint.bookId);
    const record: CheckpointFile = {
      bookId: checkpoint.bookId,
      highestContiguousPersistedPage: Math.max(existing ?? 0, checkpoint.highestContiguousPersistedPage),
      updatedAt: checkpoint.timestamp,
    };

    await replaceFile(this.checkpointPath(checkpoint.bookId), JSON.stringify(record, null, 2));
  }

  async listPages(bookId: string): Promise<StoredPage[]> {
    const filePath = this.pagesPath(bookId);
    if (!fs.existsSync(filePath)) {
      return [];
    }

    const latest = new Map<number, StoredPage>();
    const raw = await fs.promises.readFile(filePath, "utf-8");
    for (const [index, line] of raw.split("\n").entries()) {
      if (!line.trim()) {
        continue;
      }
      const parsed: unknown = JSON.parse(line);
      if (!isStoredPage(parsed)) {
        throw new PersistenceError(`${filePath}:${index + 1} is not a page record`, []);
      }
      latest.set(parsed.pageNumber, parsed);
    }

    return [...latest.values()].sort((a, b) => a.pageNumber - b.pageNumber);
  }

  async countPages(bookId: string): Promise<number> {
    return (await this.listPages(bookId)).length;
  }

  async saveBookMetadata(metadata: BookMetadata): Promise<void> {
    await replaceFile(this.bookPath(metadata.bookId), JSON.stringify(metadata, null, 2));
  }

  async getBookMetadata(bookId: string): Promise<BookMetadata | undefined> {
    const filePath = this.bookPath(bookId);
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    const parsed: unknown = JSON.parse(await fs.promises.readFile(filePath, "utf-8"));
    if (!isBookMetadata(parsed)) {
      throw new PersistenceError(`book file for book ${bookId} is malformed`, []);
    }
    return parsed;
  }

  async close(): Promise<void> {
    return;
  }

  private async truncateAfterFailure(filePath: string, size: number, cause: Error): Promise<Error> {
    if (!fs.existsSync(filePath)) {
      return cause;
    }
    try {
      await fs.promises.truncate(filePath, size);
      return cause;
    } catch (truncateError) {
      return new PersistenceError(
        `${cause.message}; truncating ${filePath} back to ${size} bytes also failed: ${asError(truncateError).message}`,
        [],
        { cause },
      );
    }
  }

  private bookDir(bookId: string): string {
    return path.join(this.rootDir, bookId);
  }

  private pagesPath(bookId: string): string {
    return path.join(this.bookDir(bookId), "pages.jsonl");
  }

  private checkpointPath(bookId: string): string {
    return path.join(this.bookDir(bookId), "checkpoint.json");
  }

  private bookPath(bookId: string): string {
    return path.join(this.bookDir(bookId), "book.json");
  }
}
