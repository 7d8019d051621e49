import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { PersistenceError } from "../core/errors";
import type { BookMetadata, ExtractedPage, ResumeCheckpoint, StructuralMetadata } from "../types";
import { isBookMetadata, isStructuralMetadata, toStoredPage, type CommitResult, type PageStore, type StoredPage } from "./types";

type PageRow = {
  bookId: string;
  pageNumber: number;
  text: string;
  metadata: string;
  persistedAt: string;
};

type PageParams = PageRow & {
  printedPageNumber: number | null;
};

type CheckpointRow = {
  highestContiguousPersistedPage: number;
};

type BookParams = {
  bookId: string;
  title: string;
  metadata: string;
  updatedAt: string;
};

type CheckpointParams = {
  bookId: string;
  page: number;
  updatedAt: string;
};

export interface SqliteStoreOptions {
  now?: () => Date;
}

function parseMetadata(raw: string, bookId: string, pageNumber: number): StructuralMetadata {
  const parsed: unknown = JSON.parse(raw);
  if (!isStructuralMetadata(parsed)) {
    throw new PersistenceError(`stored metadata for book ${bookId} page ${pageNumber} is malformed`, [pageNumber]);
  }
  return parsed;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** One SQLite transaction per committed batch; pages upsert on (bookId, pageNumber). */
export class SqliteStore implements PageStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;
  private openBookId?: string;
  private staged: StoredPage[] = [];

  constructor(dbPath: string, options: SqliteStoreOptions = {}) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.now = options.now ?? (() => new Date());
    this.initializeSchema();
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
    if (this.openBookId === undefined) {
      return { ok: false, error: new PersistenceError("commit called without an open batch", []) };
    }

    const rows = this.staged;
    this.openBookId = undefined;
    this.staged = [];

    const statement = this.db.prepare<PageParams>(`
      INSERT INTO pages (bookId, pageNumber, text, metadata, printedPageNumber, persistedAt)
      VALUES (@bookId, @pageNumber, @text, @metadata, @printedPageNumber, @persistedAt)
      ON CONFLICT(bookId, pageNumber) DO UPDATE SET
        text = excluded.text,
        metadata = excluded.metadata,
        printedPageNumber = excluded.printedPageNumber,
        persistedAt = excluded.persistedAt
    `);
    const tx = this.db.transaction((pages: StoredPage[]) => {
      for (const page of pages) {
        statement.run({
          bookId: page.bookId,
          pageNumber: page.pageNumber,
          text: page.text,
          metadata: JSON.stringify(page.structuralMetadata),
          printedPageNumber: page.structuralMetadata.printedPageNumber ?? null,
          persistedAt: page.persistedAt,
        });
      }
    });

    try {
      tx(rows);
      return { ok: true };
    } catch (error) {
      return { ok: false, error: asError(error) };
    }
  }

  async rollback(): Promise<void> {
    this.openBookId = undefined;
    this.staged = [];
  }

  async lastCheckpoint(bookId: string): Promise<number | undefined> {
    const row = this.db
      .prepare<[string], CheckpointRow>(
        `SELECT highestContiguousPersistedPage FROM checkpoints WHERE bookId = ?`,
      )
      .get(bookId);
    return row?.highestContiguousPersistedPage;
  }

  async saveCheckpoint(checkpoint: ResumeCheckpoint): Promise<void> {
    this.db
      .prepare<CheckpointParams>(
        `
        INSERT INTO checkpoints (bookId, highestContiguousPersistedPage, updatedAt)
        VALUES (@bookId, @page, @updatedAt)
        ON CONFLICT(bookId) DO UPDATE SET
          highestContiguousPersistedPage = MAX(highestContiguousPersistedPage, excluded.highestContiguousPersistedPage),
          updatedAt = excluded.updatedAt
      `,
      )
      .run({
        bookId: checkpoint.bookId,
        page: checkpoint.highestContiguousPersistedPage,
        updatedAt: checkpoint.timestamp,
      });
  }

  async listPages(bookId: string): Promise<StoredPage[]> {
    const rows = this.db
      .prepare<[string], PageRow>(
        `
        SELECT bookId, pageNumber, text, metadata, persistedAt
        FROM pages
        WHERE bookId = ?
        ORDER BY pageNumber ASC
      `,
      )
      .all(bookId);

    return rows.map((row) => ({
      bookId: row.bookId,
      pageNumber: row.pageNumber,
      text: row.text,
      structuralMetadata: parseMetadata(row.metadata, row.bookId, row.pageNumber),
      persistedAt: row.persistedAt,
    }));
  }

  async countPages(bookId: string): Promise<number> {
    const row = this.db.prepare<[string], { count: number }>(`SELECT COUNT(*) as count FROM pages WHERE bookId = ?`).get(bookId);
    return row?.count ?? 0;
  }

  async saveBookMetadata(metadata: BookMetadata): Promise<void> {
    this.db
      .prepare<BookParams>(
        `
        INSERT INTO books (bookId, title, metadata, updatedAt)
        VALUES (@bookId, @title, @metadata, @updatedAt)
        ON CONFLICT(bookId) DO UPDATE SET
          title = excluded.title,
          metadata = excluded.metadata,
          updatedAt = excluded.updatedAt
      `,
      )
      .run({
        bookId: metadata.bookId,
        title: metadata.title,
        metadata: JSON.stringify(metadata),
        updatedAt: this.now().toISOString(),
      });
  }

  async getBookMetadata(bookId: string): Promise<BookMetadata | undefined> {
    const row = this.db.prepare<[string], { metadata: string }>(`SELECT metadata FROM books WHERE bookId = ?`).get(bookId);
    if (!row) {
      return undefined;
    }
    const parsed: unknown = JSON.parse(row.metadata);
    if (!isBookMetadata(parsed)) {
      throw new PersistenceError(`stored metadata for book ${bookId} is malformed`, []);
    }
    return parsed;
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pages (
        bookId TEXT NOT NULL,
        pageNumber INTEGER NOT NULL,
        text TEXT NOT NULL,
        metadata TEXT NOT NULL,
        printedPageNumber INTEGER NULL,
        persistedAt TEXT NOT NULL,
        PRIMARY KEY (bookId, pageNumber)
      );

      CREATE TABLE IF NOT EXISTS checkpoints (
        bookId TEXT PRIMARY KEY,
        highestContiguousPersistedPage INTEGER NOT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS books (
        bookId TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        metadata TEXT NOT NULL,
        updatedAt TEXT NOT NULL
      );
    `);
  }
}
