import type { BookChapter, BookMetadata, BookPublisher, BookVolume, ExtractedPage, ResumeCheckpoint, StructuralMetadata } from "../types";

export type CommitResult = { ok: true } | { ok: false; error: Error };

export interface StoredPage {
  bookId: string;
  pageNumber: number;
  text: string;
  structuralMetadata: StructuralMetadata;
  persistedAt: string;
}

/**
 * Durable home for extracted pages and resume checkpoints.
 *
 * Pages are written in batches: `beginBatch`, any number of `append`, then
 * `commit`. A commit is all-or-nothing; a failed commit leaves nothing of the
 * batch behind, and `rollback` discards a batch that was never committed.
 * `saveCheckpoint` never lowers a stored checkpoint. Book metadata is kept
 * apart from pages, one record per book, replaced on every save.
 */
export interface PageStore {
  beginBatch(bookId: string): Promise<void>;
  append(page: ExtractedPage): Promise<void>;
  commit(): Promise<CommitResult>;
  rollback(): Promise<void>;
  lastCheckpoint(bookId: string): Promise<number | undefined>;
  saveCheckpoint(checkpoint: ResumeCheckpoint): Promise<void>;
  listPages(bookId: string): Promise<StoredPage[]>;
  countPages(bookId: string): Promise<number>;
  saveBookMetadata(metadata: BookMetadata): Promise<void>;
  getBookMetadata(bookId: string): Promise<BookMetadata | undefined>;
  close(): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

export function isStructuralMetadata(value: unknown): value is StructuralMetadata {
  return (
    isRecord(value) &&
    (value.parser === "cheerio" || value.parser === "linkedom") &&
    typeof value.contentSelector === "string" &&
    typeof value.wordCount === "number" &&
    typeof value.charCount === "number" &&
    isStringArray(value.headings) &&
    (value.footnotes === undefined || typeof value.footnotes === "string") &&
    (value.printedPageNumber === undefined || typeof value.printedPageNumber === "number") &&
    (value.title === undefined || typeof value.title === "string")
  );
}

function isOptional<T>(value: unknown, check: (item: unknown) => item is T): boolean {
  return value === undefined || check(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function isNumber(value: unknown): value is number {
  return typeof value === "number";
}

function isBookPublisher(value: unknown): value is BookPublisher {
  return isRecord(value) && isString(value.name) && isOptional(value.location, isString);
}

function isBookVolume(value: unknown): value is BookVolume {
  return (
    isRecord(value) &&
    isNumber(value.number) &&
    isString(value.title) &&
    isNumber(value.pageStart) &&
    isOptional(value.pageEnd, isNumber)
  );
}

function isBookChapter(value: unknown): value is BookChapter {
  return (
    isRecord(value) &&
    isString(value.title) &&
    isNumber(value.order) &&
    isNumber(value.level) &&
    isOptional(value.pageStart, isNumber) &&
    isOptional(value.pageEnd, isNumber) &&
    isOptional(value.volumeNumber, isNumber) &&
    Array.isArray(value.children) &&
    value.children.every(isBookChapter)
  );
}

export function isBookMetadata(value: unknown): value is BookMetadata {
  return (
    isRecord(value) &&
    isString(value.bookId) &&
    isString(value.title) &&
    isStringArray(value.authors) &&
    isOptional(value.publisher, isBookPublisher) &&
    isOptional(value.section, isString) &&
    isOptional(value.edition, isString) &&
    isOptional(value.editionNumber, isNumber) &&
    isOptional(value.publicationYear, isNumber) &&
    isOptional(value.publicationYearHijri, isNumber) &&
    typeof value.hasOriginalPagination === "boolean" &&
    isNumber(value.pageCountInternal) &&
    isOptional(value.pageCountPrinted, isNumber) &&
    isOptional(value.volumeCount, isNumber) &&
    Array.isArray(value.volumes) &&
    value.volumes.every(isBookVolume) &&
    Array.isArray(value.chapters) &&
    value.chapters.every(isBookChapter) &&
    isString(value.sourceUrl) &&
    isString(value.fetchedAt)
  );
}

export function isStoredPage(value: unknown): value is StoredPage {
  return (
    isRecord(value) &&
    typeof value.bookId === "string" &&
    typeof value.pageNumber === "number" &&
    typeof value.text === "string" &&
    typeof value.persistedAt === "string" &&
    isStructuralMetadata(value.structuralMetadata)
  );
}

export function toStoredPage(bookId: string, page: ExtractedPage, persistedAt: string): StoredPage {
  return {
    bookId,
    pageNumber: page.pageNumber,
    text: page.text,
    structuralMetadata: { ...page.structuralMetadata, headings: [...page.structuralMetadata.headings] },
    persistedAt,
  };
}
