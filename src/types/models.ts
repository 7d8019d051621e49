import { BookResolutionError } from "../core/errors";

export interface Book {
  readonly id: string;
  readonly totalPages: number;
  readonly sourceBaseUrl: string;
}

export type PageStatus = "pending" | "fetching" | "fetched" | "parsing" | "parsed" | "persisted" | "failed";

/** Why a page ended in `failed`: a 4xx, retries used up, or unparseable markup. */
export type PageFailureKind = "missing" | "exhausted" | "parse_error";

export type ParserName = "cheerio" | "linkedom";

export interface StructuralMetadata {
  parser: ParserName;
  contentSelector: string;
  wordCount: number;
  charCount: number;
  headings: string[];
  footnotes?: string;
  printedPageNumber?: number;
  title?: string;
}

export interface ExtractedPage {
  readonly pageNumber: number;
  readonly text: string;
  readonly structuralMetadata: Readonly<StructuralMetadata>;
}

export interface ResumeCheckpoint {
  bookId: string;
  highestContiguousPersistedPage: number;
  timestamp: string;
}

export interface BookPublisher {
  name: string;
  location?: string;
}

/** One entry of the book's table of contents; `order` encodes the path as parentOrder * 1000 + position. */
export interface BookChapter {
  title: string;
  order: number;
  level: number;
  pageStart?: number;
  pageEnd?: number;
  volumeNumber?: number;
  children: BookChapter[];
}

export interface BookVolume {
  number: number;
  title: string;
  pageStart: number;
  pageEnd?: number;
}

/** Book-level record read from the book card and the reader's volume menu. */
export interface BookMetadata {
  bookId: string;
  title: string;
  authors: string[];
  publisher?: BookPublisher;
  section?: string;
  edition?: string;
  editionNumber?: number;
  publicationYear?: number;
  publicationYearHijri?: number;
  hasOriginalPagination: boolean;
  pageCountInternal: number;
  pageCountPrinted?: number;
  volumeCount?: number;
  volumes: BookVolume[];
  chapters: BookChapter[];
  sourceUrl: string;
  fetchedAt: string;
}

export type StrategyKind = "sequential" | "thread_pool" | "async_io" | "multi_process";

export interface ExtractionResult {
  bookId: string;
  strategy: StrategyKind;
  pagesTotal: number;
  pagesSucceeded: number;
  pagesFailed: number;
  pagesIncomplete: number;
  pagesSkipped: number;
  failedPageNumbers: number[];
  incompletePageNumbers: number[];
  checkpoint: number;
  flushes: number[];
  durationMs: number;
  cancelled: boolean;
  fatalError?: string;
}

export function createExtractedPage(pageNumber: number, text: string, metadata: StructuralMetadata): ExtractedPage {
  return Object.freeze({
    pageNumber,
    text,
    structuralMetadata: Object.freeze({ ...metadata, headings: [...metadata.headings] }),
  });
}

/** Accepts catalogue ids such as `BK000043` as well as bare numeric ids. */
export function normalizeBookId(raw: string): string {
  const trimmed = raw.trim();
  const match = /^(?:BK)?0*(\d+)$/i.exec(trimmed);
  if (!match) {
    throw new BookResolutionError(`Invalid book id: ${JSON.stringify(raw)}`);
  }
  return match[1];
}

export function bookCardUrl(book: Pick<Book, "id" | "sourceBaseUrl">): string {
  return `${book.sourceBaseUrl.replace(/\/+$/, "")}/book/${book.id}`;
}

export function pageUrl(book: Pick<Book, "id" | "sourceBaseUrl">, pageNumber: number): string {
  const base = book.sourceBaseUrl.replace(/\/+$/, "");
  return `${base}/book/${book.id}/${pageNumber}`;
}
