import { BookResolutionError } from "../core/errors";
import { fetchWithRetry, type FetchWithRetryOptions } from "../http";
import { bookCardUrl, pageUrl, type Book, type BookChapter, type BookMetadata, type BookVolume } from "../types";
import { parseBookCard, parseVolumeMenu, readPrintedPageNumber } from "./bookCardParser";

export interface CollectBookMetadataOptions extends FetchWithRetryOptions {
  book: Book;
  now?: () => Date;
}

function assignVolumes(chapters: BookChapter[], volumes: BookVolume[]): void {
  for (const chapter of chapters) {
    const start = chapter.pageStart;
    if (start !== undefined) {
      chapter.volumeNumber = volumes.find((volume) => start >= volume.pageStart && start <= (volume.pageEnd ?? Infinity))?.number;
    }
    assignVolumes(chapter.children, volumes);
  }
}

/**
 * Reads the book card, the volume menu on page 1 and the printed page number
 * of the last page. Only the card is required: without a volume menu the book
 * is one volume, and an unreadable last page leaves the printed count unset.
 */
export async function collectBookMetadata(options: CollectBookMetadataOptions): Promise<BookMetadata> {
  const { book, logger } = options;
  const now = options.now ?? (() => new Date());
  const sourceUrl = bookCardUrl(book);

  const card = await fetchWithRetry(sourceUrl, options);
  if (!card.ok) {
    throw new BookResolutionError(`could not read the card of book ${book.id}: ${card.error.message}`, { cause: card.error });
  }
  const parsed = parseBookCard(card.body, book.id, book.totalPages);

  const firstPage = await fetchWithRetry(pageUrl(book, 1), options);
  const menu = firstPage.ok ? parseVolumeMenu(firstPage.body, book.id, book.totalPages) : [];
  if (!firstPage.ok) {
    logger.warn("book_volumes_unavailable", { bookId: book.id, error: firstPage.error.message });
  }
  const volumes: BookVolume[] = menu.length > 0 ? menu : [{ number: 1, title: "الجزء 1", pageStart: 1, pageEnd: book.totalPages }];
  assignVolumes(parsed.chapters, volumes);

  const lastPage = book.totalPages === 1 ? firstPage : await fetchWithRetry(pageUrl(book, book.totalPages), options);
  const pageCountPrinted = lastPage.ok ? readPrintedPageNumber(lastPage.body) : undefined;
  if (!lastPage.ok) {
    logger.warn("book_printed_count_unavailable", { bookId: book.id, error: lastPage.error.message });
  }

  const metadata: BookMetadata = {
    bookId: book.id,
    ...parsed,
    volumeCount: parsed.volumeCount ?? volumes.length,
    pageCountInternal: book.totalPages,
    pageCountPrinted,
    volumes,
    sourceUrl,
    fetchedAt: now().toISOString(),
  };
  logger.info("book_metadata_collected", {
    bookId: book.id,
    title: metadata.title,
    chapters: metadata.chapters.length,
    volumes: volumes.length,
    pageCountPrinted,
  });
  return metadata;
}
