import { load, type CheerioAPI, type SelectorType } from "cheerio";
import { BLOCK_SELECTORS, extractPrintedPageNumber, toWesternDigits } from "../parse";
import type { BookChapter, BookPublisher, BookVolume } from "../types";
import { pageNumberFromHref } from "./paginationParser";

const TITLE_SELECTORS = ["h1.book-title", "h1", ".book-title", "title"];
const AUTHOR_SELECTORS = [".book-author a", ".author a", "a[href*='/author/']"];
const SECTION_SELECTORS = [".book-section a", ".book-category a", ".category a", "a[href*='/category/']", "a[href*='/section/']"];
const INDEX_SELECTORS: SelectorType[] = ["div.betaka-index ul", ".book-index ul", "#book-index ul", ".index ul", ".table-of-contents ul", ".s-nav ul"];
const VOLUME_MENU_SELECTORS = ['ul.dropdown-menu a[href*="#p1"]', 'ul.dropdown-menu a[href*="book"]', ".dropdown-menu a"];

const PUBLISHER_LINE = /(?:الناشر|دار النشر|المطبعة)\s*[:：]\s*([^\n]+)/;
const SECTION_LINE = /(?:القسم|التصنيف)\s*[:：]\s*([^\n]+)/;
const EDITION_LINE = /(?<![\u0600-\u06FF])(?:الطبعة|طبعة|ط)\s*[:：]\s*([^\n]+)/;
const PUBLISHED_LINE = /(?:سنة|تاريخ) النشر\s*[:：]\s*([^\n]+)/;
const NO_EDITION = /بدون (?:تاريخ|طبعة)/;
const HIJRI_YEAR = /(\d{4})\s*هـ/;
const GREGORIAN_YEAR = /(\d{4})\s*م(?![\u0600-\u06FF])/;
const VOLUME_COUNT = [/عدد الأجزاء\s*[:：]\s*(\d+)/, /(\d+)\s*(?:مجلدات|مجلد|أجزاء)/];
const ORIGINAL_PAGINATION = "موافق للمطبوع";

const PUBLISHER_CITIES = ["الكويت", "القاهرة", "الرياض", "بيروت", "دبي", "دمشق", "بغداد", "الدوحة"];
const EDITION_ORDINALS: Array<[string, number]> = [
  ["الأولى", 1],
  ["الثانية", 2],
  ["الثالثة", 3],
  ["الرابعة", 4],
  ["الخامسة", 5],
  ["السادسة", 6],
  ["السابعة", 7],
  ["الثامنة", 8],
  ["التاسعة", 9],
  ["العاشرة", 10],
];

// Mean ratio of the Gregorian year to the lunar Hijri year.
const HIJRI_YEAR_RATIO = 1.030684;

export interface BookCard {
  title: string;
  authors: string[];
  publisher?: BookPublisher;
  section?: string;
  edition?: string;
  editionNumber?: number;
  publicationYear?: number;
  publicationYearHijri?: number;
  hasOriginalPagination: boolean;
  volumeCount?: number;
  chapters: BookChapter[];
}

interface IndexEntry {
  title: string;
  level: number;
  pageStart?: number;
}

function squash(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function firstText($: CheerioAPI, selectors: string[], minLength = 1): string | undefined {
  for (const selector of selectors) {
    const text = squash($(selector).first().text());
    if (text.length >= minLength) {
      return text;
    }
  }
  return undefined;
}

/** Body text with one line per block element, for the label regexes. */
function cardLines($: CheerioAPI): string {
  $("script, style").remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTORS).each((_, element) => {
    $(element).before("\n").after("\n");
  });
  return $("body")
    .text()
    .split("\n")
    .map(squash)
    .filter((line) => line.length > 0)
    .join("\n");
}

function splitPublisher(raw: string): BookPublisher {
  const parts = raw.split(/\s*[،,]\s*|\s+-\s+/).filter((part) => part.length > 0);
  const last = parts[parts.length - 1];
  if (parts.length > 1 && PUBLISHER_CITIES.some((city) => last.includes(city))) {
    return { name: parts.slice(0, -1).join("، "), location: last };
  }
  return { name: raw };
}

function editionNumber(edition: string): number | undefined {
  const ordinal = EDITION_ORDINALS.find(([word]) => edition.includes(word));
  if (ordinal) {
    return ordinal[1];
  }
  const digits = /^\D*?(\d{1,2})(?!\d)/.exec(toWesternDigits(edition));
  return digits ? Number.parseInt(digits[1], 10) : undefined;
}

/** Reads a Hijri (`هـ`) or Gregorian (`م`) year and derives the other calendar's year from it. */
export function publicationYears(text: string, bareYearIsGregorian = false): Pick<BookCard, "publicationYear" | "publicationYearHijri"> {
  const western = toWesternDigits(text);
  const hijri = HIJRI_YEAR.exec(western);
  const gregorian = GREGORIAN_YEAR.exec(western) ?? (bareYearIsGregorian && !hijri ? /(\d{4})/.exec(western) : null);

  const hijriYear = hijri ? Number.parseInt(hijri[1], 10) : undefined;
  const gregorianYear = gregorian ? Number.parseInt(gregorian[1], 10) : undefined;
  if (hijriYear === undefined && gregorianYear === undefined) {
    return {};
  }
  return {
    publicationYear: gregorianYear ?? Math.floor((hijriYear ?? 0) / HIJRI_YEAR_RATIO) + 622,
    publicationYearHijri: hijriYear ?? Math.floor(((gregorianYear ?? 0) - 622) * HIJRI_YEAR_RATIO) + 1,
  };
}

function buildChapterTree(entries: IndexEntry[], lastPage: number | undefined): BookChapter[] {
  const roots: BookChapter[] = [];
  const stack: BookChapter[] = [];

  for (const entry of entries) {
    while (stack.length >= entry.level) {
      stack.pop();
    }
    const parent = stack.length > 0 ? stack[stack.length - 1] : undefined;
    const siblings = parent ? parent.children : roots;
    const chapter: BookChapter = {
      title: entry.title,
      order: (parent?.order ?? 0) * 1000 + siblings.length + 1,
      level: stack.length + 1,
      pageStart: entry.pageStart,
      children: [],
    };
    siblings.push(chapter);
    stack.push(chapter);
  }

  fillPageEnds(roots, lastPage);
  return roots;
}

/** A chapter ends the page before the next sibling with a known start; the last one ends where its parent does. */
function fillPageEnds(chapters: BookChapter[], lastPage: number | undefined): void {
  chapters.forEach((chapter, index) => {
    const start = chapter.pageStart;
    if (start !== undefined) {
      const nextStart = chapters.slice(index + 1).find((sibling) => sibling.pageStart !== undefined)?.pageStart;
      const end = nextStart !== undefined ? nextStart - 1 : lastPage;
      chapter.pageEnd = end === undefined ? undefined : Math.max(start, end);
    }
    fillPageEnds(chapter.children, chapter.pageEnd ?? lastPage);
  });
}

function parseChapterIndex($: CheerioAPI, bookId: string, lastPage: number | undefined): BookChapter[] {
  const pagePattern = new RegExp(`/book/${bookId}/(\\d+)`);
  const container = INDEX_SELECTORS.map((selector) => $(selector).first()).find((list) => list.length > 0);
  if (!container) {
    return [];
  }

  const entries: IndexEntry[] = [];
  container.find("li").each((_, element) => {
    const item = $(element);
    const link = item.children("a").first();
    const href = link.attr("href") ?? "";
    const title = squash(link.text());
    if (!title || !href.includes(`/book/${bookId}`)) {
      return;
    }
    entries.push({
      title,
      level: item.parentsUntil(container, "li").length + 1,
      pageStart: pageNumberFromHref(href, pagePattern),
    });
  });

  return buildChapterTree(entries, lastPage);
}

/**
 * Parses the book card served at `/book/<id>`: bibliographic fields from
 * their labelled lines and the table of contents from the index list.
 * `lastPage` closes the page range of the final chapter.
 */
export function parseBookCard(html: string, bookId: string, lastPage?: number): BookCard {
  const $ = load(html);
  const title = firstText($, TITLE_SELECTORS, 4) ?? `Book ${bookId}`;

  const authors: string[] = [];
  for (const selector of AUTHOR_SELECTORS) {
    $(selector).each((_, element) => {
      const name = squash($(element).text());
      if (name.length > 2 && !authors.includes(name)) {
        authors.push(name);
      }
    });
  }

  const chapters = parseChapterIndex($, bookId, lastPage);
  const sectionLink = firstText($, SECTION_SELECTORS);
  const text = cardLines($);

  const publisherMatch = PUBLISHER_LINE.exec(text);
  const editionMatch = EDITION_LINE.exec(text);
  const edition = editionMatch && !NO_EDITION.test(editionMatch[1]) ? squash(editionMatch[1]) : undefined;
  const publishedMatch = PUBLISHED_LINE.exec(text);
  const years = {
    ...(publishedMatch ? publicationYears(publishedMatch[1], true) : {}),
    ...(edition ? publicationYears(edition) : {}),
  };
  const volumeCount = VOLUME_COUNT.map((pattern) => pattern.exec(toWesternDigits(text))).find((match) => match !== null);

  return {
    title,
    authors,
    publisher: publisherMatch ? splitPublisher(squash(publisherMatch[1])) : undefined,
    section: sectionLink ?? SECTION_LINE.exec(text)?.[1]?.trim(),
    edition,
    editionNumber: edition ? editionNumber(edition) : undefined,
    ...years,
    hasOriginalPagination: text.includes(ORIGINAL_PAGINATION),
    volumeCount: volumeCount ? Number.parseInt(volumeCount[1], 10) : undefined,
    chapters,
  };
}

/**
 * Reads the reader's volume menu, where each entry links to the first page of
 * a volume. A volume ends the page before the next one starts; the last ends
 * at `lastPage`. Returns an empty list when the page has no menu.
 */
export function parseVolumeMenu(html: string, bookId: string, lastPage: number): BookVolume[] {
  const $ = load(html);
  const pagePattern = new RegExp(`/book/${bookId}/(\\d+)`);
  const starts = new Map<number, number>();

  for (const selector of VOLUME_MENU_SELECTORS) {
    $(selector).each((_, element) => {
      const link = $(element);
      const start = pageNumberFromHref(link.attr("href"), pagePattern);
      const number = /(\d+)/.exec(toWesternDigits(link.text()));
      if (start === undefined || !number) {
        return;
      }
      const volumeNumber = Number.parseInt(number[1], 10);
      starts.set(volumeNumber, Math.min(starts.get(volumeNumber) ?? start, start));
    });
    if (starts.size > 0) {
      break;
    }
  }

  const sorted = [...starts.entries()].sort((a, b) => a[0] - b[0]);
  return sorted.map(([number, pageStart], index) => ({
    number,
    title: `الجزء ${number}`,
    pageStart,
    pageEnd: index + 1 < sorted.length ? Math.max(pageStart, sorted[index + 1][1] - 1) : Math.max(pageStart, lastPage),
  }));
}

/** Printed page number carried by a reader page's `<title>`. */
export function readPrintedPageNumber(html: string): number | undefined {
  return extractPrintedPageNumber(squash(load(html)("title").first().text()) || undefined);
}
