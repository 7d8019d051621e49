import { load } from "cheerio";

const NEXT_LINK_TEXT = />>|»|التالي/;

export function pageNumberFromHref(href: string | undefined, pattern: RegExp): number | undefined {
  if (!href) {
    return undefined;
  }
  const match = pattern.exec(href.split("#")[0]);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

/**
 * Reads the reader's pager for the highest page number of a book. The
 * "last page" control (any link whose text carries `>>`, `»` or `التالي`) is
 * trusted first; when there is none, every `/book/<id>/<n>` link on the page is
 * considered.
 */
export function findLastPageNumber(html: string, bookId: string): number | undefined {
  const $ = load(html);
  const pattern = new RegExp(`/book/${bookId}/(\\d+)(?:$|[/?])`);
  let fromNextLinks: number | undefined;
  let fromAllLinks: number | undefined;

  $("a[href]").each((_, element) => {
    const link = $(element);
    const pageNumber = pageNumberFromHref(link.attr("href"), pattern);
    if (pageNumber === undefined) {
      return;
    }
    fromAllLinks = Math.max(fromAllLinks ?? 0, pageNumber);
    if (NEXT_LINK_TEXT.test(link.text().trim())) {
      fromNextLinks = Math.max(fromNextLinks ?? 0, pageNumber);
    }
  });

  return fromNextLinks ?? fromAllLinks;
}
