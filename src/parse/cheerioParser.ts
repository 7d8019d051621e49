import { load } from "cheerio";
import type { ParserBackend, RawPageContent } from "./types";
import {
  BLOCK_SELECTORS,
  CHROME_SELECTORS,
  CONTENT_SELECTORS,
  FOOTNOTE_SELECTOR,
  HEADING_SELECTORS,
} from "./textCleaner";

function squash(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Strict primary parser: gives up unless one of the known content containers is present. */
export class CheerioParser implements ParserBackend {
  readonly name = "cheerio";

  parse(rawHtml: string): RawPageContent | undefined {
    const $ = load(rawHtml);
    const title = squash($("title").first().text()) || undefined;

    for (const selector of CONTENT_SELECTORS) {
      const container = $(selector).first();
      if (container.length === 0) {
        continue;
      }

      container.find(CHROME_SELECTORS).remove();

      const headings = container
        .find(HEADING_SELECTORS)
        .map((_, element) => squash($(element).text()))
        .get()
        .filter((heading) => heading.length > 0);
      const footnotes = container
        .find(FOOTNOTE_SELECTOR)
        .map((_, element) => $(element).text())
        .get()
        .join("\n");

      container.find("br").replaceWith("\n");
      container.find(BLOCK_SELECTORS).each((_, element) => {
        $(element).before("\n").after("\n");
      });

      return {
        text: container.text(),
        contentSelector: selector,
        headings,
        footnotes: footnotes || undefined,
        title,
      };
    }

    return undefined;
  }
}
