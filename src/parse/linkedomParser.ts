import { parseHTML } from "linkedom";
import type { ParserBackend, RawPageContent } from "./types";
import {
  BLOCK_SELECTORS,
  CHROME_SELECTORS,
  CONTENT_SELECTORS,
  FOOTNOTE_SELECTOR,
  HEADING_SELECTORS,
} from "./textCleaner";

function squash(value: string | null | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

function locateContainer(document: Document): { element: Element; selector: string } | undefined {
  for (const selector of CONTENT_SELECTORS) {
    const element = document.querySelector(selector);
    if (element) {
      return { element, selector };
    }
  }
  if (document.body) {
    return { element: document.body, selector: "body" };
  }
  if (document.documentElement) {
    return { element: document.documentElement, selector: "document" };
  }
  return undefined;
}

/**
 * Lenient fallback. Takes the first known content container, then `<body>`,
 * then whatever the document root is, so fragments and broken pages still
 * yield text.
 */
export class LinkedomParser implements ParserBackend {
  readonly name = "linkedom";

  parse(rawHtml: string): RawPageContent | undefined {
    const document: Document = parseHTML(rawHtml).document;
    const title = squash(document.querySelector("title")?.textContent) || undefined;
    const located = locateContainer(document);
    if (!located) {
      return undefined;
    }

    const { element, selector } = located;
    element.querySelectorAll(CHROME_SELECTORS).forEach((chrome) => chrome.remove());

    const headings: string[] = [];
    element.querySelectorAll(HEADING_SELECTORS).forEach((heading) => {
      const text = squash(heading.textContent);
      if (text) {
        headings.push(text);
      }
    });
    const footnoteParts: string[] = [];
    element.querySelectorAll(FOOTNOTE_SELECTOR).forEach((footnote) => {
      footnoteParts.push(footnote.textContent ?? "");
    });

    element.querySelectorAll("br").forEach((br) => br.replaceWith("\n"));
    element.querySelectorAll(BLOCK_SELECTORS).forEach((block) => {
      block.before("\n");
      block.after("\n");
    });

    const footnotes = footnoteParts.join("\n");
    return {
      text: element.textContent ?? "",
      contentSelector: selector,
      headings,
      footnotes: footnotes || undefined,
      title,
    };
  }
}
