import { errorMessage, ParseError } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import { createExtractedPage, type StructuralMetadata } from "../types";
import { CheerioParser } from "./cheerioParser";
import { LinkedomParser } from "./linkedomParser";
import { cleanText, countWords, extractPrintedPageNumber } from "./textCleaner";
import type { HtmlExtractor, ParseOutcome, ParserBackend, RawPageContent } from "./types";

export interface FallbackHtmlExtractorOptions {
  useFastParser: boolean;
  /** Replaces the default cheerio → linkedom chain. */
  backends?: ParserBackend[];
  metrics?: MetricsRegistry;
  logger?: Logger;
}

function buildMetadata(backend: ParserBackend, raw: RawPageContent, text: string): StructuralMetadata {
  const footnotes = raw.footnotes ? cleanText(raw.footnotes) : "";
  return {
    parser: backend.name,
    contentSelector: raw.contentSelector,
    wordCount: countWords(text),
    charCount: text.length,
    headings: raw.headings,
    footnotes: footnotes || undefined,
    printedPageNumber: extractPrintedPageNumber(raw.title),
    title: raw.title,
  };
}

/**
 * Runs the parser chain in order and keeps the first backend that yields
 * non-empty cleaned text. A page nobody can parse becomes a `ParseError`,
 * never an empty record.
 */
export class FallbackHtmlExtractor implements HtmlExtractor {
  private readonly backends: ParserBackend[];
  private readonly metrics?: MetricsRegistry;
  private readonly logger?: Logger;

  constructor(options: FallbackHtmlExtractorOptions) {
    this.backends =
      options.backends ?? (options.useFastParser ? [new CheerioParser(), new LinkedomParser()] : [new LinkedomParser()]);
    this.metrics = options.metrics;
    this.logger = options.logger;
  }

  extract(rawHtml: string, pageNumber: number): ParseOutcome {
    const reasons: string[] = [];

    for (const [index, backend] of this.backends.entries()) {
      let raw: RawPageContent | undefined;
      try {
        raw = backend.parse(rawHtml);
      } catch (error) {
        reasons.push(`${backend.name}: ${errorMessage(error)}`);
        continue;
      }

      if (!raw) {
        reasons.push(`${backend.name}: no content container`);
        continue;
      }

      const text = cleanText(raw.text);
      if (!text) {
        reasons.push(`${backend.name}: empty text`);
        continue;
      }

      if (index > 0) {
        this.metrics?.incrementCounter("fallback_parses");
        this.logger?.debug("page_parse_fallback", { pageNumber, parser: backend.name, reasons });
      }
      return { ok: true, page: createExtractedPage(pageNumber, text, buildMetadata(backend, raw, text)) };
    }

    return { ok: false, error: new ParseError(pageNumber, reasons.join("; ") || "no parser configured") };
  }
}
