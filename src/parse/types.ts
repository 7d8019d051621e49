import type { ParseError } from "../core/errors";
import type { ExtractedPage, ParserName } from "../types";

/** What a backend pulls out of the markup before any text cleaning. */
export interface RawPageContent {
  text: string;
  contentSelector: string;
  headings: string[];
  footnotes?: string;
  title?: string;
}

export interface ParserBackend {
  readonly name: ParserName;
  /** Returns undefined when no content container can be located. */
  parse(rawHtml: string): RawPageContent | undefined;
}

export type ParseOutcome = { ok: true; page: ExtractedPage } | { ok: false; error: ParseError };

export interface HtmlExtractor {
  extract(rawHtml: string, pageNumber: number): ParseOutcome;
}
