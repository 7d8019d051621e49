export const CONTENT_SELECTORS = [
  "div.nass",
  "#book",
  "div#text",
  "article",
  "div.reader-text",
  ".book-content",
  ".page-content",
  "main",
] as const;

export const CHROME_SELECTORS = [
  "script",
  "style",
  "nav",
  "button",
  ".share",
  ".social",
  ".ad",
  ".advertisement",
  ".menu",
  ".sidebar",
  ".header",
  ".footer",
  ".btn",
  ".input-group",
  ".modal",
  "[id*='modal']",
  ".dropdown",
  ".navbar",
].join(", ");

/** Elements whose boundaries become line breaks in the extracted text. */
export const BLOCK_SELECTORS = "p, div, li, tr, hr, h1, h2, h3, h4, h5, h6, blockquote, section, article, header, footer";

export const HEADING_SELECTORS = "h1, h2, h3";

export const FOOTNOTE_SELECTOR = ".hamesh";

// Site chrome that survives selector stripping.
const BOILERPLATE_PHRASES = [
  "للمساهمة في دعم المكتبة الشاملة",
  "حول المشروع",
  "اتصل بنا",
  "الموقع القديم",
  "المكتبة الشاملة",
  "بحث في هذا الكتاب",
  "رقم الجزء",
  "مسار الصفحة الحالية",
  "فهرس الكتاب",
  "نسخ الفقرة ورابط لها",
  "إغلاق",
  "fa fa-",
];

const DIGITS_ONLY = /^[0-9٠-٩]+$/;
const PRINTED_PAGE = /[صس]\s*[:：]?\s*([0-9٠-٩]+)/;

export function toWesternDigits(value: string): string {
  return value.replace(/[٠-٩]/g, (digit) => String(digit.charCodeAt(0) - 0x0660));
}

export function cleanText(raw: string): string {
  const lines: string[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const collapsed = line.replace(/\s+/g, " ").trim();
    if (!collapsed || DIGITS_ONLY.test(collapsed)) {
      continue;
    }
    if (BOILERPLATE_PHRASES.some((phrase) => collapsed.includes(phrase))) {
      continue;
    }
    lines.push(collapsed);
  }
  return lines.join("\n");
}

/** Printed page numbers appear in page titles as `ص 12` or with Arabic-Indic digits. */
export function extractPrintedPageNumber(title: string | undefined): number | undefined {
  if (!title) {
    return undefined;
  }
  const match = PRINTED_PAGE.exec(title);
  if (!match) {
    return undefined;
  }
  const parsed = Number.parseInt(toWesternDigits(match[1]), 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
