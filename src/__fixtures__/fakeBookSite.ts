import type { FetchInit, FetchLike, FetchResponseLike } from "../http";

/** What the site answers for one request: an HTTP status, or a dropped connection. */
export type ScriptedFailure = number | "network";

export interface FakeBookSiteOptions {
  bookId: string;
  totalPages: number;
  /** Per page, the answers served before the page itself; consumed one per request. */
  failures?: Record<number, ScriptedFailure[]>;
  /** Pages that always answer 404. */
  missing?: number[];
  /** Pages served without any recognisable content. */
  empty?: number[];
  retryAfterSeconds?: number;
  /** Served at `/book/<id>`; without it the card answers 404. */
  cardHtml?: string;
  /** Answers served for the card before the card itself. */
  cardFailures?: ScriptedFailure[];
  /** Extra markup placed in every reader page, such as a volume menu. */
  readerExtras?: string;
}

export function pageText(bookId: string, pageNumber: number): string {
  return `Book ${bookId} page ${pageNumber}`;
}

export function pageHtml(bookId: string, pageNumber: number, totalPages: number, extras = ""): string {
  return `<!doctype html>
<html>
  <head><title>Test book - ص ${pageNumber}</title></head>
  <body>
    <nav class="navbar"><a href="/">المكتبة الشاملة</a></nav>
    <div class="nass">
      <h3>Chapter ${Math.ceil(pageNumber / 10)}</h3>
      <p>${pageText(bookId, pageNumber)}</p>
      <div class="hamesh">Footnote for page ${pageNumber}</div>
    </div>
    <ul class="pagination">
      <li><a href="/book/${bookId}/1">1</a></li>
      <li><a href="/book/${bookId}/${Math.min(pageNumber + 1, totalPages)}">${Math.min(pageNumber + 1, totalPages)}</a></li>
      <li><a href="/book/${bookId}/${totalPages}">&gt;&gt;</a></li>
    </ul>${extras}
  </body>
</html>`;
}

function toArabicIndic(value: number): string {
  return String(value).replace(/\d/g, (digit) => String.fromCharCode(0x0660 + Number(digit)));
}

/** Book card with a two-level index whose chapters start on pages 1, 2 (2, 3) and 5. */
export function bookCardHtml(bookId: string): string {
  return `<!doctype html>
<html>
  <head><title>كتاب الاختبار - المكتبة الشاملة</title></head>
  <body>
    <h1>كتاب الاختبار</h1>
    <div class="book-author"><a href="/author/7">مؤلف الاختبار</a></div>
    <div class="book-section"><a href="/category/3">كتب الاختبار</a></div>
    <div class="betaka">
      <p>الناشر: دار الاختبار - بيروت</p>
      <p>الطبعة: الثانية، 1420 هـ - 1999 م</p>
      <p>عدد الأجزاء: 2</p>
      <p>[ترقيم الكتاب موافق للمطبوع]</p>
    </div>
    <div class="betaka-index">
      <ul>
        <li><a href="/book/${bookId}/1">المقدمة</a></li>
        <li>
          <a href="/book/${bookId}/2">الباب الأول</a>
          <ul>
            <li><a href="/book/${bookId}/2">الفصل الأول</a></li>
            <li><a href="/book/${bookId}/3">الفصل الثاني</a></li>
          </ul>
        </li>
        <li><a href="/book/${bookId}/5">الباب الثاني</a></li>
      </ul>
    </div>
  </body>
</html>`;
}

/** The reader's volume menu; volume N starts on `starts[N - 1]`. Labels use Arabic-Indic digits. */
export function volumeMenuHtml(bookId: string, starts: number[]): string {
  const items = starts.map((start, index) => `<li><a href="/book/${bookId}/${start}#p1">${toArabicIndic(index + 1)}</a></li>`);
  return `\n    <ul class="dropdown-menu">${items.join("")}</ul>`;
}

function response(status: number, body: string, headers: Record<string, string> = {}): FetchResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    text: async () => body,
  };
}

/** In-process stand-in for the reader site, answering `GET /book/<id>` and `GET /book/<id>/<n>`. */
export class FakeBookSite {
  readonly requests: string[] = [];
  private readonly options: FakeBookSiteOptions;
  private readonly pending = new Map<number, ScriptedFailure[]>();
  private readonly cardPending: ScriptedFailure[];

  constructor(options: FakeBookSiteOptions) {
    this.options = options;
    for (const [page, failures] of Object.entries(options.failures ?? {})) {
      this.pending.set(Number(page), [...failures]);
    }
    this.cardPending = [...(options.cardFailures ?? [])];
  }

  requestsFor(pageNumber: number): number {
    return this.requests.filter((url) => url.endsWith(`/book/${this.options.bookId}/${pageNumber}`)).length;
  }

  readonly fetch: FetchLike = async (url: string, init: FetchInit) => {
    if (init.signal.aborted) {
      throw new Error("aborted");
    }
    this.requests.push(url);

    const match = /\/book\/(\d+)(?:\/(\d+))?$/.exec(url);
    const { bookId, totalPages } = this.options;
    if (!match || match[1] !== bookId) {
      return response(404, "not found");
    }

    if (match[2] === undefined) {
      const failure = this.cardPending.shift();
      if (failure !== undefined) {
        return this.failureResponse(failure);
      }
      return this.options.cardHtml === undefined ? response(404, "not found") : response(200, this.options.cardHtml);
    }

    const pageNumber = Number(match[2]);
    if (pageNumber < 1 || pageNumber > totalPages || this.options.missing?.includes(pageNumber)) {
      return response(404, "not found");
    }

    const next = this.pending.get(pageNumber)?.shift();
    if (next !== undefined) {
      return this.failureResponse(next);
    }

    if (this.options.empty?.includes(pageNumber)) {
      return response(200, "<html><body>   </body></html>");
    }
    return response(200, pageHtml(bookId, pageNumber, totalPages, this.options.readerExtras));
  };

  private failureResponse(failure: ScriptedFailure): FetchResponseLike {
    if (failure === "network") {
      throw new Error("socket hang up");
    }
    const headers: Record<string, string> =
      failure === 429 && this.options.retryAfterSeconds !== undefined
        ? { "retry-after": String(this.options.retryAfterSeconds) }
        : {};
    return response(failure, "unavailable", headers);
  }
}

/** The cleaned text the extractor produces for a page served by FakeBookSite. */
export function expectedText(bookId: string, pageNumber: number): string {
  return [`Chapter ${Math.ceil(pageNumber / 10)}`, pageText(bookId, pageNumber), `Footnote for page ${pageNumber}`].join("\n");
}
