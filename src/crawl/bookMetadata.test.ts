import { describe, expect, it } from "vitest";
import { bookCardHtml, FakeBookSite, volumeMenuHtml, type FakeBookSiteOptions } from "../__fixtures__/fakeBookSite";
import { FakeClock } from "../__fixtures__/fakeClock";
import { captureLogs } from "../__fixtures__/testLogger";
import { BookResolutionError } from "../core/errors";
import { HttpSession, RateLimiter } from "../http";
import { collectBookMetadata } from "./bookMetadata";

const BASE_URL = "https://reader.test";

function setup(siteOptions: Partial<FakeBookSiteOptions> = {}) {
  const site = new FakeBookSite({ bookId: "42", totalPages: 6, cardHtml: bookCardHtml("42"), ...siteOptions });
  const clock = new FakeClock();
  const logs = captureLogs();
  const options = {
    book: { id: "42", totalPages: 6, sourceBaseUrl: BASE_URL },
    session: new HttpSession({
      userAgent: "test-agent/1.0",
      requestTimeoutMs: 1000,
      maxConnections: 1,
      ignoreHttpsErrors: false,
      fetchFn: site.fetch,
    }),
    limiter: new RateLimiter({ requestsPerSecond: 0 }),
    policy: { maxAttempts: 3, baseBackoffMs: 100, maxBackoffMs: 1000, rateLimitCooldownMs: 0 },
    logger: logs.logger,
    sleep: clock.sleep,
    now: () => new Date("2026-03-01T00:00:00.000Z"),
  };
  return { site, clock, logs, options };
}

describe("collectBookMetadata", () => {
  it("combines the card, the volume menu and the printed page count", async () => {
    const { site, clock, options } = setup({ cardFailures: [503], readerExtras: volumeMenuHtml("42", [1, 4]) });

    const metadata = await collectBookMetadata(options);

    expect(site.requests).toEqual([
      `${BASE_URL}/book/42`,
      `${BASE_URL}/book/42`,
      `${BASE_URL}/book/42/1`,
      `${BASE_URL}/book/42/6`,
    ]);
    expect(clock.sleeps).toEqual([100]);
    expect(metadata).toMatchObject({
      bookId: "42",
      title: "كتاب الاختبار",
      authors: ["مؤلف الاختبار"],
      editionNumber: 2,
      volumeCount: 2,
      pageCountInternal: 6,
      pageCountPrinted: 6,
      sourceUrl: `${BASE_URL}/book/42`,
      fetchedAt: "2026-03-01T00:00:00.000Z",
    });
    expect(metadata.volumes).toEqual([
      { number: 1, title: "الجزء 1", pageStart: 1, pageEnd: 3 },
      { number: 2, title: "الجزء 2", pageStart: 4, pageEnd: 6 },
    ]);
    expect(metadata.chapters.map((chapter) => [chapter.title, chapter.volumeNumber])).toEqual([
      ["المقدمة", 1],
      ["الباب الأول", 1],
      ["الباب الثاني", 2],
    ]);
    expect(metadata.chapters[1].children.map((chapter) => chapter.volumeNumber)).toEqual([1, 1]);
  });

  it("treats a book without a volume menu as one volume and tolerates a missing last page", async () => {
    const { logs, options } = setup({ missing: [6] });

    const metadata = await collectBookMetadata(options);

    expect(metadata.volumes).toEqual([{ number: 1, title: "الجزء 1", pageStart: 1, pageEnd: 6 }]);
    expect(metadata.volumeCount).toBe(2);
    expect(metadata.pageCountPrinted).toBeUndefined();
    expect(logs.messages()).toContain("book_printed_count_unavailable");
  });

  it("rejects when the card cannot be read", async () => {
    const { site, options } = setup({ cardHtml: undefined });

    await expect(collectBookMetadata(options)).rejects.toThrow(
      new BookResolutionError(`could not read the card of book 42: HTTP 404 while fetching ${BASE_URL}/book/42`),
    );
    expect(site.requests).toEqual([`${BASE_URL}/book/42`]);
  });
});
