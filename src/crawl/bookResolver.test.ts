import { describe, expect, it } from "vitest";
import { FakeBookSite, pageHtml } from "../__fixtures__/fakeBookSite";
import { FakeClock } from "../__fixtures__/fakeClock";
import { captureLogs } from "../__fixtures__/testLogger";
import { BookResolutionError, CancelledError, PermanentHttpError } from "../core/errors";
import { HttpSession, RateLimiter } from "../http";
import { findLastPageNumber, resolveBook } from ".";

const BASE_URL = "https://reader.test";

function deps(site: FakeBookSite, clock = new FakeClock()) {
  return {
    sourceBaseUrl: BASE_URL,
    session: new HttpSession({
      userAgent: "test-agent/1.0",
      requestTimeoutMs: 1000,
      maxConnections: 1,
      ignoreHttpsErrors: false,
      fetchFn: site.fetch,
    }),
    limiter: new RateLimiter({ requestsPerSecond: 0 }),
    policy: { maxAttempts: 3, baseBackoffMs: 100, maxBackoffMs: 1000, rateLimitCooldownMs: 0 },
    logger: captureLogs().logger,
    sleep: clock.sleep,
  };
}

describe("findLastPageNumber", () => {
  it("trusts the last-page control over other links", () => {
    expect(findLastPageNumber(pageHtml("42", 1, 250), "42")).toBe(250);
  });

  it("falls back to the highest page link", () => {
    const html = `<div><a href="/book/42/3">3</a><a href="/book/42/17#top">17</a><a href="/book/420/99">x</a></div>`;
    expect(findLastPageNumber(html, "42")).toBe(17);
  });

  it("recognises a last-page control whose text carries an arrow beside the word", () => {
    const html = `<ul class="pagination">
      <li><a href="/book/42/2">2</a></li>
      <li><a href="/book/42/120"> التالي » </a></li>
    </ul>
    <p><a href="/book/42/500">see the appendix</a></p>`;
    expect(findLastPageNumber(html, "42")).toBe(120);
  });

  it("returns undefined without page links", () => {
    expect(findLastPageNumber("<p>no pager</p>", "42")).toBeUndefined();
  });
});

describe("resolveBook", () => {
  it("uses the given page count without a request", async () => {
    const site = new FakeBookSite({ bookId: "42", totalPages: 9 });

    const book = await resolveBook({ ...deps(site), bookId: "BK042", totalPages: 30 });

    expect(book).toEqual({ id: "42", totalPages: 30, sourceBaseUrl: BASE_URL });
    expect(site.requests).toEqual([]);
  });

  it("reads the page count from the first page", async () => {
    const site = new FakeBookSite({ bookId: "42", totalPages: 9 });

    const book = await resolveBook({ ...deps(site), bookId: "42" });

    expect(book.totalPages).toBe(9);
    expect(site.requests).toEqual([`${BASE_URL}/book/42/1`]);
  });

  it("retries a transient failure of the first page with backoff", async () => {
    const site = new FakeBookSite({ bookId: "42", totalPages: 9, failures: { 1: [503, "network"] } });
    const clock = new FakeClock();

    const book = await resolveBook({ ...deps(site, clock), bookId: "42" });

    expect(book.totalPages).toBe(9);
    expect(site.requestsFor(1)).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("gives up after the last attempt", async () => {
    const site = new FakeBookSite({ bookId: "42", totalPages: 9, failures: { 1: [503, 503, 503, 503] } });
    const clock = new FakeClock();

    await expect(resolveBook({ ...deps(site, clock), bookId: "42" })).rejects.toThrow(
      "could not read the page count of book 42 after 3 attempt(s): ",
    );
    expect(site.requestsFor(1)).toBe(3);
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it("rejects a non-positive page count and a missing book without retrying", async () => {
    const site = new FakeBookSite({ bookId: "42", totalPages: 9, missing: [1] });
    const clock = new FakeClock();

    await expect(resolveBook({ ...deps(site, clock), bookId: "42", totalPages: 0 })).rejects.toThrow(
      "totalPages must be a positive integer (got 0)",
    );
    const error = await resolveBook({ ...deps(site, clock), bookId: "42" }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(BookResolutionError);
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(PermanentHttpError);
    expect(site.requestsFor(1)).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("rejects with CancelledError when the run is already cancelled", async () => {
    const site = new FakeBookSite({ bookId: "42", totalPages: 9 });
    const controller = new AbortController();
    controller.abort();

    await expect(resolveBook({ ...deps(site), bookId: "42", signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(site.requests).toEqual([]);
  });
});
