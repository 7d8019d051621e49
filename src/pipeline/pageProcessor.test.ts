import { describe, expect, it } from "vitest";
import { expectedText, FakeBookSite, type FakeBookSiteOptions } from "../__fixtures__/fakeBookSite";
import { FakeClock } from "../__fixtures__/fakeClock";
import { captureLogs } from "../__fixtures__/testLogger";
import { CancelledError } from "../core/errors";
import type { SleepFn } from "../core/sleep";
import { HttpSession, RateLimiter } from "../http";
import { MetricsRegistry } from "../observability";
import { FallbackHtmlExtractor } from "../parse";
import { ConnectivityMonitor } from "./connectivityMonitor";
import { PageProcessor } from "./pageProcessor";
import { PageTask } from "./pageTask";

const BASE_URL = "https://reader.test";

function setup(siteOptions: Partial<FakeBookSiteOptions> = {}, sleep?: SleepFn) {
  const site = new FakeBookSite({ bookId: "42", totalPages: 10, ...siteOptions });
  const clock = new FakeClock();
  const metrics = new MetricsRegistry();
  const logs = captureLogs();
  const monitor = new ConnectivityMonitor(5, () => undefined);
  const processor = new PageProcessor({
    book: { id: "42", totalPages: 10, sourceBaseUrl: BASE_URL },
    session: new HttpSession({
      userAgent: "test-agent/1.0",
      requestTimeoutMs: 1000,
      maxConnections: 1,
      ignoreHttpsErrors: false,
      fetchFn: site.fetch,
    }),
    limiter: new RateLimiter({ requestsPerSecond: 0, now: clock.now, sleep: clock.sleep }),
    extractor: new FallbackHtmlExtractor({ useFastParser: true }),
    settings: { maxAttempts: 3, baseBackoffMs: 500, maxBackoffMs: 10_000, rateLimitCooldownMs: 5_000 },
    logger: logs.logger,
    metrics,
    monitor,
    sleep: sleep ?? clock.sleep,
  });
  return { site, clock, metrics, logs, monitor, processor };
}

describe("PageProcessor", () => {
  it("parses a page on the first attempt", async () => {
    const { processor, metrics } = setup();
    const task = new PageTask(1, 3);

    const result = await processor.process(task, new AbortController().signal);

    expect(result.kind).toBe("parsed");
    expect(result.kind === "parsed" && result.page.text).toBe(expectedText("42", 1));
    expect(task.status).toBe("parsed");
    expect(task.attemptCount).toBe(1);
    expect(metrics.getCounter("pages_fetched")).toBe(1);
    expect(metrics.getCounter("pages_parsed")).toBe(1);
  });

  it("retries transient failures with backoff and records every attempt", async () => {
    const { processor, clock, site, metrics } = setup({ failures: { 5: [503, "network"] } });
    const task = new PageTask(5, 3);

    const result = await processor.process(task, new AbortController().signal);

    expect(result.kind === "parsed" && result.page.text).toBe(expectedText("42", 5));
    expect(task.attemptCount).toBe(3);
    expect(task.lastError).toBe(`request failed for ${BASE_URL}/book/42/5: socket hang up`);
    expect(site.requestsFor(5)).toBe(3);
    expect(clock.sleeps).toEqual([500, 1000]);
    expect(metrics.getCounter("fetch_retries")).toBe(2);
  });

  it("fails a 404 page as missing without retrying", async () => {
    const { processor, site, logs } = setup({ missing: [7] });
    const task = new PageTask(7, 3);

    const result = await processor.process(task, new AbortController().signal);

    expect(result.kind === "failed" && result.failure).toBe("missing");
    expect(task.status).toBe("failed");
    expect(task.attemptCount).toBe(1);
    expect(site.requestsFor(7)).toBe(1);
    expect(logs.messages()).toContain("page_missing");
  });

  it("gives up after maxAttempts and reports whether the cause was transport", async () => {
    const statuses = setup({ failures: { 3: [503, 503, 503] } });
    const httpTask = new PageTask(3, 3);
    const httpResult = await statuses.processor.process(httpTask, new AbortController().signal);

    expect(httpResult).toMatchObject({ kind: "failed", failure: "exhausted", transport: false });
    expect(httpTask.attemptCount).toBe(3);
    expect(statuses.clock.sleeps).toEqual([500, 1000]);
    expect(statuses.monitor.consecutiveFailures).toBe(0);

    const network = setup({ failures: { 3: ["network", "network", "network"] } });
    const networkResult = await network.processor.process(new PageTask(3, 3), new AbortController().signal);

    expect(networkResult).toMatchObject({ kind: "failed", failure: "exhausted", transport: true });
    expect(network.monitor.consecutiveFailures).toBe(1);
  });

  it("cools the limiter down after a 429", async () => {
    const { processor, clock, metrics } = setup({ failures: { 4: [429] }, retryAfterSeconds: 2 });
    const task = new PageTask(4, 3);

    const result = await processor.process(task, new AbortController().signal);

    expect(result.kind).toBe("parsed");
    expect(task.attemptCount).toBe(2);
    // Backoff plus cooldown for the retry, then the limiter holds the next request for the cooldown.
    expect(clock.sleeps).toEqual([5500, 5000]);
    expect(metrics.getCounter("rate_limited")).toBe(1);
  });

  it("fails an unparseable page as a parse error", async () => {
    const { processor } = setup({ empty: [6] });
    const task = new PageTask(6, 3);

    const result = await processor.process(task, new AbortController().signal);

    expect(result.kind === "failed" && result.failure).toBe("parse_error");
    expect(task.failure).toBe("parse_error");
    expect(task.attemptCount).toBe(1);
  });

  it("leaves the task pending when cancelled before the fetch", async () => {
    const { processor, site } = setup();
    const controller = new AbortController();
    controller.abort();
    const task = new PageTask(2, 3);

    const result = await processor.process(task, controller.signal);

    expect(result).toEqual({ kind: "abandoned" });
    expect(task.status).toBe("pending");
    expect(task.attemptCount).toBe(0);
    expect(site.requests).toEqual([]);
  });

  it("leaves the task pending when cancelled during a retry wait", async () => {
    const controller = new AbortController();
    const { processor } = setup({ failures: { 2: [503] } }, async () => {
      controller.abort();
      throw new CancelledError();
    });
    const task = new PageTask(2, 3);

    const result = await processor.process(task, controller.signal);

    expect(result).toEqual({ kind: "abandoned" });
    expect(task.status).toBe("pending");
    expect(task.attemptCount).toBe(1);
  });
});
