import { describe, expect, it } from "vitest";
import { MetricsRegistry } from "./metrics";

describe("MetricsRegistry", () => {
  it("summarises timer samples with nearest-rank percentiles", () => {
    let now = 0;
    const metrics = new MetricsRegistry(() => now);
    for (const duration of [40, 10, 30, 20]) {
      const stop = metrics.startTimer("page_fetch_ms");
      now += duration;
      expect(stop()).toBe(duration);
    }

    expect(metrics.summarizeTimer("page_fetch_ms")).toEqual({ count: 4, totalMs: 100, p50: 20, p95: 40, max: 40 });
    expect(metrics.summarizeTimer("batch_commit_ms")).toBeUndefined();
  });

  it("leaves untouched metrics out of the snapshot", () => {
    const metrics = new MetricsRegistry(() => 0);
    metrics.incrementCounter("pages_parsed");
    metrics.incrementCounter("pages_persisted", 4);
    metrics.startTimer("page_parse_ms")();

    expect(metrics.snapshot()).toEqual({
      counters: { pages_parsed: 1, pages_persisted: 4 },
      timers: { page_parse_ms: { count: 1, totalMs: 0, p50: 0, p95: 0, max: 0 } },
    });
  });

  it("prints one metrics_summary line", () => {
    const lines: string[] = [];
    const metrics = new MetricsRegistry();
    metrics.incrementCounter("shard_crashes");

    metrics.printSummary((line) => lines.push(line));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ level: "info", msg: "metrics_summary", counters: { shard_crashes: 1 } });
  });
});
