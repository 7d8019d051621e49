import { COUNTER_NAMES, TIMER_NAMES, type MetricCounterName, type MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  totalMs: number;
  p50: number;
  p95: number;
  max: number;
}

export interface MetricsSnapshot {
  counters: Partial<Record<MetricCounterName, number>>;
  timers: Partial<Record<MetricTimerName, TimerSummary>>;
}

// Nearest-rank percentile over an ascending list.
function percentile(sorted: readonly number[], fraction: number): number {
  const rank = Math.max(1, Math.ceil(fraction * sorted.length));
  return sorted[rank - 1];
}

/** Process-local counters and timers. Shard workers keep their own; only the parent's are printed. */
export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.getCounter(name) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = this.now();
    return () => {
      const durationMs = this.now() - startedAt;
      const samples = this.timers.get(name);
      if (samples) {
        samples.push(durationMs);
      } else {
        this.timers.set(name, [durationMs]);
      }
      return durationMs;
    };
  }

  summarizeTimer(name: MetricTimerName): TimerSummary | undefined {
    const samples = this.timers.get(name);
    if (!samples || samples.length === 0) {
      return undefined;
    }
    const sorted = [...samples].sort((a, b) => a - b);
    return {
      count: sorted.length,
      totalMs: sorted.reduce((sum, value) => sum + value, 0),
      p50: percentile(sorted, 0.5),
      p95: percentile(sorted, 0.95),
      max: sorted[sorted.length - 1],
    };
  }

  /** Counters that were never touched and timers with no samples are left out. */
  snapshot(): MetricsSnapshot {
    const snapshot: MetricsSnapshot = { counters: {}, timers: {} };
    for (const name of COUNTER_NAMES) {
      const value = this.counters.get(name);
      if (value !== undefined) {
        snapshot.counters[name] = value;
      }
    }
    for (const name of TIMER_NAMES) {
      const summary = this.summarizeTimer(name);
      if (summary) {
        snapshot.timers[name] = summary;
      }
    }
    return snapshot;
  }

  printSummary(write: (line: string) => void = (line) => console.log(line)): void {
    write(JSON.stringify({ ts: new Date().toISOString(), level: "info", msg: "metrics_summary", ...this.snapshot() }));
  }
}
