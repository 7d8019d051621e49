import { CancelledError } from "../core/errors";
import type { SleepFn } from "../core/sleep";

/**
 * Manual clock. `sleep` records each requested delay and resolves on the next
 * microtask; with `advanceOnSleep` it also moves the clock forward by the delay.
 */
export class FakeClock {
  nowMs: number;
  readonly sleeps: number[] = [];
  private readonly advanceOnSleep: boolean;

  constructor(startMs = 0, advanceOnSleep = false) {
    this.nowMs = startMs;
    this.advanceOnSleep = advanceOnSleep;
  }

  readonly now = (): number => this.nowMs;

  readonly sleep: SleepFn = async (ms, signal) => {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    this.sleeps.push(ms);
    if (this.advanceOnSleep) {
      this.nowMs += ms;
    }
  };

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

export const noSleep: SleepFn = async (_ms, signal) => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
};
