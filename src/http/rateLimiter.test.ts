import { describe, expect, it } from "vitest";
import { FakeClock } from "../__fixtures__/fakeClock";
import { CancelledError } from "../core/errors";
import { RateLimiter } from "./rateLimiter";

describe("RateLimiter", () => {
  it("spaces simultaneous callers by 1 / requestsPerSecond in call order", async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter({ requestsPerSecond: 10, burst: 1, now: clock.now, sleep: clock.sleep });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    // The first caller takes the initial token and does not sleep.
    expect(clock.sleeps).toEqual([100, 200, 300]);
  });

  it("never releases more than requestsPerSecond in any one-second window", async () => {
    const clock = new FakeClock(0, true);
    const limiter = new RateLimiter({ requestsPerSecond: 5, burst: 1, now: clock.now, sleep: clock.sleep });
    const releases: number[] = [];

    for (let i = 0; i < 20; i += 1) {
      await limiter.acquire();
      releases.push(clock.nowMs);
    }

    expect(releases.slice(0, 6)).toEqual([0, 200, 400, 600, 800, 1000]);
    for (const start of releases) {
      const inWindow = releases.filter((time) => time >= start && time < start + 1000).length;
      expect(inWindow).toBeLessThanOrEqual(5);
    }
  });

  it("lets a burst through immediately after idle time", async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter({ requestsPerSecond: 2, burst: 3, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();
    expect(clock.sleeps).toEqual([]);

    await limiter.acquire();
    expect(clock.sleeps).toEqual([500]);
  });

  it("holds every caller until a cooldown has passed", async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter({ requestsPerSecond: 10, burst: 1, now: clock.now, sleep: clock.sleep });

    await limiter.acquire();
    limiter.cooldown(2000);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([2100]);
  });

  it("does not limit when the rate is zero, but still honours cooldowns", async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter({ requestsPerSecond: 0, now: clock.now, sleep: clock.sleep });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);
    expect(limiter.enabled).toBe(false);
    expect(clock.sleeps).toEqual([]);

    limiter.cooldown(750);
    clock.advance(250);
    await limiter.acquire();
    expect(clock.sleeps).toEqual([500]);
  });

  it("rejects an already aborted acquisition without taking a token", async () => {
    const clock = new FakeClock(0);
    const limiter = new RateLimiter({ requestsPerSecond: 10, burst: 1, now: clock.now, sleep: clock.sleep });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    await limiter.acquire();
    expect(clock.sleeps).toEqual([]);
  });

  it("refunds the token when the wait is cancelled", async () => {
    const clock = new FakeClock(0);
    const controller = new AbortController();
    const limiter = new RateLimiter({
      requestsPerSecond: 10,
      burst: 1,
      now: clock.now,
      sleep: async (ms, signal) => {
        clock.sleeps.push(ms);
        if (signal) {
          throw new CancelledError();
        }
      },
    });

    await limiter.acquire();
    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancelledError);
    await limiter.acquire();

    // The cancelled caller's debt was returned, so the third caller waits one interval, not two.
    expect(clock.sleeps).toEqual([100, 100]);
  });
});
