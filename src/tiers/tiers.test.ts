import { describe, expect, it } from "vitest";
import { captureLogs } from "../__fixtures__/testLogger";
import { TaskBoard } from "../pipeline/taskBoard";
import type { PageTask } from "../pipeline/pageTask";
import { AsyncIoTier } from "./asyncIoTier";
import { SequentialTier } from "./sequentialTier";
import { ThreadPoolTier } from "./threadPoolTier";
import type { TierContext } from "./types";

function trackingContext(controller: AbortController, onPage: (pageNumber: number) => void = () => undefined) {
  const order: number[] = [];
  let active = 0;
  let peak = 0;

  const context: TierContext = {
    signal: controller.signal,
    logger: captureLogs().logger,
    runPage: async (task: PageTask) => {
      active += 1;
      peak = Math.max(peak, active);
      order.push(task.pageNumber);
      onPage(task.pageNumber);
      await new Promise((resolve) => setImmediate(resolve));
      task.settleRemote({ status: "parsed", attemptCount: 1 });
      active -= 1;
    },
  };
  return { context, order, peak: () => peak };
}

describe("SequentialTier", () => {
  it("runs one page at a time in page order", async () => {
    const board = new TaskBoard([3, 1, 2, 4], 3);
    const tracking = trackingContext(new AbortController());

    await new SequentialTier().run(board.all(), tracking.context);

    expect(tracking.order).toEqual([1, 2, 3, 4]);
    expect(tracking.peak()).toBe(1);
  });

  it("starts nothing after the signal aborts", async () => {
    const controller = new AbortController();
    const board = new TaskBoard([1, 2, 3, 4], 3);
    const tracking = trackingContext(controller, (pageNumber) => {
      if (pageNumber === 2) {
        controller.abort();
      }
    });

    await new SequentialTier().run(board.all(), tracking.context);

    expect(tracking.order).toEqual([1, 2]);
    expect(board.get(3)?.status).toBe("pending");
  });
});

describe("ThreadPoolTier", () => {
  it("keeps at most workerCount pages in flight and covers every page", async () => {
    const board = new TaskBoard([1, 2, 3, 4, 5, 6, 7], 3);
    const tracking = trackingContext(new AbortController());

    await new ThreadPoolTier(3).run(board.all(), tracking.context);

    expect(tracking.peak()).toBe(3);
    expect([...tracking.order].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(board.all().every((task) => task.status === "parsed")).toBe(true);
  });

  it("lets in-flight pages finish but takes no new one after abort", async () => {
    const controller = new AbortController();
    const board = new TaskBoard([1, 2, 3, 4, 5, 6], 3);
    const tracking = trackingContext(controller, (pageNumber) => {
      if (pageNumber === 2) {
        controller.abort();
      }
    });

    await new ThreadPoolTier(2).run(board.all(), tracking.context);

    expect(tracking.order).toEqual([1, 2]);
    expect(board.get(1)?.status).toBe("parsed");
    expect(board.get(2)?.status).toBe("parsed");
    expect(board.all().filter((task) => task.status === "pending").map((task) => task.pageNumber)).toEqual([3, 4, 5, 6]);
  });
});

describe("AsyncIoTier", () => {
  it("bounds concurrency with its gate", async () => {
    const board = new TaskBoard([1, 2, 3, 4, 5, 6, 7, 8], 3);
    const tracking = trackingContext(new AbortController());

    await new AsyncIoTier(2).run(board.all(), tracking.context);

    expect(tracking.peak()).toBe(2);
    expect(tracking.order).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it("skips queued pages once aborted", async () => {
    const controller = new AbortController();
    const board = new TaskBoard([1, 2, 3, 4, 5], 3);
    const tracking = trackingContext(controller, (pageNumber) => {
      if (pageNumber === 2) {
        controller.abort();
      }
    });

    await new AsyncIoTier(2).run(board.all(), tracking.context);

    expect(tracking.order).toEqual([1, 2]);
    expect(board.tally()).toEqual({ succeeded: [], failed: [], incomplete: [1, 2, 3, 4, 5] });
  });
});
