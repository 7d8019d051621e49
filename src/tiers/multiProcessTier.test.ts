import { describe, expect, it } from "vitest";
import { FakeBookSite } from "../__fixtures__/fakeBookSite";
import { noSleep } from "../__fixtures__/fakeClock";
import { InProcessShardLauncher } from "../__fixtures__/inProcessShardLauncher";
import { captureLogs } from "../__fixtures__/testLogger";
import { createConfig } from "../config";
import { MetricsRegistry } from "../observability";
import type { PageTask } from "../pipeline/pageTask";
import { TaskBoard } from "../pipeline/taskBoard";
import { MultiProcessTier } from "./multiProcessTier";
import type { RemotePageOutcome } from "./shardMessages";
import type { Shard } from "./types";

const BASE_URL = "https://reader.test";
const SHARDS: Shard[] = [
  { shardId: 0, firstPage: 1, lastPage: 3 },
  { shardId: 1, firstPage: 4, lastPage: 6 },
];

function setup(options: { crashAfter?: Map<number, number>; maxShardRestarts?: number } = {}) {
  const site = new FakeBookSite({ bookId: "42", totalPages: 6 });
  const launcher = new InProcessShardLauncher({ fetchFn: site.fetch, sleep: noSleep, crashAfter: options.crashAfter });
  const metrics = new MetricsRegistry();
  const logs = captureLogs();
  const outcomes: Array<[number, RemotePageOutcome["kind"]]> = [];
  const board = new TaskBoard([1, 2, 3, 4, 5, 6], 3);
  const controller = new AbortController();
  let onOutcome: (task: PageTask) => void = () => undefined;

  const tier = new MultiProcessTier({
    shards: SHARDS,
    launcher,
    book: { id: "42", totalPages: 6, sourceBaseUrl: BASE_URL },
    config: createConfig({
      sourceBaseUrl: BASE_URL,
      requestsPerSecond: 0,
      workerCount: 1,
      maxShardRestarts: options.maxShardRestarts ?? 1,
      shardStopTimeoutMs: 50,
    }),
    runId: "run-test",
    metrics,
    onRemoteOutcome: async (task, outcome) => {
      outcomes.push([task.pageNumber, outcome.kind]);
      onOutcome(task);
    },
  });

  const run = () => tier.run(board.all(), { signal: controller.signal, logger: logs.logger, runPage: async () => undefined });
  return {
    site,
    launcher,
    metrics,
    logs,
    outcomes,
    board,
    controller,
    run,
    setOnOutcome: (listener: (task: PageTask) => void) => {
      onOutcome = listener;
    },
  };
}

describe("MultiProcessTier", () => {
  it("settles every page through one worker per shard", async () => {
    const { run, launcher, board, outcomes } = setup();

    await run();

    expect(launcher.launches).toEqual([0, 1]);
    expect(board.all().every((task) => task.status === "parsed")).toBe(true);
    expect(outcomes.map(([pageNumber]) => pageNumber).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("relaunches a crashed shard with only its unsettled pages", async () => {
    const { run, launcher, board, outcomes, metrics, site, logs } = setup({ crashAfter: new Map([[1, 1]]) });

    await run();

    expect(launcher.launches).toEqual([0, 1, 1]);
    expect(metrics.getCounter("shard_crashes")).toBe(1);
    expect(board.all().every((task) => task.status === "parsed")).toBe(true);
    expect(outcomes.map(([pageNumber]) => pageNumber).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(site.requestsFor(1)).toBe(1);
    expect(site.requestsFor(4)).toBe(1);
    expect(logs.messages()).toContain("shard_requeued");
  });

  it("abandons a shard that keeps crashing and leaves its pages pending", async () => {
    const { run, launcher, board, logs } = setup({ crashAfter: new Map([[1, 0]]), maxShardRestarts: 0 });

    await run();

    expect(launcher.launches).toEqual([0, 1]);
    expect(board.tally().incomplete).toEqual([1, 2, 3, 4, 5, 6]);
    expect(board.all().filter((task) => task.status === "pending").map((task) => task.pageNumber)).toEqual([4, 5, 6]);
    expect(logs.messages()).toContain("shard_abandoned");
  });

  it("asks running workers to stop when the run is aborted", async () => {
    const { run, launcher, board, controller, setOnOutcome } = setup();
    setOnOutcome((task) => {
      if (task.pageNumber === 1) {
        controller.abort();
      }
    });

    await run();

    expect(launcher.stopsSent).toContain(0);
    expect(launcher.launches).toEqual([0, 1]);
    expect(board.get(1)?.status).toBe("parsed");
    expect(board.all().every((task) => task.status === "parsed" || task.status === "pending")).toBe(true);
  });

  it("launches nothing when the signal is already aborted", async () => {
    const { run, launcher, controller } = setup();
    controller.abort();

    await run();

    expect(launcher.launches).toEqual([]);
  });
});
