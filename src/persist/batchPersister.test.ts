import { describe, expect, it } from "vitest";
import { FakeClock } from "../__fixtures__/fakeClock";
import { FlakyStore } from "../__fixtures__/flakyStore";
import { captureLogs } from "../__fixtures__/testLogger";
import { PersistenceError } from "../core/errors";
import { MetricsRegistry } from "../observability";
import { InMemoryStore, type CommitResult, type PageStore } from "../store";
import { createExtractedPage, type ExtractedPage } from "../types";
import { BatchPersister, type BatchCommit } from "./batchPersister";
import { ResumeManager } from "./resumeManager";

function page(pageNumber: number): ExtractedPage {
  return createExtractedPage(pageNumber, `text ${pageNumber}`, {
    parser: "cheerio",
    contentSelector: "div.nass",
    wordCount: 2,
    charCount: `text ${pageNumber}`.length,
    headings: [],
  });
}

async function setup(store: PageStore, batchSize: number, maxAttempts = 3) {
  const logs = captureLogs();
  const clock = new FakeClock();
  const metrics = new MetricsRegistry();
  const resume = new ResumeManager({ bookId: "42", store, logger: logs.logger });
  await resume.load();
  const persister = new BatchPersister({
    bookId: "42",
    store,
    resume,
    batchSize,
    maxAttempts,
    retryDelayMs: 100,
    logger: logs.logger,
    metrics,
    sleep: clock.sleep,
  });
  const commits: BatchCommit[] = [];
  persister.onCommitted((commit) => commits.push(commit));
  return { persister, resume, clock, metrics, logs, commits };
}

class GatedStore extends InMemoryStore {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }

  async commit(): Promise<CommitResult> {
    await this.gate;
    return super.commit();
  }
}

describe("BatchPersister", () => {
  it("commits full batches and the remainder on flush", async () => {
    const store = new InMemoryStore();
    const { persister, resume, commits, metrics } = await setup(store, 4);

    for (let pageNumber = 1; pageNumber <= 10; pageNumber += 1) {
      await persister.add(page(pageNumber));
    }
    await persister.flush();

    expect(persister.flushSizes).toEqual([4, 4, 2]);
    expect(store.commits).toEqual([
      [1, 2, 3, 4],
      [5, 6, 7, 8],
      [9, 10],
    ]);
    expect(resume.current).toBe(10);
    expect(store.checkpointHistory).toEqual([4, 8, 10]);
    expect(commits.map((commit) => commit.checkpoint)).toEqual([4, 8, 10]);
    expect(metrics.getCounter("pages_persisted")).toBe(10);
    expect(metrics.getCounter("batches_committed")).toBe(3);
  });

  it("writes each batch in page order whatever the arrival order", async () => {
    const store = new InMemoryStore();
    const { persister, resume } = await setup(store, 3);

    for (const pageNumber of [3, 1, 2, 6, 5, 4]) {
      await persister.add(page(pageNumber));
    }

    expect(store.commits).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(resume.current).toBe(6);
  });

  it("holds the checkpoint at a gap until it closes", async () => {
    const store = new InMemoryStore();
    const { persister, commits } = await setup(store, 2);

    await persister.add(page(1));
    await persister.add(page(3));
    await persister.add(page(4));
    await persister.add(page(2));

    expect(store.commits).toEqual([
      [1, 3],
      [2, 4],
    ]);
    expect(commits.map((commit) => commit.checkpoint)).toEqual([1, 4]);
  });

  it("does nothing on flush with an empty buffer", async () => {
    const store = new InMemoryStore();
    const { persister } = await setup(store, 4);

    await persister.flush();

    expect(store.commits).toEqual([]);
    expect(persister.flushSizes).toEqual([]);
  });

  it("retries a failed commit after rolling it back", async () => {
    const store = new FlakyStore(2);
    const { persister, clock, metrics, logs } = await setup(store, 2);

    await persister.add(page(1));
    await persister.add(page(2));

    expect(store.commitAttempts).toBe(3);
    expect(store.rollbacks).toBe(2);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(persister.flushSizes).toEqual([2]);
    expect(metrics.getCounter("batch_commit_failures")).toBe(2);
    expect(logs.messages().filter((msg) => msg === "batch_commit_failed")).toHaveLength(2);
  });

  it("fails for good after the last attempt and keeps rejecting", async () => {
    const store = new FlakyStore(5);
    const { persister, resume, clock } = await setup(store, 2);

    await persister.add(page(1));
    const failure = persister.add(page(2));

    await expect(failure).rejects.toThrow("batch of 2 pages for book 42 failed after 3 attempts: disk full");
    const error = persister.failed;
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error?.pageNumbers).toEqual([1, 2]);
    await expect(persister.add(page(3))).rejects.toBe(error);
    await expect(persister.flush()).rejects.toBe(error);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(store.commitAttempts).toBe(3);
    expect(resume.current).toBe(0);
  });

  it("keeps retrying when the rollback of a failed commit throws", async () => {
    const store = new FlakyStore(1);
    store.failRollbacks = true;
    const { persister, clock, logs } = await setup(store, 2);

    await persister.add(page(1));
    await persister.add(page(2));

    expect(store.commitAttempts).toBe(2);
    expect(store.rollbacks).toBe(1);
    expect(clock.sleeps).toEqual([100]);
    expect(persister.flushSizes).toEqual([2]);
    expect(persister.failed).toBeUndefined();
    expect(logs.entries().find((entry) => entry.msg === "batch_commit_failed")?.error).toBe(
      "disk full; rollback failed: rollback lost its connection",
    );
  });

  it("reports a throwing rollback in the final persistence error", async () => {
    const store = new FlakyStore(5);
    store.failRollbacks = true;
    const { persister } = await setup(store, 2);

    await persister.add(page(1));

    await expect(persister.add(page(2))).rejects.toThrow(
      "batch of 2 pages for book 42 failed after 3 attempts: disk full; rollback failed: rollback lost its connection",
    );
    expect(persister.failed).toBeInstanceOf(PersistenceError);
    expect(store.rollbacks).toBe(3);
  });

  it("treats a failed checkpoint write as fatal", async () => {
    const store = new FlakyStore();
    store.failCheckpoints = true;
    const { persister } = await setup(store, 1);

    await expect(persister.add(page(1))).rejects.toThrow(
      "checkpoint write for book 42 failed: checkpoint volume is read-only",
    );
    expect(persister.failed).toBeInstanceOf(PersistenceError);
  });

  it("makes later callers wait while a commit is in progress", async () => {
    const store = new GatedStore();
    const { persister } = await setup(store, 2);
    const settled: number[] = [];

    const adds = [1, 2, 3].map((pageNumber) => persister.add(page(pageNumber)).then(() => settled.push(pageNumber)));
    await new Promise((resolve) => setImmediate(resolve));

    expect(settled).toEqual([1]);
    expect(persister.bufferedPageNumbers).toEqual([1, 2]);

    store.open();
    await Promise.all(adds);

    expect(settled).toEqual([1, 2, 3]);
    expect(store.commits).toEqual([[1, 2]]);
    expect(persister.bufferedPageNumbers).toEqual([3]);
  });
});
