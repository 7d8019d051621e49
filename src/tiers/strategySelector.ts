import type { ExtractorConfig } from "../config";
import type { Shard, Strategy } from "./types";

export type SelectorSettings = Pick<
  ExtractorConfig,
  | "threadThreshold"
  | "asyncThreshold"
  | "multiprocessThreshold"
  | "forceSequential"
  | "workerCount"
  | "asyncConcurrency"
  | "processCount"
  | "minShardSize"
>;

const MAX_DEFAULT_PROCESSES = 8;

/**
 * Splits `[firstPage, lastPage]` into contiguous shards whose sizes differ by
 * at most one. Never more shards than `units`, and never so many that a shard
 * falls below `minShardSize` (but always at least one).
 */
export function planShards(firstPage: number, lastPage: number, units: number, minShardSize: number): Shard[] {
  const count = lastPage - firstPage + 1;
  if (count <= 0) {
    return [];
  }

  const shardCount = Math.max(1, Math.min(units, Math.floor(count / Math.max(1, minShardSize))));
  const baseSize = Math.floor(count / shardCount);
  const remainder = count % shardCount;
  const shards: Shard[] = [];

  let start = firstPage;
  for (let shardId = 0; shardId < shardCount; shardId += 1) {
    const size = baseSize + (shardId < remainder ? 1 : 0);
    shards.push({ shardId, firstPage: start, lastPage: start + size - 1 });
    start += size;
  }
  return shards;
}

export function selectStrategy(totalPages: number, settings: SelectorSettings, availableParallelism: number): Strategy {
  if (settings.forceSequential || totalPages < settings.threadThreshold) {
    return { kind: "sequential", workerCount: 1 };
  }
  if (totalPages < settings.asyncThreshold) {
    return { kind: "thread_pool", workerCount: settings.workerCount };
  }
  if (totalPages < settings.multiprocessThreshold) {
    return { kind: "async_io", concurrency: settings.asyncConcurrency };
  }

  const processCount = settings.processCount ?? Math.max(1, Math.min(availableParallelism, MAX_DEFAULT_PROCESSES));
  return {
    kind: "multi_process",
    processCount,
    shards: planShards(1, totalPages, processCount, settings.minShardSize),
  };
}

export function describeStrategy(strategy: Strategy): string {
  switch (strategy.kind) {
    case "sequential":
      return "sequential";
    case "thread_pool":
      return `thread_pool (${strategy.workerCount} workers)`;
    case "async_io":
      return `async_io (${strategy.concurrency} in flight)`;
    case "multi_process":
      return `multi_process (${strategy.shards.length} shards over ${strategy.processCount} processes)`;
  }
}
