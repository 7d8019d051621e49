import { AsyncIoTier } from "./asyncIoTier";
import { MultiProcessTier, type MultiProcessTierOptions } from "./multiProcessTier";
import { SequentialTier } from "./sequentialTier";
import { ThreadPoolTier } from "./threadPoolTier";
import type { Strategy, TierDriver } from "./types";

export type MultiProcessDeps = Omit<MultiProcessTierOptions, "shards">;

export function createTierDriver(strategy: Strategy, multiProcess: () => MultiProcessDeps): TierDriver {
  switch (strategy.kind) {
    case "sequential":
      return new SequentialTier();
    case "thread_pool":
      return new ThreadPoolTier(strategy.workerCount);
    case "async_io":
      return new AsyncIoTier(strategy.concurrency);
    case "multi_process":
      return new MultiProcessTier({ ...multiProcess(), shards: strategy.shards });
  }
}

export * from "./asyncIoTier";
export * from "./multiProcessTier";
export * from "./sequentialTier";
export * from "./shardLauncher";
export * from "./shardMessages";
export * from "./shardWorker";
export * from "./strategySelector";
export * from "./threadPoolTier";
export * from "./types";
