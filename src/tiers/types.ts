import type { Logger } from "../observability";
import type { PageTask } from "../pipeline/pageTask";
import type { StrategyKind } from "../types";

export interface Shard {
  shardId: number;
  firstPage: number;
  lastPage: number;
}

export type Strategy =
  | { kind: "sequential"; workerCount: 1 }
  | { kind: "thread_pool"; workerCount: number }
  | { kind: "async_io"; concurrency: number }
  | { kind: "multi_process"; processCount: number; shards: Shard[] };

export interface TierContext {
  signal: AbortSignal;
  logger: Logger;
  /** Fetches, parses and hands one task to the persister. A rejection ends the tier run. */
  runPage(task: PageTask): Promise<void>;
}

/** Drives every task it is given to parsed or failed, or leaves it pending once the signal aborts. */
export interface TierDriver {
  readonly kind: StrategyKind;
  run(tasks: readonly PageTask[], context: TierContext): Promise<void>;
}
