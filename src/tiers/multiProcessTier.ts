import type { ExtractorConfig } from "../config";
import { WorkerCrashError } from "../core/errors";
import type { MetricsRegistry } from "../observability";
import type { PageTask } from "../pipeline/pageTask";
import type { Book } from "../types";
import type { ShardLauncher } from "./shardLauncher";
import type { RemotePageOutcome } from "./shardMessages";
import type { Shard, TierContext, TierDriver } from "./types";

export interface MultiProcessTierOptions {
  shards: Shard[];
  launcher: ShardLauncher;
  book: Book;
  config: Readonly<ExtractorConfig>;
  runId: string;
  metrics: MetricsRegistry;
  /** Called in message order for each page a worker settles, after the task itself has been settled. */
  onRemoteOutcome(task: PageTask, outcome: RemotePageOutcome): Promise<void>;
}

interface LaunchResult {
  completed: boolean;
  exitCode: number | null;
}

/**
 * One worker process per shard. Workers only fetch and parse; every settled
 * page comes back over IPC and goes through the parent's single persister.
 * A worker that exits without `shard.done` has crashed: its shard is launched
 * again with the pages still pending, up to `maxShardRestarts` times.
 */
export class MultiProcessTier implements TierDriver {
  readonly kind = "multi_process";
  private readonly options: MultiProcessTierOptions;

  constructor(options: MultiProcessTierOptions) {
    this.options = options;
  }

  async run(tasks: readonly PageTask[], context: TierContext): Promise<void> {
    const byPage = new Map(tasks.map((task) => [task.pageNumber, task]));
    const jobs = this.options.shards
      .map((shard) => ({
        shard,
        pages: tasks
          .filter((task) => task.pageNumber >= shard.firstPage && task.pageNumber <= shard.lastPage)
          .map((task) => task.pageNumber),
      }))
      .filter((job) => job.pages.length > 0);

    context.logger.info("multi_process_start", {
      shards: jobs.length,
      pages: tasks.length,
      workersPerShard: this.options.config.workerCount,
    });
    await Promise.all(jobs.map((job) => this.runShard(job.shard, job.pages, byPage, context)));
  }

  private async runShard(
    shard: Shard,
    pages: number[],
    byPage: Map<number, PageTask>,
    context: TierContext,
  ): Promise<void> {
    const { config, metrics } = this.options;
    let remaining = pages;

    for (let launch = 0; !context.signal.aborted; launch += 1) {
      const result = await this.launchOnce(shard, remaining, byPage, context);
      if (result.completed) {
        return;
      }

      const crash = new WorkerCrashError(shard.shardId, result.exitCode);
      metrics.incrementCounter("shard_crashes");
      remaining = remaining.filter((pageNumber) => byPage.get(pageNumber)?.status === "pending");
      if (remaining.length === 0 || context.signal.aborted) {
        return;
      }
      if (launch >= config.maxShardRestarts) {
        context.logger.error("shard_abandoned", {
          shardId: shard.shardId,
          error: crash.message,
          pendingPages: remaining.length,
        });
        return;
      }
      context.logger.warn("shard_requeued", {
        shardId: shard.shardId,
        error: crash.message,
        pendingPages: remaining.length,
        restart: launch + 1,
      });
    }
  }

  private launchOnce(
    shard: Shard,
    pages: number[],
    byPage: Map<number, PageTask>,
    context: TierContext,
  ): Promise<LaunchResult> {
    const { launcher, book, config, runId, shards } = this.options;

    return new Promise<LaunchResult>((resolve, reject) => {
      const handle = launcher.launch(shard.shardId);
      let done = false;
      let applying: Promise<void> = Promise.resolve();
      let killTimer: NodeJS.Timeout | undefined;

      const onAbort = () => {
        handle.send({ type: "shard.stop" });
        killTimer = setTimeout(() => handle.kill(), config.shardStopTimeoutMs);
      };

      handle.onMessage((message) => {
        if (message.type === "shard.done") {
          done = true;
          return;
        }

        const task = byPage.get(message.pageNumber);
        if (!task || task.status !== "pending") {
          context.logger.warn("shard_page_unexpected", {
            shardId: shard.shardId,
            pageNumber: message.pageNumber,
            status: task?.status,
          });
          return;
        }

        const { outcome } = message;
        task.settleRemote(
          outcome.kind === "parsed"
            ? { status: "parsed", attemptCount: outcome.attemptCount }
            : { status: "failed", attemptCount: outcome.attemptCount, failure: outcome.failure, error: outcome.error },
        );
        applying = applying.then(() => this.options.onRemoteOutcome(task, outcome));
      });

      handle.onExit((code) => {
        context.signal.removeEventListener("abort", onAbort);
        if (killTimer) {
          clearTimeout(killTimer);
        }
        applying.then(() => resolve({ completed: done, exitCode: code }), reject);
      });

      context.signal.addEventListener("abort", onAbort, { once: true });
      handle.send({
        type: "shard.start",
        runId,
        shardId: shard.shardId,
        shardCount: shards.length,
        book: { id: book.id, totalPages: book.totalPages, sourceBaseUrl: book.sourceBaseUrl },
        pages,
        config: { ...config },
      });
    });
  }
}
