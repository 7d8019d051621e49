import { createConfig } from "../config";
import type { SleepFn } from "../core/sleep";
import { HttpSession, RateLimiter, type FetchLike } from "../http";
import { Logger, MetricsRegistry, type LogWriter } from "../observability";
import { FallbackHtmlExtractor } from "../parse";
import { PageProcessor } from "../pipeline/pageProcessor";
import { TaskBoard } from "../pipeline/taskBoard";
import { SequentialTier } from "./sequentialTier";
import type { RemotePageOutcome, ShardDoneMessage, ShardStartMessage, WorkerMessage } from "./shardMessages";
import { ThreadPoolTier } from "./threadPoolTier";
import type { TierDriver } from "./types";

export interface ShardJobDeps {
  send(message: WorkerMessage): Promise<void>;
  signal: AbortSignal;
  fetchFn?: FetchLike;
  sleep?: SleepFn;
  now?: () => number;
  logWriter?: LogWriter;
}

/**
 * Everything a shard worker does once it has its start message: builds its
 * own session, limiter and extractor, drives its pages, and reports each
 * settled page to the parent. Pages still pending when the signal aborts are
 * not reported; the parent counts them as unsettled.
 */
export async function runShardJob(start: ShardStartMessage, deps: ShardJobDeps): Promise<ShardDoneMessage> {
  const config = createConfig(start.config);
  const logger = new Logger(
    { component: "shard_worker", runId: start.runId },
    { level: config.logLevel, writer: deps.logWriter },
  );
  const metrics = new MetricsRegistry();
  const session = new HttpSession({
    userAgent: config.userAgent,
    requestTimeoutMs: config.requestTimeoutMs,
    maxConnections: config.maxConnections,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    fetchFn: deps.fetchFn,
  });
  // Processes share no memory, so the run's rate is divided between shards.
  const limiter = new RateLimiter({
    requestsPerSecond: config.requestsPerSecond / Math.max(1, start.shardCount),
    burst: config.rateLimitBurst,
    now: deps.now,
    sleep: deps.sleep,
  });
  const extractor = new FallbackHtmlExtractor({ useFastParser: config.useFastParser, metrics, logger });
  const processor = new PageProcessor({
    book: start.book,
    session,
    limiter,
    extractor,
    settings: config,
    logger,
    metrics,
    sleep: deps.sleep,
  });
  const board = new TaskBoard(start.pages, config.maxAttempts);
  const tier: TierDriver = config.workerCount > 1 ? new ThreadPoolTier(config.workerCount) : new SequentialTier();

  logger.info("shard_start", { shardId: start.shardId, bookId: start.book.id, pages: start.pages.length, tier: tier.kind });
  let settled = 0;

  try {
    await tier.run(board.all(), {
      signal: deps.signal,
      logger,
      runPage: async (task) => {
        const result = await processor.process(task, deps.signal);
        if (result.kind === "abandoned") {
          return;
        }

        const outcome: RemotePageOutcome =
          result.kind === "parsed"
            ? { kind: "parsed", attemptCount: task.attemptCount, page: result.page }
            : {
                kind: "failed",
                attemptCount: task.attemptCount,
                failure: result.failure,
                error: result.error.message,
                transport: result.transport,
              };
        settled += 1;
        await deps.send({ type: "shard.page", shardId: start.shardId, pageNumber: task.pageNumber, outcome });
      },
    });
  } finally {
    await session.close();
  }

  const done: ShardDoneMessage = {
    type: "shard.done",
    shardId: start.shardId,
    settled,
    abandoned: start.pages.length - settled,
  };
  logger.info("shard_done", { shardId: start.shardId, settled: done.settled, abandoned: done.abandoned });
  return done;
}
