import type { LogLevel } from "../observability/types";

export type StoreType = "sqlite" | "jsonl" | "memory";

export type SinkType = "none" | "local_jsonl" | "http" | "sqs" | "rabbit";

export interface ExtractorConfig {
  sourceBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;

  threadThreshold: number;
  asyncThreshold: number;
  multiprocessThreshold: number;
  forceSequential: boolean;
  workerCount: number;
  asyncConcurrency: number;
  /** Worker processes for the multi-process tier; derived from the host when unset. */
  processCount?: number;
  minShardSize: number;
  maxShardRestarts: number;
  shardStopTimeoutMs: number;

  requestTimeoutMs: number;
  maxConnections: number;
  requestsPerSecond: number;
  rateLimitBurst: number;
  maxAttempts: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
  rateLimitCooldownMs: number;
  maxConsecutiveNetworkFailures: number;

  useFastParser: boolean;
  collectBookMetadata: boolean;

  batchSize: number;
  persistMaxAttempts: number;
  persistRetryDelayMs: number;
  storeType: StoreType;
  storePath: string;
  jsonlDir: string;

  sinkType: SinkType;
  manifestsDir: string;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
  sqsQueueUrl?: string;
  rabbitUrl?: string;

  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<ExtractorConfig>;
