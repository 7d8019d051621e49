import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isLogLevel } from "../observability/logger";
import type { ConfigOverrides, ExtractorConfig, SinkType, StoreType } from "./types";

const DEFAULT_CONFIG: ExtractorConfig = {
  sourceBaseUrl: "https://shamela.ws",
  userAgent: "paged-book-extractor/0.1 (+contact: operator)",
  ignoreHttpsErrors: false,

  threadThreshold: 20,
  asyncThreshold: 200,
  multiprocessThreshold: 1000,
  forceSequential: false,
  workerCount: 4,
  asyncConcurrency: 15,
  processCount: undefined,
  minShardSize: 100,
  maxShardRestarts: 1,
  shardStopTimeoutMs: 5_000,

  requestTimeoutMs: 30_000,
  maxConnections: 20,
  requestsPerSecond: 3,
  rateLimitBurst: 1,
  maxAttempts: 3,
  baseBackoffMs: 500,
  maxBackoffMs: 10_000,
  rateLimitCooldownMs: 5_000,
  maxConsecutiveNetworkFailures: 25,

  useFastParser: true,
  collectBookMetadata: true,

  batchSize: 50,
  persistMaxAttempts: 3,
  persistRetryDelayMs: 250,
  storeType: "sqlite",
  storePath: "data/books.sqlite",
  jsonlDir: "data/books",

  sinkType: "none",
  manifestsDir: "data/manifests",
  httpSinkEndpoint: undefined,
  httpSinkToken: undefined,
  sqsQueueUrl: undefined,
  rabbitUrl: undefined,

  logLevel: "info",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toStoreType(value: string | undefined, fallback: StoreType): StoreType {
  return value === "sqlite" || value === "jsonl" || value === "memory" ? value : fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  return value === "none" || value === "local_jsonl" || value === "http" || value === "sqs" || value === "rabbit"
    ? value
    : fallback;
}

function applyEnv(merged: ExtractorConfig, env: NodeJS.ProcessEnv): ExtractorConfig {
  return {
    ...merged,
    sourceBaseUrl: env.SOURCE_BASE_URL ?? merged.sourceBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),

    threadThreshold: toInt(env.THREAD_THRESHOLD, merged.threadThreshold),
    asyncThreshold: toInt(env.ASYNC_THRESHOLD, merged.asyncThreshold),
    multiprocessThreshold: toInt(env.MULTIPROCESS_THRESHOLD, merged.multiprocessThreshold),
    forceSequential: toBool(env.FORCE_SEQUENTIAL, merged.forceSequential),
    workerCount: toInt(env.WORKER_COUNT, merged.workerCount),
    asyncConcurrency: toInt(env.ASYNC_CONCURRENCY, merged.asyncConcurrency),
    processCount: toOptionalInt(env.PROCESS_COUNT, merged.processCount),
    minShardSize: toInt(env.MIN_SHARD_SIZE, merged.minShardSize),
    maxShardRestarts: toInt(env.MAX_SHARD_RESTARTS, merged.maxShardRestarts),
    shardStopTimeoutMs: toInt(env.SHARD_STOP_TIMEOUT_MS, merged.shardStopTimeoutMs),

    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxConnections: toInt(env.MAX_CONNECTIONS, merged.maxConnections),
    requestsPerSecond: toFloat(env.REQUESTS_PER_SECOND, merged.requestsPerSecond),
    rateLimitBurst: toInt(env.RATE_LIMIT_BURST, merged.rateLimitBurst),
    maxAttempts: toInt(env.MAX_ATTEMPTS, merged.maxAttempts),
    baseBackoffMs: toInt(env.BASE_BACKOFF_MS, merged.baseBackoffMs),
    maxBackoffMs: toInt(env.MAX_BACKOFF_MS, merged.maxBackoffMs),
    rateLimitCooldownMs: toInt(env.RATE_LIMIT_COOLDOWN_MS, merged.rateLimitCooldownMs),
    maxConsecutiveNetworkFailures: toInt(env.MAX_CONSECUTIVE_NETWORK_FAILURES, merged.maxConsecutiveNetworkFailures),

    useFastParser: toBool(env.USE_FAST_PARSER, merged.useFastParser),
    collectBookMetadata: toBool(env.COLLECT_BOOK_METADATA, merged.collectBookMetadata),

    batchSize: toInt(env.BATCH_SIZE, merged.batchSize),
    persistMaxAttempts: toInt(env.PERSIST_MAX_ATTEMPTS, merged.persistMaxAttempts),
    persistRetryDelayMs: toInt(env.PERSIST_RETRY_DELAY_MS, merged.persistRetryDelayMs),
    storeType: toStoreType(env.STORE_TYPE, merged.storeType),
    storePath: env.STORE_PATH ?? merged.storePath,
    jsonlDir: env.JSONL_DIR ?? merged.jsonlDir,

    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    manifestsDir: env.MANIFESTS_DIR ?? merged.manifestsDir,
    httpSinkEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
    sqsQueueUrl: env.SQS_QUEUE_URL ?? merged.sqsQueueUrl,
    rabbitUrl: env.RABBIT_URL ?? merged.rabbitUrl,

    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : merged.logLevel,
  };
}

const POSITIVE_INTEGERS = [
  "workerCount",
  "asyncConcurrency",
  "minShardSize",
  "requestTimeoutMs",
  "maxConnections",
  "rateLimitBurst",
  "maxAttempts",
  "maxConsecutiveNetworkFailures",
  "batchSize",
  "persistMaxAttempts",
] as const satisfies ReadonlyArray<keyof ExtractorConfig>;

const NON_NEGATIVE_NUMBERS = [
  "threadThreshold",
  "asyncThreshold",
  "multiprocessThreshold",
  "maxShardRestarts",
  "shardStopTimeoutMs",
  "requestsPerSecond",
  "baseBackoffMs",
  "maxBackoffMs",
  "rateLimitCooldownMs",
  "persistRetryDelayMs",
] as const satisfies ReadonlyArray<keyof ExtractorConfig>;

export function validateConfig(config: ExtractorConfig): ExtractorConfig {
  for (const key of POSITIVE_INTEGERS) {
    const value = config[key];
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${key} must be a positive integer (got ${String(value)})`);
    }
  }

  for (const key of NON_NEGATIVE_NUMBERS) {
    const value = config[key];
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${key} must be a non-negative number (got ${String(value)})`);
    }
  }

  if (config.processCount !== undefined && (!Number.isInteger(config.processCount) || config.processCount < 1)) {
    throw new ConfigError(`processCount must be a positive integer (got ${String(config.processCount)})`);
  }

  if (config.threadThreshold > config.asyncThreshold || config.asyncThreshold > config.multiprocessThreshold) {
    throw new ConfigError(
      `tier thresholds must be ordered threadThreshold <= asyncThreshold <= multiprocessThreshold ` +
        `(got ${config.threadThreshold}, ${config.asyncThreshold}, ${config.multiprocessThreshold})`,
    );
  }

  try {
    new URL(config.sourceBaseUrl);
  } catch (error) {
    throw new ConfigError(`sourceBaseUrl is not a valid URL: ${config.sourceBaseUrl}`, { cause: error });
  }

  return config;
}

/**
 * Resolves configuration from defaults, an optional JSON file, environment
 * variables and explicit overrides, in that order. The result is frozen and
 * shared by reference with every component of a run.
 */
export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Readonly<ExtractorConfig> {
  const fileConfig = readConfigFile(configPath);
  const merged = applyEnv({ ...DEFAULT_CONFIG, ...fileConfig }, env);
  return Object.freeze(validateConfig({ ...merged, ...overrides }));
}

/** Builds a config from defaults plus overrides only, without touching files or the environment. */
export function createConfig(overrides: ConfigOverrides = {}): Readonly<ExtractorConfig> {
  return Object.freeze(validateConfig({ ...DEFAULT_CONFIG, ...overrides }));
}

export { DEFAULT_CONFIG };
