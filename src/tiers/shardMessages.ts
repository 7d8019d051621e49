import type { ExtractorConfig } from "../config";
import type { Book, ExtractedPage, PageFailureKind } from "../types";
import { isStructuralMetadata } from "../store/types";

export type RemotePageOutcome =
  | { kind: "parsed"; attemptCount: number; page: ExtractedPage }
  | { kind: "failed"; attemptCount: number; failure: PageFailureKind; error: string; transport: boolean };

export type ShardStartMessage = {
  type: "shard.start";
  runId: string;
  shardId: number;
  shardCount: number;
  book: Book;
  pages: number[];
  config: ExtractorConfig;
};

export type ShardStopMessage = {
  type: "shard.stop";
};

export type ShardPageMessage = {
  type: "shard.page";
  shardId: number;
  pageNumber: number;
  outcome: RemotePageOutcome;
};

export type ShardDoneMessage = {
  type: "shard.done";
  shardId: number;
  settled: number;
  abandoned: number;
};

/** Sent once by a forked worker when it is listening; the parent holds its messages until then. */
export type ShardReadyMessage = {
  type: "shard.ready";
};

export type ParentMessage = ShardStartMessage | ShardStopMessage;
export type WorkerMessage = ShardPageMessage | ShardDoneMessage;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isFailureKind(value: unknown): value is PageFailureKind {
  return value === "missing" || value === "exhausted" || value === "parse_error";
}

function isBook(value: unknown): value is Book {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    isCount(value.totalPages) &&
    typeof value.sourceBaseUrl === "string"
  );
}

function isExtractedPage(value: unknown): value is ExtractedPage {
  return (
    isRecord(value) &&
    isCount(value.pageNumber) &&
    typeof value.text === "string" &&
    isStructuralMetadata(value.structuralMetadata)
  );
}

function isRemotePageOutcome(value: unknown): value is RemotePageOutcome {
  if (!isRecord(value) || !isCount(value.attemptCount)) {
    return false;
  }
  if (value.kind === "parsed") {
    return isExtractedPage(value.page);
  }
  return (
    value.kind === "failed" &&
    isFailureKind(value.failure) &&
    typeof value.error === "string" &&
    typeof value.transport === "boolean"
  );
}

/** Shape check only; the worker validates the config values itself with `createConfig`. */
function isConfigRecord(value: unknown): value is ExtractorConfig {
  return isRecord(value) && typeof value.sourceBaseUrl === "string" && typeof value.storeType === "string";
}

export function isParentMessage(value: unknown): value is ParentMessage {
  if (!isRecord(value)) {
    return false;
  }
  if (value.type === "shard.stop") {
    return true;
  }
  return (
    value.type === "shard.start" &&
    typeof value.runId === "string" &&
    isCount(value.shardId) &&
    isCount(value.shardCount) &&
    isBook(value.book) &&
    Array.isArray(value.pages) &&
    value.pages.every(isCount) &&
    isConfigRecord(value.config)
  );
}

export function isWorkerMessage(value: unknown): value is WorkerMessage {
  if (!isRecord(value) || !isCount(value.shardId)) {
    return false;
  }
  if (value.type === "shard.done") {
    return isCount(value.settled) && isCount(value.abandoned);
  }
  return value.type === "shard.page" && isCount(value.pageNumber) && isRemotePageOutcome(value.outcome);
}

export function isShardReadyMessage(value: unknown): value is ShardReadyMessage {
  return isRecord(value) && value.type === "shard.ready";
}
