import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { runShardJob } from "./shardWorker";
import { isParentMessage, type ShardReadyMessage, type WorkerMessage } from "./shardMessages";

// Entry point of a forked shard worker process.

const controller = new AbortController();
let started = false;

function sendToParent(message: WorkerMessage | ShardReadyMessage): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error("shard worker started without an IPC channel"));
      return;
    }
    process.send(message, undefined, undefined, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

process.on("message", (raw: unknown) => {
  if (!isParentMessage(raw)) {
    return;
  }
  if (raw.type === "shard.stop") {
    controller.abort();
    return;
  }
  if (started) {
    return;
  }
  started = true;
  const start = raw;

  runShardJob(start, { send: sendToParent, signal: controller.signal })
    .then(async (done) => {
      await sendToParent(done);
      process.disconnect();
    })
    .catch((error: unknown) => {
      new Logger({ component: "shard_worker", runId: start.runId }).error("shard_worker_failed", {
        shardId: start.shardId,
        error: errorMessage(error),
      });
      process.exitCode = 1;
      process.disconnect();
    });
});

sendToParent({ type: "shard.ready" }).catch((error: unknown) => {
  new Logger({ component: "shard_worker", runId: `pid-${process.pid}` }).error("shard_worker_failed", { error: errorMessage(error) });
  process.exitCode = 1;
});
