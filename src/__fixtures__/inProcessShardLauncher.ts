import type { FetchLike } from "../http";
import type { SleepFn } from "../core/sleep";
import { isParentMessage, isWorkerMessage, runShardJob, type ParentMessage, type WorkerMessage } from "../tiers";
import type { ShardHandle, ShardLauncher } from "../tiers";

export interface InProcessShardLauncherOptions {
  fetchFn: FetchLike;
  sleep?: SleepFn;
  /** shardId → number of page messages delivered before that shard's first launch dies. */
  crashAfter?: Map<number, number>;
}

// Messages cross a JSON round trip in both directions, as they do over the fork IPC channel.
function overTheWire(message: ParentMessage | WorkerMessage): unknown {
  return JSON.parse(JSON.stringify(message));
}

/** Runs shard jobs in this process behind the same handle the fork launcher returns. */
export class InProcessShardLauncher implements ShardLauncher {
  readonly launches: number[] = [];
  readonly stopsSent: number[] = [];
  private readonly options: InProcessShardLauncherOptions;

  constructor(options: InProcessShardLauncherOptions) {
    this.options = options;
  }

  launch(shardId: number): ShardHandle {
    const firstLaunch = !this.launches.includes(shardId);
    this.launches.push(shardId);
    const crashAfter = firstLaunch ? this.options.crashAfter?.get(shardId) : undefined;

    const messageListeners: Array<(message: WorkerMessage) => void> = [];
    const exitListeners: Array<(code: number | null) => void> = [];
    const controller = new AbortController();
    let exited = false;
    let delivered = 0;

    const exit = (code: number | null) => {
      if (exited) {
        return;
      }
      exited = true;
      controller.abort();
      setImmediate(() => {
        for (const listener of exitListeners) {
          listener(code);
        }
      });
    };

    const deliver = (message: WorkerMessage) => {
      const wire = overTheWire(message);
      if (!isWorkerMessage(wire)) {
        throw new Error(`shard ${shardId} produced a malformed message`);
      }
      for (const listener of messageListeners) {
        listener(wire);
      }
    };

    return {
      send: (message) => {
        if (exited) {
          return;
        }
        const wire = overTheWire(message);
        if (!isParentMessage(wire)) {
          throw new Error("parent produced a malformed message");
        }
        if (wire.type === "shard.stop") {
          this.stopsSent.push(shardId);
          controller.abort();
          return;
        }

        void runShardJob(wire, {
          signal: controller.signal,
          fetchFn: this.options.fetchFn,
          sleep: this.options.sleep,
          logWriter: () => undefined,
          send: async (pageMessage) => {
            if (exited) {
              throw new Error("IPC channel closed");
            }
            if (crashAfter !== undefined && delivered >= crashAfter) {
              exit(1);
              throw new Error("worker crashed");
            }
            delivered += 1;
            deliver(pageMessage);
          },
        })
          .then((done) => {
            if (!exited) {
              deliver(done);
              exit(0);
            }
          })
          .catch(() => exit(1));
      },
      onMessage: (listener) => {
        messageListeners.push(listener);
      },
      onExit: (listener) => {
        exitListeners.push(listener);
      },
      kill: () => exit(null),
    };
  }
}
