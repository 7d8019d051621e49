import { fork } from "node:child_process";
import path from "node:path";
import type { Logger } from "../observability";
import { isShardReadyMessage, isWorkerMessage, type ParentMessage, type WorkerMessage } from "./shardMessages";

export interface ShardHandle {
  send(message: ParentMessage): void;
  onMessage(listener: (message: WorkerMessage) => void): void;
  /** Called once, after the worker has exited and its channel is closed. */
  onExit(listener: (code: number | null) => void): void;
  kill(): void;
}

export interface ShardLauncher {
  launch(shardId: number): ShardHandle;
}

export interface ForkShardLauncherOptions {
  workerPath?: string;
  execArgv?: string[];
  logger?: Logger;
}

// Running from sources the worker entry is a .ts file and needs the tsx loader.
function defaultWorkerEntry(): { workerPath: string; execArgv: string[] } {
  const extension = path.extname(__filename);
  return {
    workerPath: path.join(__dirname, `shardWorkerMain${extension}`),
    execArgv: extension === ".ts" ? ["--import", "tsx"] : [],
  };
}

/**
 * Forks one Node.js process per shard and talks to it over the JSON IPC
 * channel. Messages sent before the worker reports `shard.ready` are queued,
 * since a worker still loading its modules has no listener to receive them.
 */
export class ForkShardLauncher implements ShardLauncher {
  private readonly workerPath: string;
  private readonly execArgv: string[];
  private readonly logger?: Logger;

  constructor(options: ForkShardLauncherOptions = {}) {
    const entry = defaultWorkerEntry();
    this.workerPath = options.workerPath ?? entry.workerPath;
    this.execArgv = options.execArgv ?? entry.execArgv;
    this.logger = options.logger;
  }

  launch(shardId: number): ShardHandle {
    const child = fork(this.workerPath, [], { execArgv: this.execArgv, serialization: "json" });
    const exitListeners: Array<(code: number | null) => void> = [];
    const queued: ParentMessage[] = [];
    let exited = false;
    let ready = false;

    const deliver = (message: ParentMessage) => {
      if (child.connected) {
        child.send(message);
      }
    };

    child.on("message", (raw: unknown) => {
      if (!ready && isShardReadyMessage(raw)) {
        ready = true;
        for (const message of queued.splice(0)) {
          deliver(message);
        }
      }
    });

    const notifyExit = (code: number | null) => {
      if (exited) {
        return;
      }
      exited = true;
      for (const listener of exitListeners) {
        listener(code);
      }
    };

    child.on("close", (code: number | null) => notifyExit(code));
    child.on("error", (error: Error) => {
      this.logger?.error("shard_process_error", { shardId, pid: child.pid, error: error.message });
      if (child.exitCode === null && child.pid === undefined) {
        notifyExit(null);
      }
    });

    return {
      send: (message) => {
        if (ready) {
          deliver(message);
        } else {
          queued.push(message);
        }
      },
      onMessage: (listener) => {
        child.on("message", (raw: unknown) => {
          if (isWorkerMessage(raw)) {
            listener(raw);
            return;
          }
          if (!isShardReadyMessage(raw)) {
            this.logger?.warn("shard_message_ignored", { shardId });
          }
        });
      },
      onExit: (listener) => {
        exitListeners.push(listener);
      },
      kill: () => {
        if (!exited) {
          child.kill("SIGKILL");
        }
      },
    };
  }
}
