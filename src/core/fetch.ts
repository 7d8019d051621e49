import { Agent } from "undici";

export interface DispatcherOptions {
  maxConnections: number;
  ignoreHttpsErrors: boolean;
  keepAliveTimeoutMs?: number;
}

export function createFetchDispatcher(options: DispatcherOptions): Agent {
  return new Agent({
    connections: Math.max(1, options.maxConnections),
    keepAliveTimeout: options.keepAliveTimeoutMs ?? 60_000,
    connect: options.ignoreHttpsErrors
      ? {
          rejectUnauthorized: false,
        }
      : undefined,
  });
}
