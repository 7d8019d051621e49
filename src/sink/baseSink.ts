import { ConfigError } from "../core/errors";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";
import type { ExtractionEvent, Sink } from "./types";

export interface SinkRetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: SleepFn;
}

/** A failure that another attempt cannot fix, such as a 4xx response or a malformed entry. */
export class PermanentSinkError extends Error {}

/** The JSON document every transport carries for one event. */
export function envelope(event: ExtractionEvent): string {
  return JSON.stringify({ sentAt: new Date().toISOString(), event });
}

export abstract class BaseSink implements Sink {
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly sleep: SleepFn;

  constructor(retry: SinkRetryOptions = {}, defaultRetryDelayMs = 250) {
    this.maxRetries = retry.maxRetries ?? 3;
    this.retryDelayMs = retry.retryDelayMs ?? defaultRetryDelayMs;
    this.sleep = retry.sleep ?? defaultSleep;
  }

  abstract publish(events: ExtractionEvent[]): Promise<void>;

  async close(): Promise<void> {
    return;
  }

  protected requireSetting(name: string, value: string | undefined): string {
    if (!value) {
      throw new ConfigError(`${name} sink is not configured`);
    }
    return value;
  }

  /**
   * Runs `operation` until it resolves, at most `maxRetries + 1` times, waiting
   * `retryDelayMs * attempt` between tries. A PermanentSinkError ends it at once.
   */
  protected async withRetries<T>(operation: (attempt: number) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (error instanceof PermanentSinkError || attempt > this.maxRetries) {
          throw error;
        }
      }
      await this.sleep(this.retryDelayMs * attempt);
    }
  }
}

export class NoopSink extends BaseSink {
  async publish(_events: ExtractionEvent[]): Promise<void> {
    return;
  }
}
