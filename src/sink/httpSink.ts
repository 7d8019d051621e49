import { fetch as undiciFetch } from "undici";
import { BaseSink, PermanentSinkError, type SinkRetryOptions } from "./baseSink";
import { eventKey, type ExtractionEvent } from "./types";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type PostFn = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSinkOptions extends SinkRetryOptions {
  endpoint?: string;
  token?: string;
  fetchFn?: PostFn;
  timeoutMs?: number;
}

const RETRIABLE_STATUSES = new Set([408, 429]);

/** POSTs each publish call as one `{sentAt, events}` document. 408, 429 and 5xx are retried. */
export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: PostFn;
  private readonly timeoutMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super(options);
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? ((url, init) => undiciFetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async publish(events: ExtractionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const endpoint = this.requireSetting("HTTP", this.endpoint);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": events.map(eventKey).join(","),
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    const body = JSON.stringify({ sentAt: new Date().toISOString(), events });

    await this.withRetries(() => this.post(endpoint, headers, body));
  }

  private async post(endpoint: string, headers: Record<string, string>, body: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchFn(endpoint, { method: "POST", headers, body, signal: controller.signal });
      if (response.ok) {
        return;
      }

      const detail = `${response.status}: ${await response.text()}`;
      if (RETRIABLE_STATUSES.has(response.status) || response.status >= 500) {
        throw new Error(`HTTP sink got status ${detail}`);
      }
      throw new PermanentSinkError(`HTTP sink rejected the events with status ${detail}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
