import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { BaseSink, envelope, type SinkRetryOptions } from "./baseSink";
import { eventKey, type ExtractionEvent } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions extends SinkRetryOptions {
  connectionUrl?: string;
  exchange?: string;
  connectFn?: ConnectFn;
}

/**
 * Publishes through a confirm channel on a durable topic exchange. Routing
 * keys are `book.<bookId>.<event type>`, so a consumer can bind to one book
 * or to one kind of event. Each attempt opens and closes its own connection.
 */
export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly exchange: string;
  private readonly connectFn: ConnectFn;

  constructor(options: RabbitSinkOptions = {}) {
    super(options);
    this.connectionUrl = options.connectionUrl;
    this.exchange = options.exchange ?? "book_extractor.events";
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  async publish(events: ExtractionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const url = this.requireSetting("RabbitMQ", this.connectionUrl);
    await this.withRetries(() => this.publishOnce(url, events));
  }

  private async publishOnce(url: string, events: ExtractionEvent[]): Promise<void> {
    const connection = await this.connectFn(url);
    let channel: ChannelLike | undefined;
    try {
      channel = await connection.createConfirmChannel();
      await channel.assertExchange(this.exchange, "topic", { durable: true });
      for (const event of events) {
        const key = eventKey(event);
        channel.publish(this.exchange, `book.${event.bookId}.${event.type}`, Buffer.from(envelope(event)), {
          persistent: true,
          contentType: "application/json",
          messageId: key,
          headers: { "x-event-type": event.type, "x-book-id": event.bookId },
        });
      }
      await channel.waitForConfirms();
    } finally {
      // A close failure on a broken connection would hide the publish error.
      await channel?.close().catch(() => undefined);
      await connection.close().catch(() => undefined);
    }
  }
}
