import { SendMessageBatchCommand, SQSClient, type SendMessageBatchRequestEntry } from "@aws-sdk/client-sqs";
import { BaseSink, envelope, PermanentSinkError, type SinkRetryOptions } from "./baseSink";
import { eventKey, type ExtractionEvent } from "./types";

interface BatchResultError {
  Id?: string;
  SenderFault?: boolean;
  Message?: string;
}

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: BatchResultError[] }>;
}

export interface SqsSinkOptions extends SinkRetryOptions {
  queueUrl?: string;
  client?: SqsClientLike;
  /** Defaults to true for queue urls ending in `.fifo`. */
  fifo?: boolean;
  groupId?: string;
}

// SendMessageBatch takes at most ten entries.
const MAX_ENTRIES_PER_CALL = 10;

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly groupId?: string;

  constructor(options: SqsSinkOptions = {}) {
    super(options, 200);
    this.queueUrl = options.queueUrl;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.groupId = options.groupId;
  }

  async publish(events: ExtractionEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const queueUrl = this.requireSetting("SQS", this.queueUrl);
    const entries = events.map((event, index) => this.toEntry(event, index));
    for (let start = 0; start < entries.length; start += MAX_ENTRIES_PER_CALL) {
      await this.sendAll(queueUrl, entries.slice(start, start + MAX_ENTRIES_PER_CALL));
    }
  }

  private toEntry(event: ExtractionEvent, index: number): SendMessageBatchRequestEntry {
    const entry: SendMessageBatchRequestEntry = { Id: String(index), MessageBody: envelope(event) };
    // One group per book keeps a book's events in commit order.
    if (this.fifo) {
      entry.MessageGroupId = this.groupId ?? `book-${event.bookId}`;
      entry.MessageDeduplicationId = eventKey(event).replace(/[^A-Za-z0-9_-]/g, "_").slice(0, 128);
    }
    return entry;
  }

  /** Resends only the entries the queue reported as failed; sender faults are not retried. */
  private async sendAll(queueUrl: string, entries: SendMessageBatchRequestEntry[]): Promise<void> {
    let pending = entries;
    await this.withRetries(async () => {
      const response = await this.client.send(new SendMessageBatchCommand({ QueueUrl: queueUrl, Entries: pending }));
      const failed = response.Failed ?? [];
      if (failed.length === 0) {
        return;
      }

      const senderFault = failed.find((failure) => failure.SenderFault);
      if (senderFault) {
        throw new PermanentSinkError(`SQS rejected entry ${senderFault.Id ?? "?"}: ${senderFault.Message ?? "sender fault"}`);
      }
      const failedIds = new Set(failed.map((failure) => failure.Id));
      pending = pending.filter((entry) => failedIds.has(entry.Id));
      throw new Error(`SQS failed to accept ${pending.length} of ${entries.length} entries`);
    });
  }
}
