import type { ExtractionResult } from "../types";

export type BatchCommittedEvent = {
  type: "batch_committed";
  bookId: string;
  runId: string;
  pageNumbers: number[];
  checkpoint: number;
  committedAt: string;
};

export type RunCompletedEvent = {
  type: "run_completed";
  bookId: string;
  runId: string;
  result: ExtractionResult;
  completedAt: string;
};

export type ExtractionEvent = BatchCommittedEvent | RunCompletedEvent;

export interface Sink {
  publish(events: ExtractionEvent[]): Promise<void>;
  close(): Promise<void>;
}

/** Stable per event, so a redelivered event can be recognised downstream. */
export function eventKey(event: ExtractionEvent): string {
  if (event.type === "run_completed") {
    return `${event.type}:${event.bookId}:${event.runId}`;
  }
  const first = event.pageNumbers[0] ?? 0;
  const last = event.pageNumbers[event.pageNumbers.length - 1] ?? first;
  return `${event.type}:${event.bookId}:${first}-${last}`;
}
