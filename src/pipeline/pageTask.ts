import { PageTaskStateError } from "../core/errors";
import type { PageFailureKind, PageStatus } from "../types";

export interface PageTaskSnapshot {
  pageNumber: number;
  status: PageStatus;
  attemptCount: number;
  lastError?: string;
  failure?: PageFailureKind;
}

/** Outcome of a page driven inside a shard worker, applied to the parent's task. */
export type RemoteSettlement =
  | { status: "parsed"; attemptCount: number }
  | { status: "failed"; attemptCount: number; failure: PageFailureKind; error: string };

/**
 * Lifecycle of one page within a run. Every transition names the states it
 * may leave from; anything else is a programming error and throws.
 */
export class PageTask {
  readonly pageNumber: number;
  private readonly maxAttempts: number;
  private currentStatus: PageStatus = "pending";
  private attempts = 0;
  private lastErrorMessage?: string;
  private failureKind?: PageFailureKind;

  constructor(pageNumber: number, maxAttempts: number) {
    this.pageNumber = pageNumber;
    this.maxAttempts = maxAttempts;
  }

  get status(): PageStatus {
    return this.currentStatus;
  }

  get attemptCount(): number {
    return this.attempts;
  }

  get lastError(): string | undefined {
    return this.lastErrorMessage;
  }

  get failure(): PageFailureKind | undefined {
    return this.failureKind;
  }

  get attemptsRemaining(): number {
    return Math.max(0, this.maxAttempts - this.attempts);
  }

  get isSettled(): boolean {
    return this.currentStatus === "parsed" || this.currentStatus === "persisted" || this.currentStatus === "failed";
  }

  startFetch(): void {
    if (this.attempts >= this.maxAttempts) {
      throw new PageTaskStateError(`page ${this.pageNumber}: no attempts left (${this.attempts}/${this.maxAttempts})`);
    }
    this.transition("fetching", ["pending"]);
    this.attempts += 1;
  }

  fetched(): void {
    this.transition("fetched", ["fetching"]);
  }

  /** Transient failure with attempts left: back to the queue. */
  retry(error: Error): void {
    if (this.attempts >= this.maxAttempts) {
      throw new PageTaskStateError(`page ${this.pageNumber}: retry after final attempt ${this.attempts}`);
    }
    this.transition("pending", ["fetching"]);
    this.lastErrorMessage = error.message;
  }

  /** Cancellation during a fetch; the page is left for a later run. */
  abandon(): void {
    this.transition("pending", ["fetching"]);
  }

  startParse(): void {
    this.transition("parsing", ["fetched"]);
  }

  parsed(): void {
    this.transition("parsed", ["parsing"]);
  }

  fail(failure: PageFailureKind, error: Error): void {
    this.transition("failed", failure === "parse_error" ? ["parsing"] : ["fetching"]);
    this.failureKind = failure;
    this.lastErrorMessage = error.message;
  }

  persisted(): void {
    this.transition("persisted", ["parsed"]);
  }

  settleRemote(settlement: RemoteSettlement): void {
    this.transition(settlement.status, ["pending"]);
    this.attempts = settlement.attemptCount;
    if (settlement.status === "failed") {
      this.failureKind = settlement.failure;
      this.lastErrorMessage = settlement.error;
    }
  }

  snapshot(): PageTaskSnapshot {
    return {
      pageNumber: this.pageNumber,
      status: this.currentStatus,
      attemptCount: this.attempts,
      lastError: this.lastErrorMessage,
      failure: this.failureKind,
    };
  }

  private transition(to: PageStatus, from: readonly PageStatus[]): void {
    if (!from.includes(this.currentStatus)) {
      throw new PageTaskStateError(`page ${this.pageNumber}: cannot move from ${this.currentStatus} to ${to}`);
    }
    this.currentStatus = to;
  }
}
