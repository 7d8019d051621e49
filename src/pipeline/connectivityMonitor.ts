import { ConnectivityLostError, TransientNetworkError } from "../core/errors";

export function isTransportError(error: unknown): boolean {
  return error instanceof TransientNetworkError && error.status === undefined;
}

/**
 * Counts pages that ran out of attempts on transport errors (no HTTP status)
 * with no response from the server in between. Reaching the threshold ends
 * the run through `onLost`.
 */
export class ConnectivityMonitor {
  private readonly threshold: number;
  private readonly onLost: (error: ConnectivityLostError) => void;
  private consecutive = 0;
  private tripped = false;

  constructor(threshold: number, onLost: (error: ConnectivityLostError) => void) {
    this.threshold = threshold;
    this.onLost = onLost;
  }

  get consecutiveFailures(): number {
    return this.consecutive;
  }

  /** The server answered, whatever the status. */
  recordResponse(): void {
    this.consecutive = 0;
  }

  recordExhausted(transport: boolean): void {
    if (!transport) {
      this.consecutive = 0;
      return;
    }
    this.consecutive += 1;
    if (!this.tripped && this.consecutive >= this.threshold) {
      this.tripped = true;
      this.onLost(new ConnectivityLostError(this.consecutive));
    }
  }
}
