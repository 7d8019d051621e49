import { describe, expect, it } from "vitest";
import { ConnectivityLostError, TransientNetworkError } from "../core/errors";
import { ConnectivityMonitor, isTransportError } from "./connectivityMonitor";

describe("isTransportError", () => {
  it("is true only for transient errors without an HTTP status", () => {
    expect(isTransportError(new TransientNetworkError("socket hang up"))).toBe(true);
    expect(isTransportError(new TransientNetworkError("HTTP 503", 503))).toBe(false);
    expect(isTransportError(new Error("socket hang up"))).toBe(false);
  });
});

describe("ConnectivityMonitor", () => {
  it("trips once after the threshold of consecutive transport exhaustions", () => {
    const lost: ConnectivityLostError[] = [];
    const monitor = new ConnectivityMonitor(2, (error) => lost.push(error));

    monitor.recordExhausted(true);
    expect(lost).toHaveLength(0);
    monitor.recordExhausted(true);
    monitor.recordExhausted(true);

    expect(lost).toHaveLength(1);
    expect(lost[0].message).toBe("2 consecutive pages failed on network errors");
    expect(monitor.consecutiveFailures).toBe(3);
  });

  it("resets on any server response or non-transport failure", () => {
    const lost: ConnectivityLostError[] = [];
    const monitor = new ConnectivityMonitor(2, (error) => lost.push(error));

    monitor.recordExhausted(true);
    monitor.recordResponse();
    monitor.recordExhausted(true);
    monitor.recordExhausted(false);
    monitor.recordExhausted(true);

    expect(lost).toHaveLength(0);
    expect(monitor.consecutiveFailures).toBe(1);
  });
});
