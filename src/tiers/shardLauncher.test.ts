import http from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { expectedText, pageHtml } from "../__fixtures__/fakeBookSite";
import { createConfig } from "../config";
import { ForkShardLauncher, type ShardHandle } from "./shardLauncher";
import type { ShardStartMessage, WorkerMessage } from "./shardMessages";

// These tests fork the real worker entry through the tsx loader and point it at a local HTTP server.

let server: http.Server;
let baseUrl = "";
let holdRequests = false;
const requestWaiters: Array<() => void> = [];

beforeAll(async () => {
  server = http.createServer((request, response) => {
    for (const notify of requestWaiters.splice(0)) {
      notify();
    }
    if (holdRequests) {
      return;
    }
    const match = /^\/book\/42\/(\d+)$/.exec(request.url ?? "");
    if (!match) {
      response.writeHead(404).end("not found");
      return;
    }
    response.writeHead(200, { "content-type": "text/html; charset=utf-8" });
    response.end(pageHtml("42", Number(match[1]), 2));
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("test server has no TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
});

function startMessage(shardId: number, pages: number[]): ShardStartMessage {
  return {
    type: "shard.start",
    runId: "run-test",
    shardId,
    shardCount: 1,
    book: { id: "42", totalPages: 2, sourceBaseUrl: baseUrl },
    pages,
    config: { ...createConfig({ sourceBaseUrl: baseUrl, requestsPerSecond: 0, workerCount: 1, maxAttempts: 1, logLevel: "error" }) },
  };
}

function watch(handle: ShardHandle) {
  const messages: WorkerMessage[] = [];
  handle.onMessage((message) => messages.push(message));
  const exited = new Promise<number | null>((resolve) => handle.onExit(resolve));
  return { messages, exited };
}

describe("ForkShardLauncher", () => {
  it("runs a shard in a forked worker and reports each page before it exits", async () => {
    const handle = new ForkShardLauncher().launch(0);
    const { messages, exited } = watch(handle);

    handle.send(startMessage(0, [1, 2]));

    expect(await exited).toBe(0);
    expect(messages.map((message) => (message.type === "shard.page" ? message.pageNumber : message.type))).toEqual([
      1,
      2,
      "shard.done",
    ]);
    expect(messages[0]).toMatchObject({
      shardId: 0,
      outcome: { kind: "parsed", attemptCount: 1, page: { pageNumber: 1, text: expectedText("42", 1) } },
    });
    expect(messages[2]).toEqual({ type: "shard.done", shardId: 0, settled: 2, abandoned: 0 });
  }, 30_000);

  it("reports the exit of a killed worker without a done message", async () => {
    holdRequests = true;
    const firstRequest = new Promise<void>((resolve) => requestWaiters.push(resolve));
    const handle = new ForkShardLauncher().launch(1);
    const { messages, exited } = watch(handle);

    try {
      handle.send(startMessage(1, [1, 2]));
      await firstRequest;
      handle.kill();

      expect(await exited).toBeNull();
      expect(messages).toEqual([]);
    } finally {
      holdRequests = false;
    }
  }, 30_000);
});
