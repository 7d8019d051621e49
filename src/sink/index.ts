import type { ExtractorConfig } from "../config";
import { NoopSink } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import type { Sink } from "./types";

export function createSink(config: Readonly<ExtractorConfig>): Sink {
  switch (config.sinkType) {
    case "none":
      return new NoopSink();
    case "local_jsonl":
      return new LocalJsonlSink(config.manifestsDir);
    case "http":
      return new HttpSink({ endpoint: config.httpSinkEndpoint, token: config.httpSinkToken });
    case "sqs":
      return new SqsSink({ queueUrl: config.sqsQueueUrl });
    case "rabbit":
      return new RabbitSink({ connectionUrl: config.rabbitUrl });
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonlSink";
export * from "./rabbitSink";
export * from "./sqsSink";
export * from "./types";
