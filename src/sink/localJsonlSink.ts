import fs from "node:fs";
import path from "node:path";
import { BaseSink } from "./baseSink";
import type { ExtractionEvent } from "./types";

/** Appends events to `batches.jsonl` and `runs.jsonl` under the manifests directory. */
export class LocalJsonlSink extends BaseSink {
  private readonly batchesPath: string;
  private readonly runsPath: string;

  constructor(manifestsDir: string) {
    super();
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.batchesPath = path.join(absoluteDir, "batches.jsonl");
    this.runsPath = path.join(absoluteDir, "runs.jsonl");
  }

  async publish(events: ExtractionEvent[]): Promise<void> {
    await this.appendLines(
      this.batchesPath,
      events.filter((event) => event.type === "batch_committed"),
    );
    await this.appendLines(
      this.runsPath,
      events.filter((event) => event.type === "run_completed"),
    );
  }

  private async appendLines(filePath: string, records: ExtractionEvent[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
