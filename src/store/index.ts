import type { ExtractorConfig } from "../config";
import { JsonlStore } from "./jsonlStore";
import { InMemoryStore } from "./memoryStore";
import { SqliteStore } from "./sqliteStore";
import type { PageStore } from "./types";

export function createStore(config: Pick<ExtractorConfig, "storeType" | "storePath" | "jsonlDir">): PageStore {
  switch (config.storeType) {
    case "sqlite":
      return new SqliteStore(config.storePath);
    case "jsonl":
      return new JsonlStore(config.jsonlDir);
    case "memory":
      return new InMemoryStore();
  }
}

export * from "./jsonlStore";
export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
