export * from "./connectivityMonitor";
export * from "./orchestrator";
export * from "./pageProcessor";
export * from "./pageTask";
export * from "./taskBoard";
export type { ExtractorConfig, ConfigOverrides, StoreType, SinkType } from "../config";
export { loadConfig, createConfig } from "../config";
export type { ExtractionResult, ExtractedPage, Book, StructuralMetadata, StrategyKind } from "../types";
