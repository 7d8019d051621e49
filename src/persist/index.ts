export * from "./batchPersister";
export * from "./resumeManager";
