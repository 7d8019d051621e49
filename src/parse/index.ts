export * from "./cheerioParser";
export * from "./htmlExtractor";
export * from "./linkedomParser";
export * from "./textCleaner";
export * from "./types";
