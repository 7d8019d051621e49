export * from "./bookCardParser";
export * from "./bookMetadata";
export * from "./bookResolver";
export * from "./paginationParser";
