export * from "./types/item";
export * from "./types/source";
export * from "./types/stage";
export * from "./errors";
export * from "./logging/logger";
