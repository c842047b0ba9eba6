export * from "./buckets";
export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./cache";
export * from "./engine";
