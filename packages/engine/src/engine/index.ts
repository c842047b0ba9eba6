export * from "./cache-engine";
export * from "./identifier";
export * from "./last-location";
export * from "./bucket-lock";
