export * from "./types";
export * from "./disk-store";
export * from "./memory-property-store";
export * from "./property-layer";
export * from "./bucket-store";
