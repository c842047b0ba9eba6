export * from "./env";
export * from "./runtime";
export * from "./sqlite-property-store";
