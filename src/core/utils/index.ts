export * from "./date";
export * from "./logger";
export * from "./url";
