export * from "./monster";
export * from "./pipeline";
