export * from "./driver";
export * from "./enricher";
export * from "./fetcher";
export * from "./handoff";
export * from "./persister";
export * from "./sampler";
export * from "./tasks";
