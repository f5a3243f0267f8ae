export * from "./pipeline-service";
export * from "./queue";
