export * from "./types";
export * from "./errors";
export * from "./random";
export * from "./profiles";
export * from "./workloads";
export * from "./algorithms";
export * from "./scheduler";
export * from "./server";
export * from "./metrics";
export * from "./simulator";
export * from "./config";
export * from "./scenarios";
