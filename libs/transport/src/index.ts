export * from "./annotator";
export * from "./command-queue";
export * from "./config";
export * from "./errors";
export * from "./framer";
export * from "./link";
export * from "./manager";
export * from "./metrics";
export * from "./read-worker";
export * from "./serial-link";
export * from "./telemetry-cache";
export * from "./write-worker";
