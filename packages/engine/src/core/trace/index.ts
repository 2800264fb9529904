export * from "./trace-sink";
export type * from "./types";
