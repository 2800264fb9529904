export * from "./adversarial-search";
export type * from "./types";
