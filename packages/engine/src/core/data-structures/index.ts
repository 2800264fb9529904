export * from "./fast-queue";
export * from "./search-arena";
