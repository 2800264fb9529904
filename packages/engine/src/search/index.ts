export * from "./path-search";
