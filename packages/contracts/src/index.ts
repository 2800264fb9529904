export * from "./limits";
export * from "./random/seeded-random";
export * from "./schemas/board";
export * from "./schemas/jug";
export * from "./schemas/maze";
export * from "./schemas/settings";
export * from "./types/error";
export * from "./types/problems";
export * from "./types/result";
export * from "./utils/builder";
