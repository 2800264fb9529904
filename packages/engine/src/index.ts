export * from "./adversarial";
export * from "./boards";
export * from "./config";
export * from "./core/clock";
export * from "./core/data-structures";
export * from "./core/trace";
export * from "./difficulty";
export * from "./jugs";
export * from "./maze";
export * from "./search";
