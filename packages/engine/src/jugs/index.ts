export * from "./jug-state-space";
