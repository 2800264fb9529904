export * from "./grid-graph";
export * from "./maze-generator";
