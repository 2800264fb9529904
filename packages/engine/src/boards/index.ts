export * from "./factory";
export * from "./moves";
export * from "./special-tile-board";
export * from "./strategy-board";
export * from "./tic-tac-toe";
export * from "./types";
