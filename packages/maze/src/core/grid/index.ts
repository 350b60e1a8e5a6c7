export * from "./directions";
export * from "./grid-graph";
