/**
 * Core module - grid graph, graph utilities and hashing.
 */

export * from "./data-structures";
export * from "./graph";
export * from "./grid";
export * from "./hash";
