export * from "./backtracking";
export * from "./types";
