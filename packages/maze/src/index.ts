/**
 * 3D maze generation and solving.
 *
 * @example
 * ```typescript
 * import { GridGraph, BacktrackingGenerator, solveMaze } from "@maze3d/maze";
 * import { SeededRandom, mazeEnd, mazeStart } from "@maze3d/contracts";
 *
 * const grid = GridGraph.create(9, 9, 5);
 * new BacktrackingGenerator(new SeededRandom(12345)).generate(grid);
 * const path = solveMaze(grid, mazeStart(), mazeEnd(grid));
 * ```
 */

// Core modules
export * from "./core";
// Generators
export * from "./generators";
// Solvers
export * from "./solvers";
// Quality Assurance
export * from "./validation";
// High-level API
export * from "./api";
export * from "./testing";
// Utilities
export * from "./utils/ascii-renderer";
