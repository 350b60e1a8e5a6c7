/**
 * Maze Validation & Statistics
 */

export { computeMazeStats, type MazeStats } from "./compute-stats";
export {
  hasErrorViolations,
  type MazeValidationResult,
  type ValidationFailure,
  type ValidationSuccess,
  type Violation,
  type ViolationSeverity,
} from "./result-types";
export { reachableCells, validateMaze } from "./validate-maze";
