import { formatCell, mazeStart } from "@maze3d/contracts";
import { calculateBFSDistances } from "../core/graph/bfs-distance";
import type { GridGraph } from "../core/grid/grid-graph";
import {
  hasErrorViolations,
  type MazeValidationResult,
  type Violation,
} from "./result-types";

/**
 * Indices of every cell reachable from `fromIndex` over open edges.
 */
export function reachableCells(grid: GridGraph, fromIndex = 0): Set<number> {
  const { distances } = calculateBFSDistances(fromIndex, (index) =>
    grid.openNeighbors(grid.cellAt(index)).map((cell) => grid.indexOf(cell)),
  );
  return new Set(distances.keys());
}

/**
 * Check the perfect-maze invariants of a carved grid.
 *
 * Checks:
 * - Open edge count is cells − 1
 * - Every cell is reachable from the start over open edges
 * - The grid went through a generator (warning only)
 *
 * The first two together mean the open edges form a spanning tree.
 */
export function validateMaze(grid: GridGraph): MazeValidationResult {
  const violations: Violation[] = [];
  const expectedEdges = grid.cellCount - 1;

  if (grid.openEdgeCount !== expectedEdges) {
    violations.push({
      type: "invariant.edges.count",
      message: `Expected ${expectedEdges} open edges, found ${grid.openEdgeCount}`,
      severity: "error",
    });
  }

  const reached = reachableCells(grid).size;
  if (reached !== grid.cellCount) {
    violations.push({
      type: "invariant.connectivity",
      message: `${grid.cellCount - reached} of ${grid.cellCount} cells unreachable from ${formatCell(mazeStart())}`,
      severity: "error",
    });
  }

  if (!grid.isGenerated) {
    violations.push({
      type: "maze.not_generated",
      message: "Grid has not been carved by a generator",
      severity: "warning",
    });
  }

  if (hasErrorViolations(violations)) {
    return { success: false, violations };
  }
  return { success: true, violations };
}
