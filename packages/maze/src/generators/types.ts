import type { GridGraph } from "../core/grid/grid-graph";

/**
 * What a generator did while carving a grid.
 */
export interface GenerationReport {
  readonly algorithm: string;
  /** Cells reached; equals the grid's cell count on success */
  readonly visitedCells: number;
  /** Edges opened; cells − 1 on success */
  readonly carvedEdges: number;
  /** Cells left without unvisited neighbors right after being carved into */
  readonly deadEnds: number;
  readonly maxStackDepth: number;
  readonly randomDraws: number;
  readonly durationMs: number;
}

/**
 * Turns a fully closed grid into a perfect maze, in place.
 */
export interface MazeGenerator {
  readonly id: string;
  readonly name: string;
  generate(grid: GridGraph): GenerationReport;
}
