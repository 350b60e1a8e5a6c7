import type { MazePath } from "@maze3d/contracts";
import type { GridGraph } from "../core/grid/grid-graph";

/**
 * Shape statistics for a carved maze
 */
export interface MazeStats {
  readonly cellCount: number;
  readonly openEdgeCount: number;
  readonly wallCount: number;
  /** Cells with exactly one open edge */
  readonly deadEnds: number;
  /** Cells with three or more open edges */
  readonly junctions: number;
  /** Open edges along z */
  readonly interLayerPassages: number;
  /** Solution length in edges, null when no path was given */
  readonly solutionLength: number | null;
}

export function computeMazeStats(grid: GridGraph, path?: MazePath): MazeStats {
  const degrees = new Uint8Array(grid.cellCount);
  let interLayerPassages = 0;

  for (const edge of grid.openEdges()) {
    const a = grid.indexOf(edge.a);
    const b = grid.indexOf(edge.b);
    degrees[a] = (degrees[a] ?? 0) + 1;
    degrees[b] = (degrees[b] ?? 0) + 1;
    if (edge.axis === "z") interLayerPassages++;
  }

  let deadEnds = 0;
  let junctions = 0;
  for (const degree of degrees) {
    if (degree === 1) deadEnds++;
    else if (degree >= 3) junctions++;
  }

  return {
    cellCount: grid.cellCount,
    openEdgeCount: grid.openEdgeCount,
    wallCount: grid.edgeCount - grid.openEdgeCount,
    deadEnds,
    junctions,
    interLayerPassages,
    solutionLength: path ? Math.max(0, path.length - 1) : null,
  };
}
