/**
 * Breadth-first maze solver
 *
 * Shortest path over open edges. On a perfect maze the shortest path is
 * also the only one.
 */

import {
  type Cell,
  cellsEqual,
  formatCell,
  type MazePath,
  MazeError,
  Result,
} from "@maze3d/contracts";
import { FastQueue } from "../core/data-structures/fast-queue";
import type { GridGraph } from "../core/grid/grid-graph";

const UNVISITED = -1;

export interface MazeSolver {
  readonly id: string;
  solve(grid: GridGraph, start: Cell, end: Cell): MazePath;
}

function assertInGrid(grid: GridGraph, cell: Cell, role: "start" | "end"): void {
  if (!grid.contains(cell)) {
    throw MazeError.invalidCell(
      `${role === "start" ? "Start" : "End"} ${formatCell(cell)} is outside the ${grid.width}x${grid.height}x${grid.depth} grid`,
      { role, cell },
    );
  }
}

function reconstructPath(
  grid: GridGraph,
  predecessors: Int32Array,
  startIndex: number,
  endIndex: number,
): Cell[] {
  const path: Cell[] = [grid.cellAt(endIndex)];
  let index = endIndex;

  while (index !== startIndex) {
    const previous = predecessors[index];
    if (previous === undefined || previous === UNVISITED) {
      throw new MazeError(
        "NO_PATH_FOUND",
        `Predecessor chain broken at ${formatCell(grid.cellAt(index))}`,
      );
    }
    index = previous;
    path.push(grid.cellAt(index));
  }

  return path.reverse();
}

/**
 * Shortest cell path from `start` to `end`, both inclusive.
 *
 * Each cell is enqueued at most once; the predecessor table doubles as
 * the visited set.
 *
 * @throws {MazeError} INVALID_CELL if start or end is outside the grid
 * @throws {MazeError} NO_PATH_FOUND if `end` is unreachable, which on a
 *   generated maze means the spanning-tree invariant is broken
 */
export function solveMaze(grid: GridGraph, start: Cell, end: Cell): MazePath {
  assertInGrid(grid, start, "start");
  assertInGrid(grid, end, "end");

  if (cellsEqual(start, end)) {
    return [{ x: start.x, y: start.y, z: start.z }];
  }

  const startIndex = grid.indexOf(start);
  const endIndex = grid.indexOf(end);
  const predecessors = new Int32Array(grid.cellCount).fill(UNVISITED);
  predecessors[startIndex] = startIndex;

  const queue = FastQueue.from([startIndex]);
  for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
    if (current === endIndex) {
      return reconstructPath(grid, predecessors, startIndex, endIndex);
    }

    for (const next of grid.openNeighbors(grid.cellAt(current))) {
      const nextIndex = grid.indexOf(next);
      if (predecessors[nextIndex] === UNVISITED) {
        predecessors[nextIndex] = current;
        queue.enqueue(nextIndex);
      }
    }
  }

  throw new MazeError(
    "NO_PATH_FOUND",
    `No open path from ${formatCell(start)} to ${formatCell(end)}`,
    { start, end },
  );
}

/**
 * `solveMaze` with maze errors returned instead of thrown.
 * Anything that is not a `MazeError` still propagates.
 */
export function trySolveMaze(
  grid: GridGraph,
  start: Cell,
  end: Cell,
): Result<MazePath, MazeError> {
  return Result.fromThrowable(
    () => solveMaze(grid, start, end),
    (e) => {
      if (MazeError.isMazeError(e)) return e;
      throw e;
    },
  );
}

export class BfsSolver implements MazeSolver {
  readonly id = "bfs";

  solve(grid: GridGraph, start: Cell, end: Cell): MazePath {
    return solveMaze(grid, start, end);
  }
}
