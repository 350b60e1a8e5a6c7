/**
 * Randomized recursive backtracking
 *
 * Depth-first carving with an explicit stack, so grid size is not bounded
 * by call depth.
 */

import {
  type Cell,
  formatCell,
  MazeError,
  mazeStart,
  type RandomSource,
} from "@maze3d/contracts";
import type { GridGraph } from "../../core/grid/grid-graph";
import type { GenerationReport, MazeGenerator } from "../types";

export class BacktrackingGenerator implements MazeGenerator {
  readonly id = "backtracking";
  readonly name = "Randomized recursive backtracking";

  constructor(private readonly random: RandomSource) {}

  /**
   * Carve a perfect maze into `grid`, starting from (0, 0, 0).
   *
   * Neighbor candidates follow `grid.neighbors` order and one of them is
   * picked with `floor(next() * count)`; the same random stream always
   * carves the same maze.
   *
   * @throws {MazeError} ALREADY_GENERATED if the grid was carved before
   *   (call `grid.reset()` first) or has open edges
   */
  generate(grid: GridGraph): GenerationReport {
    if (grid.isGenerated || grid.openEdgeCount > 0) {
      throw new MazeError(
        "ALREADY_GENERATED",
        "Grid already carved; reset it before generating again",
        { openEdges: grid.openEdgeCount, generated: grid.isGenerated },
      );
    }

    const startedAt = performance.now();
    const visited = new Uint8Array(grid.cellCount);
    const start = mazeStart();
    const stack: Cell[] = [start];
    visited[grid.indexOf(start)] = 1;

    let visitedCells = 1;
    let carvedEdges = 0;
    let deadEnds = 0;
    let maxStackDepth = 1;
    let randomDraws = 0;
    let justCarved = false;

    for (let current = stack.at(-1); current !== undefined; current = stack.at(-1)) {
      const candidates = grid
        .neighbors(current)
        .filter((next) => visited[grid.indexOf(next)] === 0);

      if (candidates.length === 0) {
        if (justCarved) deadEnds++;
        justCarved = false;
        stack.pop();
        continue;
      }

      const next = candidates[this.pick(candidates.length)];
      randomDraws++;
      if (next === undefined) {
        throw new MazeError(
          "GENERATION_FAILED",
          `No candidate picked at ${formatCell(current)}`,
          { candidates: candidates.length },
        );
      }

      grid.setOpen(current, next);
      visited[grid.indexOf(next)] = 1;
      stack.push(next);
      visitedCells++;
      carvedEdges++;
      justCarved = true;
      if (stack.length > maxStackDepth) maxStackDepth = stack.length;
    }

    grid.markGenerated();

    return {
      algorithm: this.id,
      visitedCells,
      carvedEdges,
      deadEnds,
      maxStackDepth,
      randomDraws,
      durationMs: performance.now() - startedAt,
    };
  }

  private pick(count: number): number {
    const value = this.random.next();
    if (!(value >= 0 && value < 1)) {
      throw new MazeError(
        "GENERATION_FAILED",
        `Random source returned ${value}, expected a number in [0, 1)`,
        { value },
      );
    }
    return Math.floor(value * count);
  }
}

export function createBacktrackingGenerator(
  random: RandomSource,
): BacktrackingGenerator {
  return new BacktrackingGenerator(random);
}
