/**
 * Generation API
 *
 * Config in, solved maze out: validate, carve, solve, summarize.
 */

import {
  type BuildConfigInput,
  buildMazeConfig,
  type Cell,
  type MazeConfig,
  type MazeDimensions,
  MazeError,
  type MazePath,
  mazeEnd,
  mazeStart,
  type RandomSource,
  RECOMMENDED_MAX_CELLS,
  Result,
  SeededRandom,
  type WallSegment,
} from "@maze3d/contracts";
import { GridGraph } from "./core/grid/grid-graph";
import { computeMazeChecksum } from "./core/hash/checksum";
import { createBacktrackingGenerator } from "./generators/backtracking";
import type { GenerationReport } from "./generators/types";
import { solveMaze } from "./solvers/bfs-solver";
import { computeMazeStats, type MazeStats } from "./validation/compute-stats";

const DEV_MODE = process.env.NODE_ENV !== "production";

/**
 * Everything a renderer needs, plus the grid it was read from.
 */
export interface MazeArtifact extends MazeDimensions {
  readonly seed: number;
  readonly start: Cell;
  readonly end: Cell;
  readonly walls: readonly WallSegment[];
  readonly path: MazePath;
  readonly report: GenerationReport;
  readonly stats: MazeStats;
  readonly checksum: string;
  readonly grid: GridGraph;
}

export interface CreateMazeOptions {
  /**
   * Overrides the seeded generator. `seed` is still reported but no
   * longer decides the layout.
   */
  readonly random?: RandomSource;
}

function buildArtifact(config: MazeConfig, options: CreateMazeOptions): MazeArtifact {
  const cells = config.width * config.height * config.depth;
  if (DEV_MODE && cells > RECOMMENDED_MAX_CELLS) {
    console.warn(
      `createMaze: ${cells} cells exceeds the recommended ${RECOMMENDED_MAX_CELLS}; generation may be slow`,
    );
  }

  const grid = GridGraph.fromDimensions(config);
  const random = options.random ?? new SeededRandom(config.seed);
  const report = createBacktrackingGenerator(random).generate(grid);

  const start = mazeStart();
  const end = mazeEnd(config);
  const path = solveMaze(grid, start, end);

  return {
    width: config.width,
    height: config.height,
    depth: config.depth,
    seed: config.seed,
    start,
    end,
    walls: grid.walls(),
    path,
    report,
    stats: computeMazeStats(grid, path),
    checksum: computeMazeChecksum(grid),
    grid,
  };
}

function toMazeError(e: unknown): MazeError {
  if (MazeError.isMazeError(e)) return e;
  return new MazeError(
    "GENERATION_FAILED",
    e instanceof Error ? e.message : String(e),
  );
}

/**
 * Generate and solve a maze from (0, 0, 0) to the opposite corner.
 *
 * @example
 * ```typescript
 * const result = createMaze({ width: 9, height: 9, depth: 5, seed: 12345 });
 * if (result.success) {
 *   console.log(`Path length: ${result.value.path.length} steps`);
 * }
 * ```
 */
export function createMaze(
  input: BuildConfigInput = {},
  options: CreateMazeOptions = {},
): Result<MazeArtifact, MazeError> {
  return buildMazeConfig(input).flatMap((config) =>
    Result.fromThrowable(() => buildArtifact(config, options), toMazeError),
  );
}
