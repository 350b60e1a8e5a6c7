import {
  cell,
  type Cell,
  MazeError,
  type MazeErrorCode,
  SequenceRandom,
} from "@maze3d/contracts";
import { BacktrackingGenerator, GridGraph } from "../src";

/**
 * Run `fn` and return the MazeError code it throws.
 */
export function thrownCode(fn: () => unknown): MazeErrorCode {
  try {
    fn();
  } catch (error) {
    if (MazeError.isMazeError(error)) return error.code;
    throw error;
  }
  throw new Error("expected a MazeError to be thrown");
}

/**
 * 2x2x1 maze carved with a constant random value.
 * 0 always takes the first candidate, 0.99 the last.
 */
export function scriptedSquare(value: number): GridGraph {
  const grid = GridGraph.create(2, 2, 1);
  new BacktrackingGenerator(new SequenceRandom([value])).generate(grid);
  return grid;
}

export const ORIGIN: Cell = cell(0, 0, 0);
