/**
 * Maze Checksum Calculator
 *
 * Fingerprint of a carved grid, used to verify generation determinism.
 * Format: "v{version}:{hash}".
 */

import type { GridGraph } from "../grid/grid-graph";
import { FNV64Hasher } from "./fnv64";

/**
 * Increment when changing what data is hashed or how.
 */
export const CHECKSUM_VERSION = 1;

export function computeMazeChecksum(grid: GridGraph): string {
  const hash = new FNV64Hasher()
    .updateInt32(grid.width)
    .updateInt32(grid.height)
    .updateInt32(grid.depth)
    .updateBytes(grid.edgeStates())
    .digest();
  return `v${CHECKSUM_VERSION}:${hash}`;
}
