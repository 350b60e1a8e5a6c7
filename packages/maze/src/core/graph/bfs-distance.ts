/**
 * BFS Distance Calculation
 *
 * Hop distances from a source node over any graph given as a neighbor
 * function. Used for connectivity checks on carved mazes.
 */

import { FastQueue } from "../data-structures/fast-queue";

export interface BFSDistanceResult<TNodeId> {
  /** Map from node ID to distance from source */
  readonly distances: Map<TNodeId, number>;
  /** Maximum distance from source */
  readonly maxDistance: number;
}

/**
 * Calculate distances from a source node using BFS.
 *
 * @example
 * ```typescript
 * const { distances } = calculateBFSDistances(
 *   grid.indexOf(mazeStart()),
 *   (index) => grid.openNeighbors(grid.cellAt(index)).map((c) => grid.indexOf(c)),
 * );
 * const connected = distances.size === grid.cellCount;
 * ```
 */
export function calculateBFSDistances<TNodeId>(
  sourceId: TNodeId,
  getNeighbors: (nodeId: TNodeId) => readonly TNodeId[],
): BFSDistanceResult<TNodeId> {
  const distances = new Map<TNodeId, number>([[sourceId, 0]]);
  const queue = FastQueue.from([sourceId]);
  let maxDistance = 0;

  for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
    const nextDistance = (distances.get(current) ?? 0) + 1;

    for (const neighbor of getNeighbors(current)) {
      if (!distances.has(neighbor)) {
        distances.set(neighbor, nextDistance);
        if (nextDistance > maxDistance) {
          maxDistance = nextDistance;
        }
        queue.enqueue(neighbor);
      }
    }
  }

  return { distances, maxDistance };
}
