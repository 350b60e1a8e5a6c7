import type { Axis, Cell } from "@maze3d/contracts";

export interface Direction {
  readonly dx: number;
  readonly dy: number;
  readonly dz: number;
  readonly axis: Axis;
}

export const AXES: readonly Axis[] = ["x", "y", "z"];

/**
 * Neighbor order used everywhere: axis order, then + before −.
 * Generation with a fixed random stream depends on this order.
 */
export const DIRECTIONS_6: readonly Direction[] = [
  { dx: 1, dy: 0, dz: 0, axis: "x" },
  { dx: -1, dy: 0, dz: 0, axis: "x" },
  { dx: 0, dy: 1, dz: 0, axis: "y" },
  { dx: 0, dy: -1, dz: 0, axis: "y" },
  { dx: 0, dy: 0, dz: 1, axis: "z" },
  { dx: 0, dy: 0, dz: -1, axis: "z" },
];

export function step(cell: Cell, direction: Direction): Cell {
  return {
    x: cell.x + direction.dx,
    y: cell.y + direction.dy,
    z: cell.z + direction.dz,
  };
}
