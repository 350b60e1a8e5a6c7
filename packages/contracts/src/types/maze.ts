/**
 * Value types shared by the maze core and its consumers (renderers, CLI).
 */

/**
 * A cell of the 3D lattice. Identity is the coordinate triple itself.
 */
export interface Cell {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface MazeDimensions {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
}

/**
 * Axis of an edge between two adjacent cells.
 */
export type Axis = "x" | "y" | "z";

/**
 * A closed edge. `b` is always `a` moved by +1 along a single axis.
 */
export interface WallSegment {
  readonly a: Cell;
  readonly b: Cell;
  readonly axis: Axis;
}

/**
 * Ordered cells from start to end, inclusive.
 */
export type MazePath = readonly Cell[];

export function cell(x: number, y: number, z: number): Cell {
  return { x, y, z };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatCell(c: Cell): string {
  return `(${c.x}, ${c.y}, ${c.z})`;
}

/**
 * Start cell of every maze.
 */
export function mazeStart(): Cell {
  return { x: 0, y: 0, z: 0 };
}

/**
 * End cell of every maze: the corner opposite the start.
 */
export function mazeEnd(dimensions: MazeDimensions): Cell {
  return {
    x: dimensions.width - 1,
    y: dimensions.height - 1,
    z: dimensions.depth - 1,
  };
}
