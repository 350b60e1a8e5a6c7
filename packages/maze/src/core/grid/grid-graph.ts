/**
 * 3D lattice of cells with an open/closed state for every edge between
 * axis-adjacent cells. Uses flat Uint8Array storage.
 */

import {
  type Axis,
  type Cell,
  formatCell,
  type MazeDimensions,
  MazeError,
  type WallSegment,
} from "@maze3d/contracts";
import { AXES, DIRECTIONS_6, step } from "./directions";

const EDGE_CLOSED = 0;
const EDGE_OPEN = 1;

/**
 * An edge paired with its state, as enumerated by `GridGraph`.
 */
export interface EdgeEntry extends WallSegment {
  readonly open: boolean;
}

/**
 * Grid graph backing a maze.
 *
 * Each cell owns the three edges leading to its +x, +y and +z neighbors,
 * stored at `index * 3 + axis`. Slots pointing outside the grid stay
 * closed and are never enumerated.
 *
 * @remarks
 * Cells are plain `{ x, y, z }` values; the grid never hands out
 * references into its own storage.
 */
export class GridGraph implements MazeDimensions {
  readonly width: number;
  readonly height: number;
  readonly depth: number;
  readonly cellCount: number;
  /** Number of possible edges (open or closed) */
  readonly edgeCount: number;

  private readonly edges: Uint8Array;
  private openCount = 0;
  private generated = false;

  private constructor(width: number, height: number, depth: number) {
    this.width = width;
    this.height = height;
    this.depth = depth;
    this.cellCount = width * height * depth;
    this.edgeCount =
      (width - 1) * height * depth +
      width * (height - 1) * depth +
      width * height * (depth - 1);
    this.edges = new Uint8Array(this.cellCount * AXES.length);
  }

  /**
   * Create a grid with every edge closed.
   *
   * @throws {MazeError} INVALID_DIMENSION if a dimension is not an integer >= 1
   */
  static create(width: number, height: number, depth: number): GridGraph {
    const requested = { width, height, depth };
    for (const [name, value] of Object.entries(requested)) {
      if (!Number.isInteger(value) || value < 1) {
        throw MazeError.invalidDimension(
          `Invalid ${name}: ${value} (must be an integer >= 1)`,
          requested,
        );
      }
    }
    return new GridGraph(width, height, depth);
  }

  static fromDimensions(dimensions: MazeDimensions): GridGraph {
    return GridGraph.create(dimensions.width, dimensions.height, dimensions.depth);
  }

  get dimensions(): MazeDimensions {
    return { width: this.width, height: this.height, depth: this.depth };
  }

  get openEdgeCount(): number {
    return this.openCount;
  }

  /**
   * Whether a generator has already carved this grid.
   */
  get isGenerated(): boolean {
    return this.generated;
  }

  markGenerated(): void {
    this.generated = true;
  }

  /**
   * Close every edge and clear the generated flag.
   */
  reset(): void {
    this.edges.fill(EDGE_CLOSED);
    this.openCount = 0;
    this.generated = false;
  }

  // ===========================================================================
  // CELLS
  // ===========================================================================

  contains(cell: Cell): boolean {
    return (
      Number.isInteger(cell.x) &&
      Number.isInteger(cell.y) &&
      Number.isInteger(cell.z) &&
      cell.x >= 0 &&
      cell.x < this.width &&
      cell.y >= 0 &&
      cell.y < this.height &&
      cell.z >= 0 &&
      cell.z < this.depth
    );
  }

  /**
   * Linear index `x + width * (y + height * z)`.
   *
   * @throws {MazeError} INVALID_CELL if the cell is outside the grid
   */
  indexOf(cell: Cell): number {
    this.assertContains(cell);
    return this.unsafeIndexOf(cell);
  }

  /**
   * @throws {MazeError} INVALID_CELL if the index is outside [0, cellCount)
   */
  cellAt(index: number): Cell {
    if (!Number.isInteger(index) || index < 0 || index >= this.cellCount) {
      throw MazeError.invalidCell(
        `Cell index ${index} is outside [0, ${this.cellCount})`,
        { index },
      );
    }
    const x = index % this.width;
    const rest = (index - x) / this.width;
    const y = rest % this.height;
    return { x, y, z: (rest - y) / this.height };
  }

  /**
   * In-bounds adjacent cells in the order +x, −x, +y, −y, +z, −z.
   */
  neighbors(cell: Cell): Cell[] {
    this.assertContains(cell);
    const result: Cell[] = [];
    for (const direction of DIRECTIONS_6) {
      const next = step(cell, direction);
      if (this.contains(next)) {
        result.push(next);
      }
    }
    return result;
  }

  /**
   * Neighbors reachable through an open edge, in `neighbors` order.
   */
  openNeighbors(cell: Cell): Cell[] {
    return this.neighbors(cell).filter(
      (next) => this.edges[this.edgeSlot(cell, next)] === EDGE_OPEN,
    );
  }

  // ===========================================================================
  // EDGES
  // ===========================================================================

  /**
   * @throws {MazeError} INVALID_CELL if either cell is outside the grid
   * @throws {MazeError} NOT_ADJACENT if the cells are not grid-adjacent
   */
  isOpen(a: Cell, b: Cell): boolean {
    return this.edges[this.edgeSlot(a, b)] === EDGE_OPEN;
  }

  /**
   * Open the edge between two adjacent cells. Opening an open edge is a no-op.
   *
   * @throws {MazeError} INVALID_CELL if either cell is outside the grid
   * @throws {MazeError} NOT_ADJACENT if the cells are not grid-adjacent
   */
  setOpen(a: Cell, b: Cell): void {
    const slot = this.edgeSlot(a, b);
    if (this.edges[slot] === EDGE_OPEN) return;
    this.edges[slot] = EDGE_OPEN;
    this.openCount++;
  }

  /**
   * Closed edges, ordered by lower cell index and then axis.
   */
  walls(): WallSegment[] {
    const result: WallSegment[] = [];
    for (const entry of this.entries()) {
      if (!entry.open) {
        result.push({ a: entry.a, b: entry.b, axis: entry.axis });
      }
    }
    return result;
  }

  /**
   * Open edges, in the same order as `walls()`.
   */
  openEdges(): WallSegment[] {
    const result: WallSegment[] = [];
    for (const entry of this.entries()) {
      if (entry.open) {
        result.push({ a: entry.a, b: entry.b, axis: entry.axis });
      }
    }
    return result;
  }

  /**
   * Every possible edge with its state.
   */
  *entries(): Generator<EdgeEntry> {
    for (let index = 0; index < this.cellCount; index++) {
      const a = this.cellAt(index);
      for (let axisIndex = 0; axisIndex < AXES.length; axisIndex++) {
        const direction = DIRECTIONS_6[axisIndex * 2];
        const axis = AXES[axisIndex];
        if (!direction || !axis) continue;
        const b = step(a, direction);
        if (!this.contains(b)) continue;
        yield {
          a,
          b,
          axis,
          open: this.edges[index * AXES.length + axisIndex] === EDGE_OPEN,
        };
      }
    }
  }

  /**
   * Copy of the raw edge-state table (one byte per slot, 1 = open).
   */
  edgeStates(): Uint8Array {
    return this.edges.slice();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private assertContains(cell: Cell): void {
    if (!this.contains(cell)) {
      throw MazeError.invalidCell(
        `Cell ${formatCell(cell)} is outside the ${this.width}x${this.height}x${this.depth} grid`,
        { cell },
      );
    }
  }

  private unsafeIndexOf(cell: Cell): number {
    return cell.x + this.width * (cell.y + this.height * cell.z);
  }

  private edgeSlot(a: Cell, b: Cell): number {
    this.assertContains(a);
    this.assertContains(b);

    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const dz = b.z - a.z;
    if (Math.abs(dx) + Math.abs(dy) + Math.abs(dz) !== 1) {
      throw MazeError.notAdjacent(
        `Cells ${formatCell(a)} and ${formatCell(b)} are not adjacent`,
        { a, b },
      );
    }

    const axis: Axis = dx !== 0 ? "x" : dy !== 0 ? "y" : "z";
    const lower = dx + dy + dz > 0 ? a : b;
    return this.unsafeIndexOf(lower) * AXES.length + AXES.indexOf(axis);
  }
}
