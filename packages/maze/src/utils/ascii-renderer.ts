/**
 * ASCII Maze Renderer
 *
 * Draws each z layer as a (2w+1) x (2h+1) character map: cells sit at odd
 * rows/columns, the edges between them in between, and every even/even
 * position is a wall corner.
 *
 * @example
 * ```typescript
 * const result = createMaze({ width: 6, height: 4, depth: 2, seed: 7 });
 * if (result.success) {
 *   console.log(renderAscii(result.value.grid, result.value.path));
 * }
 * ```
 */

import { type Cell, cellsEqual, type MazePath } from "@maze3d/contracts";
import type { GridGraph } from "../core/grid/grid-graph";

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AsciiCharset {
  readonly wall: string;
  readonly floor: string;
  readonly path: string;
  readonly start: string;
  readonly end: string;
  /** Cell with an open passage to the layer above (z + 1) */
  readonly up: string;
  /** Cell with an open passage to the layer below (z − 1) */
  readonly down: string;
  readonly upDown: string;
}

export const DEFAULT_CHARSET: AsciiCharset = {
  wall: "█",
  floor: " ",
  path: "•",
  start: "S",
  end: "E",
  up: "↑",
  down: "↓",
  upDown: "↕",
};

/**
 * For terminals without unicode support
 */
export const SIMPLE_CHARSET: AsciiCharset = {
  wall: "#",
  floor: " ",
  path: "*",
  start: "S",
  end: "E",
  up: "u",
  down: "d",
  upDown: "x",
};

export interface RenderOptions {
  readonly charset?: AsciiCharset;
  /** Color output (ANSI escape codes) */
  readonly useColors?: boolean;
  /** Print a "z=N" line above each layer */
  readonly showLayerHeaders?: boolean;
}

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
} as const;

// =============================================================================
// RENDERING
// =============================================================================

function edgeKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

function colorize(text: string, color: string, useColors: boolean): string {
  return useColors ? `${color}${text}${ANSI.reset}` : text;
}

/**
 * Render one z layer as lines of text.
 */
export function renderLayer(
  grid: GridGraph,
  z: number,
  path: MazePath = [],
  options: RenderOptions = {},
): string[] {
  const charset = options.charset ?? DEFAULT_CHARSET;
  const useColors = options.useColors ?? false;

  const onPath = new Set(path.map((c) => grid.indexOf(c)));
  const pathEdges = new Set<string>();
  for (let i = 1; i < path.length; i++) {
    const previous = path[i - 1];
    const current = path[i];
    if (previous && current) {
      pathEdges.add(edgeKey(grid.indexOf(previous), grid.indexOf(current)));
    }
  }

  const first = path[0];
  const last = path[path.length - 1];
  const wall = colorize(charset.wall, ANSI.dim, useColors);
  const pathChar = colorize(charset.path, ANSI.cyan, useColors);

  const cellChar = (cell: Cell): string => {
    if (first && cellsEqual(cell, first)) {
      return colorize(charset.start, ANSI.green, useColors);
    }
    if (last && cellsEqual(cell, last)) {
      return colorize(charset.end, ANSI.red, useColors);
    }
    if (onPath.has(grid.indexOf(cell))) return pathChar;

    const up = cell.z + 1 < grid.depth && grid.isOpen(cell, { ...cell, z: cell.z + 1 });
    const down = cell.z > 0 && grid.isOpen(cell, { ...cell, z: cell.z - 1 });
    if (up && down) return charset.upDown;
    if (up) return charset.up;
    if (down) return charset.down;
    return charset.floor;
  };

  const connectorChar = (a: Cell, b: Cell): string => {
    if (!grid.isOpen(a, b)) return wall;
    return pathEdges.has(edgeKey(grid.indexOf(a), grid.indexOf(b)))
      ? pathChar
      : charset.floor;
  };

  const lines: string[] = [];
  for (let row = 0; row <= grid.height * 2; row++) {
    let line = "";
    for (let col = 0; col <= grid.width * 2; col++) {
      const x = (col - 1) / 2;
      const y = (row - 1) / 2;
      const oddRow = row % 2 === 1;
      const oddCol = col % 2 === 1;

      if (oddRow && oddCol) {
        line += cellChar({ x, y, z });
      } else if (oddRow && col > 0 && col < grid.width * 2) {
        // between (x - ½, y) and (x + ½, y)
        line += connectorChar({ x: x - 0.5, y, z }, { x: x + 0.5, y, z });
      } else if (oddCol && row > 0 && row < grid.height * 2) {
        line += connectorChar({ x, y: y - 0.5, z }, { x, y: y + 0.5, z });
      } else {
        line += wall;
      }
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Render every layer, separated by blank lines.
 */
export function renderAscii(
  grid: GridGraph,
  path: MazePath = [],
  options: RenderOptions = {},
): string {
  const showHeaders = options.showLayerHeaders ?? true;
  const blocks: string[] = [];
  for (let z = 0; z < grid.depth; z++) {
    const lines = renderLayer(grid, z, path, options);
    blocks.push((showHeaders ? [`z=${z}`, ...lines] : lines).join("\n"));
  }
  return blocks.join("\n\n");
}
