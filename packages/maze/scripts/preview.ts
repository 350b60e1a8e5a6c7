/**
 * Maze Preview Script
 *
 * Usage:
 *   npm run preview -- [options]
 *
 * Options:
 *   --width <n>    Maze width (default: 9)
 *   --height <n>   Maze height (default: 9)
 *   --depth <n>    Maze depth / layer count (default: 5)
 *   --seed <n>     Seed for generation (default: random)
 *   --ascii        Plain ASCII characters instead of unicode
 *   --no-color     Disable ANSI colors
 *   --quiet        Only print the rendered maze
 *   --help         Show this help
 *
 * Examples:
 *   npm run preview -- --seed 12345
 *   npm run preview -- --width 12 --height 6 --depth 3 --ascii
 */

import {
  type BuildConfigInput,
  buildMazeConfig,
  formatCell,
  MazeError,
  mazeEnd,
  mazeStart,
  SeededRandom,
} from "@maze3d/contracts";
import {
  BacktrackingGenerator,
  computeMazeStats,
  DEFAULT_CHARSET,
  GridGraph,
  renderAscii,
  SIMPLE_CHARSET,
  solveMaze,
} from "../src";

// =============================================================================
// CLI PARSING
// =============================================================================

interface Options {
  config: BuildConfigInput;
  ascii: boolean;
  color: boolean;
  quiet: boolean;
  help: boolean;
}

function parseNumber(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === "" || Number.isNaN(value)) {
    throw new Error(`${flag} expects a number, got ${raw ?? "nothing"}`);
  }
  return value;
}

function parseArgs(args: readonly string[]): Options {
  const options: Options = {
    config: {},
    ascii: false,
    color: process.stdout.isTTY === true,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "--width":
        options.config = { ...options.config, width: parseNumber(arg, args[++i]) };
        break;
      case "--height":
        options.config = { ...options.config, height: parseNumber(arg, args[++i]) };
        break;
      case "--depth":
        options.config = { ...options.config, depth: parseNumber(arg, args[++i]) };
        break;
      case "--seed":
        options.config = { ...options.config, seed: parseNumber(arg, args[++i]) };
        break;
      case "--ascii":
        options.ascii = true;
        break;
      case "--no-color":
        options.color = false;
        break;
      case "--quiet":
        options.quiet = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
3D Maze Preview

Usage: npm run preview -- [options]

Options:
  --width <n>    Maze width (default: 9)
  --height <n>   Maze height (default: 9)
  --depth <n>    Maze depth / layer count (default: 5)
  --seed <n>     Seed for generation (default: random)
  --ascii        Plain ASCII characters instead of unicode
  --no-color     Disable ANSI colors
  --quiet        Only print the rendered maze
  --help         Show this help
`);
}

// =============================================================================
// MAIN
// =============================================================================

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    printHelp();
    return;
  }

  const log = (message: string): void => {
    if (!options.quiet) console.log(message);
  };

  log("=".repeat(50));
  log("3D MAZE GENERATOR AND SOLVER");
  log("=".repeat(50));

  log("\n[1/4] Creating 3D maze structure...");
  const config = buildMazeConfig(options.config).getOrThrow();
  const grid = GridGraph.fromDimensions(config);
  log(`      ${config.width}x${config.height}x${config.depth} cells, seed ${config.seed}`);

  log("[2/4] Generating maze using recursive backtracking...");
  const report = new BacktrackingGenerator(new SeededRandom(config.seed)).generate(grid);
  log(`      ${report.carvedEdges} passages carved in ${report.durationMs.toFixed(1)}ms`);

  log("[3/4] Solving maze using BFS pathfinding...");
  const start = mazeStart();
  const end = mazeEnd(config);
  const path = solveMaze(grid, start, end);
  const stats = computeMazeStats(grid, path);
  log(`✓ Solution found from ${formatCell(start)} to ${formatCell(end)}! Path length: ${path.length} steps`);
  log(
    `      ${stats.deadEnds} dead ends, ${stats.junctions} junctions, ${stats.interLayerPassages} passages between layers`,
  );

  log("[4/4] Rendering layers...\n");
  console.log(
    renderAscii(grid, path, {
      charset: options.ascii ? SIMPLE_CHARSET : DEFAULT_CHARSET,
      useColors: options.color,
    }),
  );
}

try {
  main();
} catch (error) {
  if (MazeError.isMazeError(error)) {
    console.error(`✗ ${error.code}: ${error.message}`);
  } else {
    console.error(`✗ ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exitCode = 1;
}
