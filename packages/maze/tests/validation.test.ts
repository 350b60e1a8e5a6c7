import { cell, SeededRandom } from "@maze3d/contracts";
import { describe, expect, it } from "vitest";
import {
  BacktrackingGenerator,
  computeMazeStats,
  GridGraph,
  solveMaze,
  validateMaze,
} from "../src";
import { ORIGIN, scriptedSquare } from "./helpers";

describe("validateMaze", () => {
  it("accepts a generated maze without violations", () => {
    const grid = GridGraph.create(4, 3, 2);
    new BacktrackingGenerator(new SeededRandom(6)).generate(grid);
    expect(validateMaze(grid)).toEqual({ success: true, violations: [] });
  });

  it("reports edge count, connectivity and the missing generation on a fresh grid", () => {
    const result = validateMaze(GridGraph.create(2, 2, 1));
    expect(result.success).toBe(false);
    expect(result.violations).toEqual([
      {
        type: "invariant.edges.count",
        message: "Expected 3 open edges, found 0",
        severity: "error",
      },
      {
        type: "invariant.connectivity",
        message: "3 of 4 cells unreachable from (0, 0, 0)",
        severity: "error",
      },
      {
        type: "maze.not_generated",
        message: "Grid has not been carved by a generator",
        severity: "warning",
      },
    ]);
  });

  it("flags a cycle through the edge count", () => {
    const grid = GridGraph.create(2, 2, 1);
    grid.setOpen(ORIGIN, cell(1, 0, 0));
    grid.setOpen(ORIGIN, cell(0, 1, 0));
    grid.setOpen(cell(1, 0, 0), cell(1, 1, 0));
    grid.setOpen(cell(0, 1, 0), cell(1, 1, 0));
    grid.markGenerated();
    expect(validateMaze(grid)).toEqual({
      success: false,
      violations: [
        {
          type: "invariant.edges.count",
          message: "Expected 3 open edges, found 4",
          severity: "error",
        },
      ],
    });
  });

  it("treats an uncarved single cell as valid with a warning", () => {
    const result = validateMaze(GridGraph.create(1, 1, 1));
    expect(result.success).toBe(true);
    expect(result.violations.map((v) => v.severity)).toEqual(["warning"]);
  });
});

describe("computeMazeStats", () => {
  it("counts dead ends, junctions and walls", () => {
    const grid = scriptedSquare(0);
    const path = solveMaze(grid, ORIGIN, cell(1, 1, 0));
    expect(computeMazeStats(grid, path)).toEqual({
      cellCount: 4,
      openEdgeCount: 3,
      wallCount: 1,
      deadEnds: 2,
      junctions: 0,
      interLayerPassages: 0,
      solutionLength: 2,
    });
  });

  it("leaves solutionLength null without a path", () => {
    expect(computeMazeStats(scriptedSquare(0)).solutionLength).toBeNull();
  });

  it("finds a junction where three passages meet", () => {
    const grid = GridGraph.create(3, 2, 1);
    grid.setOpen(cell(1, 0, 0), cell(0, 0, 0));
    grid.setOpen(cell(1, 0, 0), cell(2, 0, 0));
    grid.setOpen(cell(1, 0, 0), cell(1, 1, 0));
    const stats = computeMazeStats(grid);
    expect(stats.junctions).toBe(1);
    expect(stats.deadEnds).toBe(3);
  });

  it("needs at least depth - 1 passages between layers", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const grid = GridGraph.create(4, 4, 3);
      new BacktrackingGenerator(new SeededRandom(seed)).generate(grid);
      expect(computeMazeStats(grid).interLayerPassages).toBeGreaterThanOrEqual(2);
    }
  });
});
