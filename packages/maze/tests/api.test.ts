import { cell, SequenceRandom } from "@maze3d/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  assertDeterministic,
  createMaze,
  DeterminismViolationError,
} from "../src";

describe("createMaze", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds the full artifact for a scripted 2x2x1 maze", () => {
    const result = createMaze(
      { width: 2, height: 2, depth: 1, seed: 7 },
      { random: new SequenceRandom([0]) },
    );
    if (!result.success) throw new Error(result.error.message);
    const maze = result.value;

    expect(maze.seed).toBe(7);
    expect(maze.start).toEqual(cell(0, 0, 0));
    expect(maze.end).toEqual(cell(1, 1, 0));
    expect(maze.walls).toEqual([
      { a: cell(0, 0, 0), b: cell(0, 1, 0), axis: "y" },
    ]);
    expect(maze.path).toEqual([cell(0, 0, 0), cell(1, 0, 0), cell(1, 1, 0)]);
    expect(maze.report.carvedEdges).toBe(3);
    expect(maze.stats.solutionLength).toBe(2);
    expect(maze.checksum).toMatch(/^v1:[0-9a-f]{16}$/);
    expect(maze.grid.isGenerated).toBe(true);
  });

  it("ends at the corner opposite the start", () => {
    const maze = createMaze({ width: 5, height: 3, depth: 4, seed: 2 }).getOrThrow();
    expect(maze.end).toEqual(cell(4, 2, 3));
    expect(maze.path[maze.path.length - 1]).toEqual(cell(4, 2, 3));
    expect(maze.walls).toHaveLength(maze.grid.edgeCount - (5 * 3 * 4 - 1));
  });

  it("solves a single-cell maze with a one-cell path", () => {
    const maze = createMaze({ width: 1, height: 1, depth: 1, seed: 0 }).getOrThrow();
    expect(maze.walls).toEqual([]);
    expect(maze.path).toEqual([cell(0, 0, 0)]);
  });

  it("uses the default 9x9x5 size", () => {
    const maze = createMaze({ seed: 1 }).getOrThrow();
    expect([maze.width, maze.height, maze.depth]).toEqual([9, 9, 5]);
    expect(maze.stats.openEdgeCount).toBe(404);
  });

  it("returns configuration errors instead of throwing", () => {
    const result = createMaze({ width: 0 });
    if (result.success) throw new Error("expected failure");
    expect(result.error.code).toBe("INVALID_DIMENSION");
  });

  it("wraps generation failures", () => {
    const result = createMaze(
      { width: 3, height: 1, depth: 1, seed: 1 },
      { random: { next: () => Number.NaN } },
    );
    if (result.success) throw new Error("expected failure");
    expect(result.error.code).toBe("GENERATION_FAILED");
  });

  it("warns above the recommended size", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createMaze({ width: 20, height: 20, depth: 11, seed: 3 }).getOrThrow();
    expect(warn).toHaveBeenCalledWith(
      "createMaze: 4400 cells exceeds the recommended 4096; generation may be slow",
    );
  });

  it("gives the same checksum for the same seed", () => {
    const a = createMaze({ width: 6, height: 6, depth: 3, seed: 12345 }).getOrThrow();
    const b = createMaze({ width: 6, height: 6, depth: 3, seed: 12345 }).getOrThrow();
    expect(a.checksum).toBe(b.checksum);
    expect(a.path).toEqual(b.path);
  });
});

describe("assertDeterministic", () => {
  it("passes for seeded generation", () => {
    expect(() =>
      assertDeterministic({ width: 5, height: 4, depth: 3, seed: 99 }, 4),
    ).not.toThrow();
  });

  it("describes a violation", () => {
    const error = new DeterminismViolationError(["v1:a", "v1:b"], {
      width: 2,
      height: 2,
      depth: 1,
      seed: 1,
    });
    expect(error.name).toBe("DeterminismViolationError");
    expect(error.message).toBe(
      "Non-deterministic generation detected: produced 2 different checksums for the same seed",
    );
  });
});
