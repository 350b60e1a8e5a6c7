import { describe, expect, it } from "vitest";
import {
  buildMazeConfig,
  DEFAULT_DEPTH,
  DEFAULT_HEIGHT,
  DEFAULT_WIDTH,
  MAX_CELLS,
} from "../src";

describe("buildMazeConfig", () => {
  it("applies default dimensions and draws a seed", () => {
    const res = buildMazeConfig();
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.width).toBe(DEFAULT_WIDTH);
    expect(res.value.height).toBe(DEFAULT_HEIGHT);
    expect(res.value.depth).toBe(DEFAULT_DEPTH);
    expect(Number.isInteger(res.value.seed)).toBe(true);
    expect(res.value.seed).toBeGreaterThanOrEqual(0);
  });

  it("keeps explicit values", () => {
    const res = buildMazeConfig({ width: 3, height: 2, depth: 1, seed: 42 });
    expect(res.toJSON()).toEqual({
      success: true,
      value: { width: 3, height: 2, depth: 1, seed: 42 },
    });
  });

  it("accepts a single-cell maze", () => {
    const res = buildMazeConfig({ width: 1, height: 1, depth: 1, seed: 0 });
    expect(res.success).toBe(true);
  });

  it("rejects dimensions below 1 as INVALID_DIMENSION", () => {
    const res = buildMazeConfig({ width: 0, seed: 1 });
    if (res.success) throw new Error("expected failure");
    expect(res.error.code).toBe("INVALID_DIMENSION");
    expect(res.error.message).toBe("width: Dimensions must be at least 1");
  });

  it("rejects fractional dimensions", () => {
    const res = buildMazeConfig({ depth: 2.5, seed: 1 });
    if (res.success) throw new Error("expected failure");
    expect(res.error.code).toBe("INVALID_DIMENSION");
  });

  it("rejects seeds outside uint32 as CONFIG_INVALID", () => {
    const res = buildMazeConfig({ seed: -1 });
    if (res.success) throw new Error("expected failure");
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.message).toBe("seed: Seed must be non-negative");
  });

  it("rejects mazes above the cell cap", () => {
    const res = buildMazeConfig({ width: 256, height: 256, depth: 5, seed: 1 });
    if (res.success) throw new Error("expected failure");
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.message).toBe(
      `Maze has ${256 * 256 * 5} cells (max ${MAX_CELLS})`,
    );
  });
});
