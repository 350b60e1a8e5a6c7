import { cell, SeededRandom } from "@maze3d/contracts";
import { describe, expect, it } from "vitest";
import {
  BacktrackingGenerator,
  computeMazeChecksum,
  FNV64Hasher,
  fnv64,
  GridGraph,
} from "../src";
import { ORIGIN } from "./helpers";

describe("fnv64", () => {
  it("matches the FNV-1a 64 reference values", () => {
    expect(fnv64("")).toBe("cbf29ce484222325");
    expect(fnv64("a")).toBe("af63dc4c8601ec8c");
  });

  it("hashes int32 values little-endian", () => {
    const viaInt = new FNV64Hasher().updateInt32(0x04030201).digest();
    const viaBytes = new FNV64Hasher()
      .updateBytes(new Uint8Array([1, 2, 3, 4]))
      .digest();
    expect(viaInt).toBe(viaBytes);
  });
});

describe("computeMazeChecksum", () => {
  it("is versioned and stable for the same maze", () => {
    const make = (): GridGraph => {
      const grid = GridGraph.create(5, 5, 2);
      new BacktrackingGenerator(new SeededRandom(31)).generate(grid);
      return grid;
    };
    const checksum = computeMazeChecksum(make());
    expect(checksum).toMatch(/^v1:[0-9a-f]{16}$/);
    expect(computeMazeChecksum(make())).toBe(checksum);
  });

  it("changes when an edge opens", () => {
    const grid = GridGraph.create(2, 2, 1);
    const before = computeMazeChecksum(grid);
    grid.setOpen(ORIGIN, cell(1, 0, 0));
    expect(computeMazeChecksum(grid)).not.toBe(before);
  });

  it("depends on dimensions", () => {
    expect(computeMazeChecksum(GridGraph.create(2, 1, 1))).not.toBe(
      computeMazeChecksum(GridGraph.create(1, 2, 1)),
    );
  });
});
