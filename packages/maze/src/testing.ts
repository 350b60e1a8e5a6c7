/**
 * Testing utilities for maze generation.
 */

import type { MazeConfig } from "@maze3d/contracts";
import { createMaze } from "./api";

/**
 * Error thrown when determinism assertion fails
 */
export class DeterminismViolationError extends Error {
  constructor(
    public readonly checksums: string[],
    public readonly config: MazeConfig,
  ) {
    super(
      `Non-deterministic generation detected: produced ${checksums.length} different checksums for the same seed`,
    );
    this.name = "DeterminismViolationError";
  }
}

/**
 * Run generation several times with the same config and require identical
 * checksums.
 *
 * @throws {DeterminismViolationError} If runs produce different checksums
 *
 * @example
 * ```typescript
 * it("is deterministic", () => {
 *   assertDeterministic({ width: 6, height: 6, depth: 3, seed: 12345 });
 * });
 * ```
 */
export function assertDeterministic(config: MazeConfig, runs: number = 3): void {
  const checksums: string[] = [];

  for (let i = 0; i < runs; i++) {
    const result = createMaze(config);
    if (!result.success) {
      throw new Error(
        `Generation failed on run ${i + 1}: ${result.error.message}`,
      );
    }
    checksums.push(result.value.checksum);
  }

  const uniqueChecksums = [...new Set(checksums)];
  if (uniqueChecksums.length > 1) {
    throw new DeterminismViolationError(uniqueChecksums, config);
  }
}
