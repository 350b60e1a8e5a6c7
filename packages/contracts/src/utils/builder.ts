import type { z } from "zod";
import { DIMENSION_KEYS, type MazeConfig, MazeConfigSchema } from "../schemas/config";
import { MazeError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";
import { randomUint32 } from "../random/system-random";

export const DEFAULT_WIDTH = 9;
export const DEFAULT_HEIGHT = 9;
export const DEFAULT_DEPTH = 5;

export type BuildConfigInput = Partial<MazeConfig>;

type ConfigIssue = z.ZodError["issues"][number];

function isDimensionIssue(issue: ConfigIssue): boolean {
  const key = issue.path[0];
  return DIMENSION_KEYS.some((dimension) => dimension === key);
}

function toMazeError(issues: readonly ConfigIssue[]): MazeError {
  const message = issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.map(String).join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
  const code = issues.some(isDimensionIssue)
    ? "INVALID_DIMENSION"
    : "CONFIG_INVALID";
  return new MazeError(code, message, {
    issues: issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
    })),
  });
}

/**
 * Fill defaults and validate a maze configuration.
 *
 * A missing seed is drawn from `randomUint32()`, so the returned config
 * always pins down a single maze.
 */
export function buildMazeConfig(
  input: BuildConfigInput = {},
): Result<MazeConfig, MazeError> {
  const candidate = {
    width: input.width ?? DEFAULT_WIDTH,
    height: input.height ?? DEFAULT_HEIGHT,
    depth: input.depth ?? DEFAULT_DEPTH,
    seed: input.seed ?? randomUint32(),
  };

  const parsed = MazeConfigSchema.safeParse(candidate);
  if (!parsed.success) return Err(toMazeError(parsed.error.issues));
  return Ok(parsed.data);
}
