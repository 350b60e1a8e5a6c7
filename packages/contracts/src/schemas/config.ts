import { z } from "zod";

const UINT32_MAX = 0xffffffff;

/**
 * Largest accepted extent along any axis.
 */
export const MAX_DIMENSION = 256;

/**
 * Hard cap on width × height × depth.
 */
export const MAX_CELLS = 262_144;

/**
 * Above this many cells generation still works but is no longer instant.
 */
export const RECOMMENDED_MAX_CELLS = 4_096;

export const DIMENSION_KEYS = ["width", "height", "depth"] as const;

const DimensionSchema = z
  .number()
  .int("Dimensions must be integers")
  .min(1, "Dimensions must be at least 1")
  .max(MAX_DIMENSION, `Dimensions cannot exceed ${MAX_DIMENSION}`);

export const SeedSchema = z
  .number()
  .int("Seed must be an integer")
  .min(0, "Seed must be non-negative")
  .max(UINT32_MAX, "Seed must fit in uint32");

export const MazeConfigSchema = z
  .object({
    width: DimensionSchema,
    height: DimensionSchema,
    depth: DimensionSchema,
    seed: SeedSchema,
  })
  .superRefine((data, ctx) => {
    const cells = data.width * data.height * data.depth;
    if (cells > MAX_CELLS) {
      ctx.addIssue({
        code: "custom",
        message: `Maze has ${cells} cells (max ${MAX_CELLS})`,
        path: [],
      });
    }
  });

export type MazeConfig = z.infer<typeof MazeConfigSchema>;
