/**
 * Error codes for maze construction, generation and solving.
 * Using discriminated union for type-safe error handling.
 */
export type MazeErrorCode =
  | "INVALID_DIMENSION"
  | "NOT_ADJACENT"
  | "INVALID_CELL"
  | "NO_PATH_FOUND"
  | "ALREADY_GENERATED"
  | "CONFIG_INVALID"
  | "GENERATION_FAILED";

/**
 * Unified error type for all maze operations.
 *
 * @example
 * ```typescript
 * throw new MazeError(
 *   "NOT_ADJACENT",
 *   "Cells (0, 0, 0) and (2, 0, 0) are not adjacent",
 *   { a: { x: 0, y: 0, z: 0 }, b: { x: 2, y: 0, z: 0 } }
 * );
 * ```
 */
export class MazeError extends Error {
  readonly name = "MazeError";

  constructor(
    public readonly code: MazeErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MazeError);
    }
  }

  static create(
    code: MazeErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError(code, message, details);
  }

  static invalidDimension(
    message: string,
    details?: Record<string, unknown>,
  ): MazeError {
    return new MazeError("INVALID_DIMENSION", message, details);
  }

  static invalidCell(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("INVALID_CELL", message, details);
  }

  static notAdjacent(message: string, details?: Record<string, unknown>): MazeError {
    return new MazeError("NOT_ADJACENT", message, details);
  }

  /**
   * Check if an unknown error is a MazeError.
   */
  static isMazeError(error: unknown): error is MazeError {
    return error instanceof MazeError;
  }

  /**
   * Convert to a plain object for serialization.
   */
  toJSON(): {
    name: string;
    code: MazeErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
