import type { RandomSource } from "./rng";

/**
 * Replays a fixed list of values, wrapping around at the end.
 *
 * Lets tests script every neighbor choice the generator makes.
 *
 * @example
 * ```typescript
 * // Always take the first unvisited neighbor
 * const generator = new BacktrackingGenerator(new SequenceRandom([0]));
 * ```
 */
export class SequenceRandom implements RandomSource {
  private readonly values: readonly number[];
  private cursor = 0;

  constructor(values: readonly number[]) {
    if (values.length === 0) {
      throw new Error("SequenceRandom needs at least one value");
    }
    for (const value of values) {
      if (!(value >= 0 && value < 1)) {
        throw new Error(`SequenceRandom values must be in [0, 1), got ${value}`);
      }
    }
    this.values = [...values];
  }

  /**
   * Number of values handed out so far.
   */
  get draws(): number {
    return this.cursor;
  }

  next(): number {
    const value = this.values[this.cursor % this.values.length] ?? 0;
    this.cursor++;
    return value;
  }
}
