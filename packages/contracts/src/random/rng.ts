/**
 * Random sources and the helpers that draw from them.
 */

/**
 * Anything that yields numbers in [0, 1).
 *
 * Maze generation takes one of these instead of reading `Math.random`,
 * so a fixed stream always carves the same maze.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Random index in [0, length).
 * @param rng - Source of numbers in [0, 1)
 * @param length - Number of candidates, at least 1
 */
export function pickIndex(rng: RandomSource, length: number): number {
  return Math.floor(rng.next() * length);
}

/**
 * Uniform choice from an array; undefined when it is empty.
 */
export function choice<T>(rng: RandomSource, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[pickIndex(rng, array.length)];
}

/**
 * Wrap a plain `() => number` function (e.g. `Math.random`) as a source.
 */
export function fromFunction(fn: () => number): RandomSource {
  return { next: fn };
}
