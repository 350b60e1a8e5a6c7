import { SeededRandom } from "./seeded-random";

interface CryptoLike {
  getRandomValues?: (array: Uint32Array) => Uint32Array;
}

let fallbackCounter = 0;

function fallbackUint32(): number {
  fallbackCounter = (fallbackCounter + 0x9e3779b9) >>> 0;
  const mixedSeed = (Date.now() ^ fallbackCounter) >>> 0;
  return Math.floor(new SeededRandom(mixedSeed).next() * 0x100000000) >>> 0;
}

/**
 * Unsigned 32-bit random integer, used as the seed when none is given.
 *
 * Uses Web Crypto when the runtime exposes it and falls back to a
 * time-mixed PRNG otherwise.
 */
export function randomUint32(): number {
  const cryptoLike: CryptoLike | undefined = globalThis.crypto;

  if (cryptoLike?.getRandomValues) {
    const buffer = new Uint32Array(1);
    cryptoLike.getRandomValues(buffer);
    const value = buffer[0];
    if (value !== undefined) return value >>> 0;
  }

  return fallbackUint32();
}
