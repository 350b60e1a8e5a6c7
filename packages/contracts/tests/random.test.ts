import { describe, expect, it } from "vitest";
import {
  choice,
  fromFunction,
  pickIndex,
  randomUint32,
  SeededRandom,
  SequenceRandom,
} from "../src";

describe("SeededRandom (xoshiro128++)", () => {
  it("produces deterministic sequences and supports state restore", () => {
    const rngA = new SeededRandom(123456);
    const seqA = Array.from({ length: 5 }, () => rngA.next());
    const savedState = rngA.getState();

    const rngB = new SeededRandom(123456);
    const seqB = Array.from({ length: 5 }, () => rngB.next());
    expect(seqB).toEqual(seqA);

    const advanced = rngA.next();
    rngA.setState(savedState);
    expect(rngA.next()).toBe(advanced);
  });

  it("diverges for different seeds", () => {
    const a = new SeededRandom(1);
    const b = new SeededRandom(2);
    const seqA = Array.from({ length: 4 }, () => a.next());
    const seqB = Array.from({ length: 4 }, () => b.next());
    expect(seqA).not.toEqual(seqB);
  });

  it("stays within [0, 1) and approximates a uniform mean", () => {
    const rng = new SeededRandom(987654321);
    const samples = 20000;
    let sum = 0;
    for (let i = 0; i < samples; i++) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
      sum += value;
    }
    const mean = sum / samples;
    expect(mean).toBeGreaterThan(0.49);
    expect(mean).toBeLessThan(0.51);
  });

  it("normalizes the seed to uint32", () => {
    expect(new SeededRandom(-1).seed).toBe(0xffffffff);
  });
});

describe("SequenceRandom", () => {
  it("replays values and wraps around", () => {
    const rng = new SequenceRandom([0.1, 0.5]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.5, 0.1]);
    expect(rng.draws).toBe(3);
  });

  it("rejects empty lists and values outside [0, 1)", () => {
    expect(() => new SequenceRandom([])).toThrow(
      "SequenceRandom needs at least one value",
    );
    expect(() => new SequenceRandom([1])).toThrow(
      "SequenceRandom values must be in [0, 1), got 1",
    );
  });
});

describe("random helpers", () => {
  it("pickIndex scales into [0, length)", () => {
    expect(pickIndex(new SequenceRandom([0]), 3)).toBe(0);
    expect(pickIndex(new SequenceRandom([0.5]), 3)).toBe(1);
    expect(pickIndex(new SequenceRandom([0.99]), 3)).toBe(2);
  });

  it("choice returns undefined for empty arrays", () => {
    const rng = fromFunction(() => 0.4);
    expect(choice(rng, [])).toBeUndefined();
    expect(choice(rng, ["a", "b"] as const)).toBe("a");
  });

  it("randomUint32 yields unsigned 32-bit integers", () => {
    for (let i = 0; i < 10; i++) {
      const value = randomUint32();
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(0xffffffff);
    }
  });
});
