import { describe, it, expect } from 'vitest';
import { SeededRandom, shuffle, type RandomSource } from '../../../src/engine/core/SeededRandom';

describe('SeededRandom', () => {
  it('produces the same sequence for the same seed', () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    const seqA = [a.next(), a.next(), a.next()];
    const seqB = [b.next(), b.next(), b.next()];
    expect(seqA).toEqual(seqB);
  });

  it('keeps next() within [0, 1)', () => {
    const random = new SeededRandom(7);
    for (let i = 0; i < 200; i++) {
      const value = random.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('keeps nextInt within [0, bound)', () => {
    const random = new SeededRandom(11);
    for (let i = 0; i < 200; i++) {
      const value = random.nextInt(4);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(4);
    }
  });

  it('rejects a bound that is not a positive integer', () => {
    const random = new SeededRandom(1);
    expect(() => random.nextInt(0)).toThrow(RangeError);
    expect(() => random.nextInt(2.5)).toThrow(RangeError);
  });

  it('tracks seed and call count', () => {
    const random = new SeededRandom(99);
    random.next();
    random.nextInt(3);
    expect(random.getState()).toEqual({ seed: 99, callCount: 2 });
  });
});

describe('shuffle', () => {
  const alwaysZero: RandomSource = { nextInt: () => 0 };

  it('returns a new array and leaves the input untouched', () => {
    const input = ['a', 'b', 'c'];
    const result = shuffle(input, alwaysZero);
    expect(result).not.toBe(input);
    expect(input).toEqual(['a', 'b', 'c']);
  });

  it('swaps from the back using the random source', () => {
    // i=2 swaps with 0 -> c,b,a; i=1 swaps with 0 -> b,c,a
    expect(shuffle(['a', 'b', 'c'], alwaysZero)).toEqual(['b', 'c', 'a']);
  });

  it('is a permutation for a seeded source', () => {
    const result = shuffle([1, 2, 3, 4, 5], new SeededRandom(3));
    expect([...result].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('is reproducible for the same seed', () => {
    expect(shuffle([1, 2, 3, 4, 5], new SeededRandom(5))).toEqual(shuffle([1, 2, 3, 4, 5], new SeededRandom(5)));
  });
});
