import { describe, it, expect } from 'vitest';
import { clamp, mean, roundHalfEven } from '../../../src/srs/common/math';
import { createRandomSource, pickOne, shuffle } from '../../../src/srs/common/random';
import { sequenceRandom } from '../../setup';

describe('math helpers', () => {
  it('clamp bounds the value', () => {
    expect(clamp(30, 8, 25)).toBe(25);
    expect(clamp(3, 8, 25)).toBe(8);
    expect(clamp(12, 8, 25)).toBe(12);
  });

  it('mean falls back on empty input', () => {
    expect(mean([1, 0, 1, 0])).toBe(0.5);
    expect(mean([], 3)).toBe(3);
    expect(mean([])).toBe(0);
  });

  it('roundHalfEven rounds ties to the even neighbour', () => {
    expect(roundHalfEven(10.5)).toBe(10);
    expect(roundHalfEven(11.5)).toBe(12);
    expect(roundHalfEven(12.5)).toBe(12);
    expect(roundHalfEven(10.8)).toBe(11);
    expect(roundHalfEven(10.2)).toBe(10);
    expect(roundHalfEven(15)).toBe(15);
  });
});

describe('random helpers', () => {
  it('same seed yields the same sequence', () => {
    const a = createRandomSource('test-seed');
    const b = createRandomSource('test-seed');
    const first = [a.next(), a.next(), a.next()];

    expect([b.next(), b.next(), b.next()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('shuffle returns a permutation without mutating the input', () => {
    const items = ['a', 'b', 'c', 'd'];
    const result = shuffle(items, createRandomSource('test-seed'));

    expect(items).toEqual(['a', 'b', 'c', 'd']);
    expect([...result].sort()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('shuffle swaps with the index picked by the source', () => {
    // i=2: j=floor(0*3)=0 → [c,b,a]; i=1: j=floor(0*2)=0 → [b,c,a]
    expect(shuffle(['a', 'b', 'c'], sequenceRandom([0]))).toEqual(['b', 'c', 'a']);
    // j always equals i → identity
    expect(shuffle(['a', 'b', 'c'], sequenceRandom([0.99]))).toEqual(['a', 'b', 'c']);
  });

  it('pickOne maps the random value onto an index', () => {
    expect(pickOne(['x', 'y', 'z'], sequenceRandom([0.5]))).toBe('y');
    expect(pickOne([], sequenceRandom([0.5]))).toBeUndefined();
  });
});
