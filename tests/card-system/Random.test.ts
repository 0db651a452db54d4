import { describe, it, expect } from 'vitest';
import type { RandomSource } from '../../src/card-system/Random';
import {
  createSeededSource,
  fromFloatGenerator,
  defaultRandomSource,
  drawIndex,
  fisherYates,
} from '../../src/card-system/Random';

/** A source that answers from a script and records every bound it was asked for. */
function scriptedSource(answers: (bound: number) => number): RandomSource & { bounds: number[] } {
  const bounds: number[] = [];
  return {
    bounds,
    nextIndex(bound: number): number {
      bounds.push(bound);
      return answers(bound);
    },
  };
}

describe('createSeededSource', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = createSeededSource(1234);
    const b = createSeededSource(1234);
    const seqA = Array.from({ length: 20 }, () => a.nextIndex(40));
    const seqB = Array.from({ length: 20 }, () => b.nextIndex(40));
    expect(seqA).toEqual(seqB);
  });

  it('should produce different sequences for different seeds', () => {
    const a = createSeededSource(1);
    const b = createSeededSource(2);
    const seqA = Array.from({ length: 20 }, () => a.nextIndex(1000));
    const seqB = Array.from({ length: 20 }, () => b.nextIndex(1000));
    expect(seqA).not.toEqual(seqB);
  });

  it('should stay within [0, bound)', () => {
    const source = createSeededSource(5);
    for (let i = 0; i < 1000; i++) {
      const value = source.nextIndex(7);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(7);
    }
  });

  it('should always answer 0 for a bound of 1', () => {
    const source = createSeededSource(5);
    expect(Array.from({ length: 5 }, () => source.nextIndex(1))).toEqual([0, 0, 0, 0, 0]);
  });
});

describe('fromFloatGenerator', () => {
  it('should scale a float into an index', () => {
    expect(fromFloatGenerator(() => 0).nextIndex(10)).toBe(0);
    expect(fromFloatGenerator(() => 0.5).nextIndex(10)).toBe(5);
    expect(fromFloatGenerator(() => 0.999).nextIndex(10)).toBe(9);
  });

  it('should back the default source with Math.random', () => {
    const value = defaultRandomSource.nextIndex(40);
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(40);
  });
});

describe('drawIndex', () => {
  it('should pass through a valid index', () => {
    expect(drawIndex({ nextIndex: () => 3 }, 4)).toEqual({ ok: true, value: 3 });
  });

  it.each([4, -1, 1.5, Number.NaN])('should reject %s for a bound of 4', (value) => {
    const result = drawIndex({ nextIndex: () => value }, 4);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ kind: 'InvalidRandomSource', bound: 4 });
    }
  });
});

describe('fisherYates', () => {
  it('should make exactly n - 1 draws with shrinking bounds', () => {
    const source = scriptedSource(() => 0);
    fisherYates([1, 2, 3, 4, 5], source);
    expect(source.bounds).toEqual([5, 4, 3, 2]);
  });

  it('should swap each position with the drawn index', () => {
    const items = [1, 2, 3, 4];
    fisherYates(items, scriptedSource(() => 0));
    expect(items).toEqual([2, 3, 4, 1]);
  });

  it('should leave the order alone when every draw picks the current position', () => {
    const items = [1, 2, 3, 4];
    fisherYates(items, scriptedSource((bound) => bound - 1));
    expect(items).toEqual([1, 2, 3, 4]);
  });

  it('should not draw for empty or single-item arrays', () => {
    const source = scriptedSource(() => 0);
    expect(fisherYates([], source)).toEqual({ ok: true, value: [] });
    expect(fisherYates(['x'], source)).toEqual({ ok: true, value: ['x'] });
    expect(source.bounds).toEqual([]);
  });

  it('should leave the array untouched when a later draw is invalid', () => {
    let calls = 0;
    const items = [1, 2, 3, 4];
    const result = fisherYates(items, {
      nextIndex: () => (++calls === 3 ? 99 : 0),
    });
    expect(result.ok).toBe(false);
    expect(items).toEqual([1, 2, 3, 4]);
  });

  it('should place every item at every position about equally often', () => {
    const n = 5;
    const trials = 20_000;
    const counts = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    const source = createSeededSource(2024);

    for (let t = 0; t < trials; t++) {
      const items = [0, 1, 2, 3, 4];
      fisherYates(items, source);
      items.forEach((item, position) => {
        counts[item][position]++;
      });
    }

    const expected = trials / n;
    for (const row of counts) {
      for (const count of row) {
        expect(Math.abs(count - expected)).toBeLessThan(expected * 0.1);
      }
    }
  });

  it('should produce every permutation of three items about equally often', () => {
    const trials = 6_000;
    const seen = new Map<string, number>();
    const source = createSeededSource(77);

    for (let t = 0; t < trials; t++) {
      const items = ['a', 'b', 'c'];
      fisherYates(items, source);
      const key = items.join('');
      seen.set(key, (seen.get(key) ?? 0) + 1);
    }

    expect(seen.size).toBe(6);
    for (const count of seen.values()) {
      expect(Math.abs(count - 1000)).toBeLessThan(150);
    }
  });
});
