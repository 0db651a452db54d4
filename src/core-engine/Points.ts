/**
 * Exact point arithmetic.
 *
 * Trick-taking games such as Tressette count in thirds of a point, so
 * scores are kept as fractions and only rounded where a game's rules
 * say so.
 */

import Fraction from 'fraction.js';

export type Points = Fraction;

export const ZERO_POINTS: Points = new Fraction(0);

/** Build an exact point value `numerator / denominator`. */
export function points(numerator: number, denominator: number = 1): Points {
  return new Fraction(numerator, denominator);
}

export function sumPoints(values: Iterable<Points>): Points {
  let total = ZERO_POINTS;
  for (const value of values) {
    total = total.add(value);
  }
  return total;
}

/** Whole points only: the floor of `value`. */
export function wholePoints(value: Points): number {
  return value.floor().valueOf();
}

/** Mixed-number label, e.g. `10 2/3`, `1/3`, `0`. */
export function formatPoints(value: Points): string {
  return value.toFraction(true);
}

/**
 * Per-side exact score accumulator.
 *
 * A "side" is whatever the game credits: a seat in individual play, a
 * team in partnership play.
 */
export class ScoreBoard {
  private readonly totals: Points[];

  constructor(sideCount: number) {
    this.totals = Array.from({ length: sideCount }, () => ZERO_POINTS);
  }

  /** Add points to a side. */
  credit(side: number, amount: Points): void {
    this.totals[side] = this.totals[side].add(amount);
  }

  /** Points of one side. */
  get(side: number): Points {
    return this.totals[side];
  }

  /** Snapshot of every side's points. */
  toArray(): Points[] {
    return [...this.totals];
  }

  /** Sum over all sides. */
  total(): Points {
    return sumPoints(this.totals);
  }

  get sideCount(): number {
    return this.totals.length;
  }
}

/**
 * Index of the single highest value, or `null` when the top is shared.
 */
export function uniqueLeader(values: readonly Points[]): number | null {
  let best = -1;
  let tied = false;
  for (let i = 0; i < values.length; i++) {
    if (best === -1) {
      best = i;
      continue;
    }
    const cmp = values[i].compare(values[best]);
    if (cmp > 0) {
      best = i;
      tied = false;
    } else if (cmp === 0) {
      tied = true;
    }
  }
  return best === -1 || tied ? null : best;
}
