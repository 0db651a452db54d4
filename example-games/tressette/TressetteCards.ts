/**
 * Tressette card values: trick-taking strength and point values.
 *
 * Trick strength, weakest to strongest:
 *   4, 5, 6, 7, Jack, Knight, King, Ace, 2, 3
 *
 * Point values (in thirds, counted exactly):
 *   Ace          1
 *   2, 3, J, N, K  1/3 each
 *   4 to 7       0
 *
 * A full deck is worth 4 aces + 20 thirds = 32/3 points.
 */

import type { Card, Rank } from '../../src/card-system/Card';
import { suitIndex } from '../../src/card-system/Card';
import type { Points } from '../../src/core-engine/Points';
import { points, ZERO_POINTS } from '../../src/core-engine/Points';

// ── Trick strength ──────────────────────────────────────────

/** Ranks ordered from the weakest to the strongest in a trick. */
export const TRICK_RANK_ORDER: readonly Rank[] = [
  '4',
  '5',
  '6',
  '7',
  'J',
  'N',
  'K',
  'A',
  '2',
  '3',
] as const;

/** Trick strength of a rank (0 = weakest, 9 = strongest). */
export function trickRank(rank: Rank): number {
  return TRICK_RANK_ORDER.indexOf(rank);
}

/**
 * Compare two cards by trick strength.
 *
 * Equal ranks in different suits fall back to canonical suit order so
 * the comparator is total; trick resolution only ever compares cards
 * of the led suit.
 */
export function compareTrickRank(a: Card, b: Card): number {
  return trickRank(a.rank) - trickRank(b.rank) || suitIndex(a.suit) - suitIndex(b.suit);
}

// ── Points ──────────────────────────────────────────────────

const ACE_POINTS = points(1);
const FIGURE_POINTS = points(1, 3);

const RANK_POINTS: Record<Rank, Points> = {
  A: ACE_POINTS,
  '2': FIGURE_POINTS,
  '3': FIGURE_POINTS,
  '4': ZERO_POINTS,
  '5': ZERO_POINTS,
  '6': ZERO_POINTS,
  '7': ZERO_POINTS,
  J: FIGURE_POINTS,
  N: FIGURE_POINTS,
  K: FIGURE_POINTS,
};

/** Exact point value of a rank. */
export function cardPointValue(rank: Rank): Points {
  return RANK_POINTS[rank];
}

export function cardPoints(card: Card): Points {
  return cardPointValue(card.rank);
}

/** Points in a full 40-card deck. */
export const DECK_POINTS: Points = points(32, 3);
