/**
 * Rules interface for trick-taking games.
 *
 * A game plugs its own card ordering, follow-suit policy and point
 * values into the trick machinery through `TrickTakingRules`. The
 * helpers below cover the common no-trump case.
 */

import type { Card, Suit } from '../card-system/Card';
import type { Points } from '../core-engine/Points';

/** One card played into a trick by a seat. */
export interface Play {
  readonly seat: number;
  readonly card: Card;
}

/**
 * Result of a legality check: either legal or illegal with a reason.
 */
export type PlayLegality =
  | { legal: true }
  | { legal: false; reason: string };

export interface TrickTakingRules {
  /**
   * Seat that takes a complete trick. `plays` is in play order, so
   * the first entry is the leader.
   */
  determineTaker(plays: readonly Play[]): number;

  /** Whether `card`, held in `hand`, may be played onto a trick led in `ledSuit`. */
  checkPlay(hand: readonly Card[], card: Card, ledSuit: Suit | undefined): PlayLegality;

  /** Exact point value of a single card. */
  cardPoints(card: Card): Points;
}

// ── Helpers ─────────────────────────────────────────────────

/**
 * The play holding the highest card of the led suit, ranked by
 * `compare`. Cards off the led suit never win.
 *
 * @throws Error if `plays` is empty.
 */
export function highestOfLedSuit(
  plays: readonly Play[],
  compare: (a: Card, b: Card) => number,
): Play {
  if (plays.length === 0) {
    throw new Error('Cannot determine the taker of an empty trick');
  }
  const ledSuit = plays[0].card.suit;
  let best = plays[0];
  for (const play of plays.slice(1)) {
    if (play.card.suit === ledSuit && compare(play.card, best.card) > 0) {
      best = play;
    }
  }
  return best;
}

/**
 * Follow-suit check: a seat holding a card of the led suit must play
 * that suit. Leading (no led suit yet) is always legal.
 */
export function checkFollowSuit(
  hand: readonly Card[],
  card: Card,
  ledSuit: Suit | undefined,
): PlayLegality {
  if (ledSuit === undefined || card.suit === ledSuit) {
    return { legal: true };
  }
  if (hand.some((c) => c.suit === ledSuit)) {
    return {
      legal: false,
      reason: `Must follow suit: ${ledSuit} was led and is still held`,
    };
  }
  return { legal: true };
}

/**
 * Cards in `hand` that pass `rules.checkPlay` for the led suit.
 */
export function legalPlays(
  rules: TrickTakingRules,
  hand: readonly Card[],
  ledSuit: Suit | undefined,
): Card[] {
  return hand.filter((card) => rules.checkPlay(hand, card, ledSuit).legal);
}
