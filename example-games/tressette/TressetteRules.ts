/**
 * Tressette rules -- trick resolution, follow-suit, sides and scoring.
 *
 * Provides:
 *   - tressetteRules: the TrickTakingRules implementation
 *   - playableCards: legal cards for a hand against a led suit
 *   - sideOfSeat / sideCount: team or individual scoring
 *   - computeFinalScores: end-of-hand scores with the last-trick bonus
 *   - isMatchComplete / matchWinner: the race to 31
 */

import type { Card, Suit } from '../../src/card-system/Card';
import type { Points } from '../../src/core-engine/Points';
import { uniqueLeader, wholePoints } from '../../src/core-engine/Points';
import type { TrickTakingRules } from '../../src/rule-engine/TrickTakingRules';
import {
  checkFollowSuit,
  highestOfLedSuit,
  legalPlays,
} from '../../src/rule-engine/TrickTakingRules';
import { cardPoints, compareTrickRank } from './TressetteCards';

// ── Constants ───────────────────────────────────────────────

/** Match target: the first side to reach it while strictly ahead wins. */
export const SCORE_TO_WIN = 31;

/** Whole point awarded to the side that takes the last trick. */
export const LAST_TRICK_BONUS = 1;

/** Table sizes the game supports: two partnerships of two. */
export const SUPPORTED_PLAYER_COUNTS = [4] as const;

export type TressettePlayerCount = (typeof SUPPORTED_PLAYER_COUNTS)[number];

export function isSupportedPlayerCount(value: number): value is TressettePlayerCount {
  return SUPPORTED_PLAYER_COUNTS.some((count) => count === value);
}

// ── Tricks ──────────────────────────────────────────────────

/**
 * No trumps: the strongest card of the led suit takes the trick,
 * and a seat must follow suit when it can.
 */
export const tressetteRules: TrickTakingRules = {
  determineTaker: (plays) => highestOfLedSuit(plays, compareTrickRank).seat,
  checkPlay: checkFollowSuit,
  cardPoints,
};

/** The cards in `hand` that may be played onto a trick led in `ledSuit`. */
export function playableCards(hand: readonly Card[], ledSuit: Suit | undefined): Card[] {
  return legalPlays(tressetteRules, hand, ledSuit);
}

// ── Sides ───────────────────────────────────────────────────

/**
 * `teams`: with four players, seats 0 & 2 play against seats 1 & 3.
 * `individual`: every seat scores for itself.
 */
export type ScoringMode = 'teams' | 'individual';

export function sideCount(playerCount: number, scoring: ScoringMode): number {
  return scoring === 'teams' ? 2 : playerCount;
}

export function sideOfSeat(seat: number, scoring: ScoringMode): number {
  return scoring === 'teams' ? seat % 2 : seat;
}

// ── Final scores ────────────────────────────────────────────

export interface SideScore {
  readonly side: number;
  /** Exact points from the cards the side took. */
  readonly cardPoints: Points;
  /** `LAST_TRICK_BONUS` for the side that took the last trick, else 0. */
  readonly lastTrickBonus: number;
  /** `cardPoints` plus the bonus, exact. */
  readonly total: Points;
  /** Whole card points plus the bonus: what the side scores in a match. */
  readonly handPoints: number;
}

export interface FinalScores {
  readonly sides: readonly SideScore[];
  readonly lastTrickSide: number;
  /** Side with the highest total, or `null` on a tie. */
  readonly winner: number | null;
}

/**
 * Score a finished hand.
 *
 * @param cardPointsBySide  Exact card points taken by each side.
 * @param lastTrickSide     Side that took the last trick.
 */
export function computeFinalScores(
  cardPointsBySide: readonly Points[],
  lastTrickSide: number,
): FinalScores {
  const sides = cardPointsBySide.map((taken, side): SideScore => {
    const lastTrickBonus = side === lastTrickSide ? LAST_TRICK_BONUS : 0;
    return {
      side,
      cardPoints: taken,
      lastTrickBonus,
      total: taken.add(lastTrickBonus),
      handPoints: wholePoints(taken) + lastTrickBonus,
    };
  });

  return {
    sides,
    lastTrickSide,
    winner: uniqueLeader(sides.map((s) => s.total)),
  };
}

// ── Match ───────────────────────────────────────────────────

/**
 * The side that has reached `target` and strictly leads every other
 * side, or `null` if there is none yet.
 */
export function matchWinner(
  scores: readonly number[],
  target: number = SCORE_TO_WIN,
): number | null {
  let leader: number | null = null;
  for (let side = 0; side < scores.length; side++) {
    if (leader === null || scores[side] > scores[leader]) {
      leader = side;
    }
  }
  if (leader === null || scores[leader] < target) return null;

  const top = scores[leader];
  const shared = scores.some((score, side) => side !== leader && score === top);
  return shared ? null : leader;
}

export function isMatchComplete(
  scores: readonly number[],
  target: number = SCORE_TO_WIN,
): boolean {
  return matchWinner(scores, target) !== null;
}
