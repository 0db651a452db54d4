/**
 * Trick tracking for trick-taking games.
 *
 * An `OngoingTrick` collects one card per seat in rotation from the
 * leader. Once every seat has played it can be finished against a
 * `TrickTakingRules` implementation, producing an immutable
 * `CompletedTrick` with its taker and points.
 *
 * Seat order, follow-suit and hand membership are checked by the
 * owning game before it calls `play`; a bad call here is a defect.
 */

import type { Card, Suit } from '../card-system/Card';
import type { Points } from '../core-engine/Points';
import { sumPoints } from '../core-engine/Points';
import { invariant } from '../core-engine/GameError';
import type { Play, TrickTakingRules } from './TrickTakingRules';

/**
 * The seat after `seat`, wrapping around the table.
 */
export function nextSeat(seat: number, playerCount: number): number {
  return (seat + 1) % playerCount;
}

/** Read-only snapshot of a trick in progress. */
export interface TrickView {
  readonly leader: number;
  /** Suit of the first card, once one has been played. */
  readonly ledSuit: Suit | undefined;
  readonly plays: readonly Play[];
  /** Seat expected to play next, `undefined` once the trick is full. */
  readonly nextSeat: number | undefined;
}

/** A resolved trick. */
export interface CompletedTrick {
  readonly leader: number;
  readonly ledSuit: Suit;
  readonly plays: readonly Play[];
  readonly taker: number;
  readonly points: Points;
}

export class OngoingTrick {
  readonly leader: number;
  readonly playerCount: number;
  private readonly plays: Play[] = [];

  constructor(leader: number, playerCount: number) {
    invariant(
      Number.isInteger(playerCount) && playerCount >= 2,
      `A trick needs at least 2 seats, got ${playerCount}`,
    );
    invariant(
      Number.isInteger(leader) && leader >= 0 && leader < playerCount,
      `Leader ${leader} is out of bounds for ${playerCount} seats`,
    );
    this.leader = leader;
    this.playerCount = playerCount;
  }

  get ledSuit(): Suit | undefined {
    return this.plays.length > 0 ? this.plays[0].card.suit : undefined;
  }

  get nextSeat(): number | undefined {
    if (this.isComplete()) return undefined;
    return (this.leader + this.plays.length) % this.playerCount;
  }

  /** Number of cards played so far. */
  get size(): number {
    return this.plays.length;
  }

  isComplete(): boolean {
    return this.plays.length === this.playerCount;
  }

  /**
   * Add a card for `seat`.
   *
   * @throws InvariantViolation if the trick is full or it is not
   *         `seat`'s turn.
   */
  play(seat: number, card: Card): void {
    const expected = this.nextSeat;
    invariant(expected !== undefined, 'Cannot play into a complete trick');
    invariant(seat === expected, `Seat ${seat} played out of turn, expected ${expected}`);
    this.plays.push({ seat, card });
  }

  /**
   * Resolve the trick.
   *
   * @returns The completed trick, or `undefined` if some seat has not
   *          played yet.
   */
  finish(rules: TrickTakingRules): CompletedTrick | undefined {
    const ledSuit = this.ledSuit;
    if (!this.isComplete() || ledSuit === undefined) return undefined;

    const plays = [...this.plays];
    return {
      leader: this.leader,
      ledSuit,
      plays,
      taker: rules.determineTaker(plays),
      points: sumPoints(plays.map((p) => rules.cardPoints(p.card))),
    };
  }

  view(): TrickView {
    return {
      leader: this.leader,
      ledSuit: this.ledSuit,
      plays: [...this.plays],
      nextSeat: this.nextSeat,
    };
  }
}
