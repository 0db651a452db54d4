/**
 * AI strategies for Tressette.
 *
 * Provides:
 *   - AiStrategy interface: chooseCard(view, source)
 *   - RandomStrategy: uniformly random playable card
 *   - GreedyStrategy: takes the trick as cheaply as it can, otherwise
 *     throws away its least valuable card
 *   - AiPlayer: wrapper that binds a strategy and random source
 */

import type { Card } from '../../src/card-system/Card';
import { compareCanonical } from '../../src/card-system/Card';
import type { RandomSource } from '../../src/card-system/Random';
import { defaultRandomSource, drawIndex } from '../../src/card-system/Random';
import type { Result } from '../../src/core-engine/GameError';
import { err, unwrap } from '../../src/core-engine/GameError';
import type { TrickView } from '../../src/rule-engine/Trick';
import { highestOfLedSuit } from '../../src/rule-engine/TrickTakingRules';
import { cardPoints, compareTrickRank } from './TressetteCards';
import type { TressetteGame, TrickOutcome } from './TressetteGame';

// ── Turn view ───────────────────────────────────────────────

/** What a strategy gets to see when it is asked for a card. */
export interface TurnView {
  readonly seat: number;
  readonly hand: readonly Card[];
  /** The subset of `hand` that may legally be played. Never empty. */
  readonly playable: readonly Card[];
  readonly trick: TrickView;
}

// ── Strategy interface ──────────────────────────────────────

export interface AiStrategy {
  /** Human-readable strategy name. */
  readonly name: string;

  /**
   * Choose a card to play.
   *
   * @param view    The seat's view of the table.
   * @param source  Random source for random choices.
   * @returns       One of `view.playable`.
   */
  chooseCard(view: TurnView, source: RandomSource): Card;
}

// ── RandomStrategy ──────────────────────────────────────────

/**
 * Plays a uniformly random playable card.
 */
export const RandomStrategy: AiStrategy = {
  name: 'random',

  chooseCard(view: TurnView, source: RandomSource): Card {
    if (view.playable.length === 0) {
      throw new Error('No playable cards available');
    }
    const index = unwrap(drawIndex(source, view.playable.length));
    return view.playable[index];
  },
};

// ── GreedyStrategy ──────────────────────────────────────────

/** Cheapest first: fewest points, then weakest in a trick. */
function compareCost(a: Card, b: Card): number {
  return (
    cardPoints(a).compare(cardPoints(b)) ||
    compareTrickRank(a, b) ||
    compareCanonical(a, b)
  );
}

/**
 * Follows with the weakest card that beats the card currently taking
 * the trick. When no playable card can win, or when leading, plays the
 * cheapest card. Deterministic: the random source is not used.
 */
export const GreedyStrategy: AiStrategy = {
  name: 'greedy',

  chooseCard(view: TurnView): Card {
    if (view.playable.length === 0) {
      throw new Error('No playable cards available');
    }

    const byCost = [...view.playable].sort(compareCost);
    if (view.trick.plays.length === 0) {
      return byCost[0];
    }

    const taking = highestOfLedSuit(view.trick.plays, compareTrickRank).card;
    const winners = view.playable
      .filter((c) => c.suit === taking.suit && compareTrickRank(c, taking) > 0)
      .sort(compareTrickRank);

    return winners.length > 0 ? winners[0] : byCost[0];
  },
};

// ── AiPlayer ────────────────────────────────────────────────

/**
 * An AI player that wraps a strategy and random source for
 * convenient use.
 */
export class AiPlayer {
  readonly strategy: AiStrategy;
  private readonly source: RandomSource;

  constructor(strategy: AiStrategy, source: RandomSource = defaultRandomSource) {
    this.strategy = strategy;
    this.source = source;
  }

  /**
   * Choose a card for `seat` in the given game.
   *
   * @returns The card, or `undefined` if it is not that seat's turn.
   */
  chooseCard(game: TressetteGame, seat: number): Card | undefined {
    const trick = game.getCurrentTrick();
    const playable = game.getPlayableCards(seat);
    if (trick === undefined || playable.length === 0) return undefined;

    return this.strategy.chooseCard(
      { seat, hand: game.getHand(seat), playable, trick },
      this.source,
    );
  }

  /**
   * Play one card for whichever seat is to act.
   */
  takeTurn(game: TressetteGame): Result<TrickOutcome> {
    const seat = game.currentSeat;
    if (seat === undefined) {
      return err({
        kind: 'InvalidGameState',
        message: `No seat is due to play in phase "${game.phase}"`,
        phase: game.phase,
      });
    }
    const card = this.chooseCard(game, seat);
    if (card === undefined) {
      return err({
        kind: 'InvalidGameState',
        message: `Seat ${seat} has nothing to play`,
        phase: game.phase,
      });
    }
    return game.play(seat, card);
  }
}
