/**
 * A Tressette match: hands are played one after another, the deal
 * passing one seat each hand, until a side reaches the target score
 * while strictly ahead of every other side.
 *
 * Each hand gets its own emitter; the match forwards its events to
 * `match.events`. A finished hand is recorded before `game-ended` is
 * forwarded, so match listeners always see the updated totals.
 */

import type { Result } from '../../src/core-engine/GameError';
import { ok, err } from '../../src/core-engine/GameError';
import type { GameEventName } from '../../src/core-engine/GameEventEmitter';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import { createSeededSource } from '../../src/card-system/Random';
import { nextSeat } from '../../src/rule-engine/Trick';
import type { TressetteGame } from './TressetteGame';
import { createTressetteGame } from './TressetteGame';
import type { TressetteOptions } from './TressetteOptions';
import type { FinalScores } from './TressetteRules';
import { SCORE_TO_WIN, matchWinner, sideCount } from './TressetteRules';

/** Hand events forwarded to the match emitter as they happen. */
const FORWARDED_EVENTS = [
  'hand-dealt',
  'turn-started',
  'card-played',
  'trick-resolved',
] as const satisfies readonly GameEventName[];

export interface TressetteMatchOptions extends TressetteOptions {
  /** Points needed to win the match (default 31). */
  target?: number;
}

export class TressetteMatch {
  readonly target: number;
  readonly events: GameEventEmitter;

  private readonly handOptions: TressetteOptions;
  private readonly totals: number[];
  private readonly history: FinalScores[] = [];
  private dealer: number;
  private current: TressetteGame | undefined;
  private winnerSide: number | null = null;

  private constructor(
    handOptions: TressetteOptions,
    target: number,
    sides: number,
    events: GameEventEmitter,
  ) {
    this.handOptions = handOptions;
    this.target = target;
    this.totals = Array.from({ length: sides }, () => 0);
    this.dealer = handOptions.dealer ?? 0;
    this.events = events;
  }

  /**
   * Create a match. The options are validated as for a single hand
   * and reused for every hand; `dealer` names the first hand's dealer.
   * A `seed` seeds one source that every hand draws from in turn.
   */
  static create(options: TressetteMatchOptions = {}): Result<TressetteMatch> {
    const { target = SCORE_TO_WIN, ...handOptions } = options;
    if (!Number.isInteger(target) || target < 1) {
      return err({
        kind: 'InvalidOptions',
        message: `Invalid match options: target must be a positive integer, got ${target}`,
        issues: [`target: must be a positive integer`],
      });
    }

    const checked = createTressetteGame(handOptions);
    if (!checked.ok) return checked;

    const { seed, events = new GameEventEmitter(), ...shared } = handOptions;
    const random = shared.random ?? (seed !== undefined ? createSeededSource(seed) : undefined);
    const sides = sideCount(checked.value.playerCount, checked.value.scoring);
    return ok(new TressetteMatch({ ...shared, random }, target, sides, events));
  }

  /** Cumulative whole points per side. */
  get scores(): readonly number[] {
    return [...this.totals];
  }

  /** Number of hands scored so far. */
  get handsPlayed(): number {
    return this.history.length;
  }

  /** Final scores of every finished hand, oldest first. */
  getHandResults(): FinalScores[] {
    return [...this.history];
  }

  /**
   * The hand being played, if one has been started and not recorded.
   * Its `events` is the hand's own emitter, not `match.events`.
   */
  get currentHand(): TressetteGame | undefined {
    return this.current;
  }

  /** Winning side, or `null` while the match is still going. */
  get winner(): number | null {
    return this.winnerSide;
  }

  isComplete(): boolean {
    return this.winnerSide !== null;
  }

  /**
   * Deal the next hand. The dealer moves one seat on from the
   * previous hand.
   *
   * Fails with `InvalidGameState` once the match is over, or while
   * the previous hand is still being played.
   */
  startHand(): Result<TressetteGame> {
    if (this.isComplete()) {
      return err({
        kind: 'InvalidGameState',
        message: 'The match is already complete',
        phase: 'match-complete',
      });
    }
    if (this.current !== undefined) {
      return err({
        kind: 'InvalidGameState',
        message: 'The current hand has not finished yet',
        phase: this.current.phase,
      });
    }

    const handEvents = new GameEventEmitter();
    const created = createTressetteGame({
      ...this.handOptions,
      dealer: this.dealer,
      events: handEvents,
    });
    if (!created.ok) return created;
    const hand = created.value;

    for (const event of FORWARDED_EVENTS) {
      handEvents.on(event, (payload) => this.events.emit(event, payload));
    }
    handEvents.on('game-ended', (payload) => {
      this.recordHand(hand);
      this.events.emit('game-ended', payload);
      if (this.winnerSide !== null) {
        this.events.emit('match-ended', {
          handsPlayed: this.history.length,
          winnerIndex: this.winnerSide,
          scores: [...this.totals],
        });
      }
    });

    this.current = hand;
    const dealt = hand.deal();
    if (!dealt.ok) {
      this.current = undefined;
      return dealt;
    }
    return created;
  }

  private recordHand(hand: TressetteGame): void {
    const result = hand.getFinalScores();
    if (result === undefined || this.current !== hand) return;

    this.current = undefined;
    this.history.push(result);
    for (const side of result.sides) {
      this.totals[side.side] += side.handPoints;
    }
    this.dealer = nextSeat(this.dealer, hand.playerCount);

    this.winnerSide = matchWinner(this.totals, this.target);
  }
}

/**
 * Create a match waiting for its first hand.
 */
export function createTressetteMatch(
  options: TressetteMatchOptions = {},
): Result<TressetteMatch> {
  return TressetteMatch.create(options);
}
