/**
 * Tressette game orchestration -- ties together the deck, hands,
 * trick tracking, rules, scoring and turn sequencer into a playable
 * hand of Tressette.
 *
 * Provides:
 *   - TressettePlayerState / TressetteGameState: per-seat and full state
 *   - TrickOutcome: what a successful play produced
 *   - TressetteGame: deal, play and inspection
 *   - createTressetteGame / setupTressetteGame: factories
 *
 * Every caller mistake comes back as a `GameError` result and leaves
 * the game exactly as it was. Events go out only once a play has been
 * fully applied, so a listener that throws never leaves the game half
 * updated.
 */

import type { Card } from '../../src/card-system/Card';
import { formatCard } from '../../src/card-system/Card';
import { createItalianDeck, deal, shuffle } from '../../src/card-system/Deck';
import { Hand } from '../../src/card-system/Hand';
import type { GameError, Result } from '../../src/core-engine/GameError';
import { ok, err, expectDefined, invariant } from '../../src/core-engine/GameError';
import type { GamePhase, GameState, PlayerInfo } from '../../src/core-engine/GameState';
import { createGameState } from '../../src/core-engine/GameState';
import type {
  GameEventEmitter,
  GameEventMap,
  GameEventName,
} from '../../src/core-engine/GameEventEmitter';
import type { Logger } from '../../src/core-engine/Logger';
import type { Points } from '../../src/core-engine/Points';
import { ScoreBoard, formatPoints } from '../../src/core-engine/Points';
import {
  advanceTurn,
  endGame,
  getCurrentPlayer,
  getCurrentPlayerState,
  isPlaying,
  passTurnTo,
  startGame,
  transitionTo,
} from '../../src/core-engine/TurnSequencer';
import type { CompletedTrick, TrickView } from '../../src/rule-engine/Trick';
import { OngoingTrick, nextSeat } from '../../src/rule-engine/Trick';
import type { ResolvedTressetteOptions, TressetteOptions } from './TressetteOptions';
import { resolveTressetteOptions } from './TressetteOptions';
import type { FinalScores, ScoringMode } from './TressetteRules';
import {
  computeFinalScores,
  playableCards,
  sideCount,
  sideOfSeat,
  tressetteRules,
} from './TressetteRules';

// ── State ───────────────────────────────────────────────────

/** Per-seat state in a Tressette hand. */
export interface TressettePlayerState {
  hand: Hand;
}

/** The full game state type for Tressette. */
export type TressetteGameState = GameState<TressettePlayerState>;

// ── Outcomes ────────────────────────────────────────────────

/**
 * What a successful `play` produced.
 *
 * - `ongoing`        -- the trick still waits for `nextSeat`.
 * - `trick-resolved` -- the trick is complete; `nextLeader` leads the next.
 * - `game-over`      -- the last trick is complete and the hand is scored.
 */
export type TrickOutcome =
  | { readonly kind: 'ongoing'; readonly nextSeat: number }
  | {
      readonly kind: 'trick-resolved';
      readonly trick: CompletedTrick;
      readonly winner: number;
      readonly pointsAwarded: Points;
      readonly nextLeader: number;
    }
  | {
      readonly kind: 'game-over';
      readonly trick: CompletedTrick;
      readonly winner: number;
      readonly pointsAwarded: Points;
      readonly finalScores: FinalScores;
    };

/** An event waiting to be emitted once the state change is complete. */
type Notice = {
  [K in GameEventName]: { readonly event: K; readonly payload: GameEventMap[K] };
}[GameEventName];

// ── Game ────────────────────────────────────────────────────

export class TressetteGame {
  /** Lifecycle events for hosts and tools. */
  readonly events: GameEventEmitter;

  private readonly options: ResolvedTressetteOptions;
  private readonly logger: Logger;
  private readonly state: TressetteGameState;
  private readonly scores: ScoreBoard;
  private readonly completed: CompletedTrick[] = [];
  private trick: OngoingTrick | undefined;
  private finalScores: FinalScores | undefined;

  private constructor(options: ResolvedTressetteOptions) {
    this.options = options;
    this.events = options.events;
    this.logger = options.logger;
    this.scores = new ScoreBoard(sideCount(options.playerCount, options.scoring));
    this.state = createGameState<TressettePlayerState>({
      players: options.playerNames.map((name, i) => ({
        name,
        isAI: options.isAI[i],
      })),
      createPlayerState: () => ({ hand: new Hand() }),
      firstPlayerIndex: nextSeat(options.dealer, options.playerCount),
    });
  }

  /**
   * Create a game waiting to be dealt.
   *
   * Fails with `InvalidPlayerCount` unless there are 4 players,
   * and with `InvalidOptions` for any other bad option.
   */
  static create(options: TressetteOptions = {}): Result<TressetteGame> {
    const resolved = resolveTressetteOptions(options);
    if (!resolved.ok) return resolved;
    return ok(new TressetteGame(resolved.value));
  }

  // ── Setup ───────────────────────────────────────────────

  /**
   * Shuffle a fresh Italian deck and deal it round-robin, starting
   * with the seat after the dealer. That seat leads the first trick.
   */
  deal(): Result<void> {
    if (this.state.phase !== 'awaiting-deal') {
      return this.reject({
        kind: 'InvalidGameState',
        message: `Cannot deal in phase "${this.state.phase}"`,
        phase: this.state.phase,
      });
    }

    const deck = createItalianDeck();
    const shuffled = shuffle(deck, this.options.random);
    if (!shuffled.ok) return this.reject(shuffled.error);

    const leader = this.state.currentPlayerIndex;
    const dealt = deal(deck, this.playerCount, leader);
    if (!dealt.ok) return this.reject(dealt.error);

    dealt.value.forEach((cards, seat) => {
      this.state.playerStates[seat].hand.give(...cards);
    });
    this.trick = new OngoingTrick(leader, this.playerCount);
    startGame(this.state);

    const cardsPerPlayer = this.state.playerStates[0].hand.size();
    this.logger.info(
      `Dealt ${cardsPerPlayer} cards to each of ${this.playerCount} players; seat ${leader} leads`,
    );
    this.publish([
      {
        event: 'hand-dealt',
        payload: { dealer: this.options.dealer, firstSeat: leader, cardsPerPlayer },
      },
      this.turnStarted(),
    ]);
    return ok(undefined);
  }

  // ── Play ────────────────────────────────────────────────

  /**
   * Play `card` from `seat` into the current trick.
   *
   * Checks, in order: the phase, the turn, that the seat holds the
   * card, and follow-suit. Nothing changes unless all of them pass.
   */
  play(seat: number, card: Card): Result<TrickOutcome> {
    const trick = this.trick;
    if (!isPlaying(this.state) || trick === undefined) {
      return this.reject({
        kind: 'InvalidGameState',
        message: `Cannot play a card in phase "${this.state.phase}"`,
        phase: this.state.phase,
      });
    }

    const expectedSeat = this.state.currentPlayerIndex;
    if (seat !== expectedSeat) {
      return this.reject({
        kind: 'NotPlayerTurn',
        message: `It is seat ${expectedSeat}'s turn, not seat ${seat}'s`,
        seat,
        expectedSeat,
      });
    }

    const hand = getCurrentPlayerState(this.state).hand;
    if (!hand.has(card)) {
      return this.reject({
        kind: 'CardNotInHand',
        message: `Seat ${seat} does not hold the ${formatCard(card)}`,
        seat,
        card,
      });
    }

    const ledSuit = trick.ledSuit;
    const legality = tressetteRules.checkPlay(hand.toArray(), card, ledSuit);
    if (!legality.legal) {
      return this.reject({
        kind: 'IllegalPlay',
        message: `Seat ${seat} cannot play the ${formatCard(card)}: ${legality.reason}`,
        seat,
        card,
        ledSuit,
      });
    }

    const played = expectDefined(hand.remove(card), `seat ${seat} lost the ${formatCard(card)}`);
    trick.play(seat, played);
    this.logger.debug(`Seat ${seat} plays the ${formatCard(played)}`);
    const notices: Notice[] = [
      {
        event: 'card-played',
        payload: {
          turnNumber: this.state.turnNumber,
          playerIndex: seat,
          card: played,
          trickNumber: this.completed.length,
        },
      },
    ];

    let outcome: TrickOutcome;
    if (trick.isComplete()) {
      outcome = this.resolveTrick(trick, notices);
    } else {
      advanceTurn(this.state);
      notices.push(this.turnStarted());
      outcome = { kind: 'ongoing', nextSeat: this.state.currentPlayerIndex };
    }

    this.publish(notices);
    return ok(outcome);
  }

  /** Score a full trick and set up the next one, queueing its events. */
  private resolveTrick(trick: OngoingTrick, notices: Notice[]): TrickOutcome {
    transitionTo(this.state, 'trick-complete');

    const completed = expectDefined(trick.finish(tressetteRules), 'a full trick must resolve');
    const winner = completed.taker;
    this.completed.push(completed);
    this.scores.credit(this.sideOf(winner), completed.points);

    const trickNumber = this.completed.length - 1;
    this.logger.info(
      `Trick ${trickNumber + 1} to seat ${winner} for ${formatPoints(completed.points)}`,
    );
    notices.push({
      event: 'trick-resolved',
      payload: { trickNumber, winnerIndex: winner, pointsAwarded: completed.points },
    });

    const handsEmpty = this.state.playerStates.every((ps) => ps.hand.isEmpty());
    if (!handsEmpty) {
      invariant(
        this.state.playerStates.every(
          (ps) => ps.hand.size() === this.state.playerStates[0].hand.size(),
        ),
        'hands must stay the same size between tricks',
      );
      this.trick = new OngoingTrick(winner, this.playerCount);
      transitionTo(this.state, 'in-progress');
      passTurnTo(this.state, winner);
      notices.push(this.turnStarted());
      return {
        kind: 'trick-resolved',
        trick: completed,
        winner,
        pointsAwarded: completed.points,
        nextLeader: winner,
      };
    }

    const finalScores = computeFinalScores(this.scores.toArray(), this.sideOf(winner));
    this.finalScores = finalScores;
    this.trick = undefined;
    endGame(this.state);

    const summary = finalScores.sides
      .map((s) => `side ${s.side}: ${formatPoints(s.total)}`)
      .join(', ');
    const reason =
      finalScores.winner === null
        ? `Tie (${summary})`
        : `Side ${finalScores.winner} wins (${summary})`;
    this.logger.info(`Hand over. ${reason}`);
    notices.push({
      event: 'game-ended',
      payload: {
        finalTurnNumber: this.state.turnNumber,
        winnerIndex: finalScores.winner ?? -1,
        reason,
      },
    });

    return {
      kind: 'game-over',
      trick: completed,
      winner,
      pointsAwarded: completed.points,
      finalScores,
    };
  }

  private reject(error: GameError): Result<never> {
    this.logger.debug(`Rejected: ${error.message}`);
    return err(error);
  }

  private turnStarted(): Notice {
    const player = getCurrentPlayer(this.state);
    return {
      event: 'turn-started',
      payload: {
        turnNumber: this.state.turnNumber,
        playerIndex: this.state.currentPlayerIndex,
        playerName: player.name,
        isAI: player.isAI,
      },
    };
  }

  private publish(notices: readonly Notice[]): void {
    for (const notice of notices) {
      this.events.emit(notice.event, notice.payload);
    }
  }

  // ── Inspection ──────────────────────────────────────────

  get phase(): GamePhase {
    return this.state.phase;
  }

  get playerCount(): number {
    return this.options.playerCount;
  }

  get players(): readonly PlayerInfo[] {
    return this.state.players;
  }

  get dealer(): number {
    return this.options.dealer;
  }

  get scoring(): ScoringMode {
    return this.options.scoring;
  }

  /** Number of sides that score: 2 teams, or one per seat. */
  get sideCount(): number {
    return this.scores.sideCount;
  }

  /** Seat expected to play, or `undefined` outside `in-progress`. */
  get currentSeat(): number | undefined {
    return isPlaying(this.state) ? this.state.currentPlayerIndex : undefined;
  }

  /** The side a seat scores for. */
  sideOf(seat: number): number {
    return sideOfSeat(seat, this.options.scoring);
  }

  /**
   * The cards one seat holds, in the order received. Empty for a seat
   * that is not at the table.
   */
  getHand(seat: number): Card[] {
    return this.playerState(seat)?.hand.toArray() ?? [];
  }

  /**
   * The cards `seat` may play right now. Empty unless it is that
   * seat's turn.
   */
  getPlayableCards(seat: number): Card[] {
    const hand = this.playerState(seat)?.hand;
    if (hand === undefined || this.currentSeat !== seat || this.trick === undefined) return [];
    return playableCards(hand.toArray(), this.trick.ledSuit);
  }

  /** The trick being played, or `undefined` before the deal and after the last trick. */
  getCurrentTrick(): TrickView | undefined {
    return this.trick?.view();
  }

  /** Card points taken so far, per side. */
  getScores(): Points[] {
    return this.scores.toArray();
  }

  getCompletedTricks(): CompletedTrick[] {
    return [...this.completed];
  }

  /** Final scores once the hand is over. */
  getFinalScores(): FinalScores | undefined {
    return this.finalScores;
  }

  private playerState(seat: number): TressettePlayerState | undefined {
    return Number.isInteger(seat) && seat >= 0 ? this.state.playerStates.at(seat) : undefined;
  }
}

// ── Factories ───────────────────────────────────────────────

/**
 * Create a Tressette hand waiting to be dealt.
 */
export function createTressetteGame(options: TressetteOptions = {}): Result<TressetteGame> {
  return TressetteGame.create(options);
}

/**
 * Create a Tressette hand and deal it, ready for the first play.
 */
export function setupTressetteGame(options: TressetteOptions = {}): Result<TressetteGame> {
  const created = TressetteGame.create(options);
  if (!created.ok) return created;
  const dealt = created.value.deal();
  if (!dealt.ok) return dealt;
  return created;
}
