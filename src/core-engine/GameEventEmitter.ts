/**
 * Typed Event Emitter for the card engine.
 *
 * Provides a type-safe, zero-dependency event emitter for hand and
 * trick lifecycle events. Games emit these events at key points;
 * hosts (front-ends, bots, test harnesses) subscribe to them to stay
 * in sync without polling the game state.
 */

import type { Card } from '../card-system/Card';
import type { Points } from './Points';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted after the deck has been shuffled and dealt.
 */
export interface HandDealtPayload {
  /** Seat of the dealer. */
  readonly dealer: number;
  /** Seat that leads the first trick. */
  readonly firstSeat: number;
  /** Number of cards each seat received. */
  readonly cardsPerPlayer: number;
}

/**
 * Emitted when a seat becomes the one expected to play.
 */
export interface TurnStartedPayload {
  /** Monotonically increasing turn number (0-based). */
  readonly turnNumber: number;
  /** Seat whose turn is starting. */
  readonly playerIndex: number;
  /** Name of the player whose turn is starting. */
  readonly playerName: string;
  /** Whether the active player is AI-controlled. */
  readonly isAI: boolean;
}

/**
 * Emitted when a card has been accepted into the current trick.
 */
export interface CardPlayedPayload {
  readonly turnNumber: number;
  readonly playerIndex: number;
  readonly card: Card;
  /** 0-based index of the trick the card went into. */
  readonly trickNumber: number;
}

/**
 * Emitted when every seat has played and the trick has a taker.
 */
export interface TrickResolvedPayload {
  readonly trickNumber: number;
  readonly winnerIndex: number;
  readonly pointsAwarded: Points;
}

/**
 * Emitted when the hand has ended.
 */
export interface GameEndedPayload {
  /** Final turn number. */
  readonly finalTurnNumber: number;
  /** Index of the winning side, or -1 for a tie. */
  readonly winnerIndex: number;
  /** Human-readable summary (e.g. "Side 0 wins 6 to 5"). */
  readonly reason?: string;
}

/**
 * Emitted when a multi-hand match has a winner.
 */
export interface MatchEndedPayload {
  readonly handsPlayed: number;
  readonly winnerIndex: number;
  readonly scores: readonly number[];
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'hand-dealt': HandDealtPayload;
  'turn-started': TurnStartedPayload;
  'card-played': CardPlayedPayload;
  'trick-resolved': TrickResolvedPayload;
  'game-ended': GameEndedPayload;
  'match-ended': MatchEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for hand and trick events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('trick-resolved', ({ winnerIndex, pointsAwarded }) => {
 *   log.info(`Seat ${winnerIndex} takes ${formatPoints(pointsAwarded)}`);
 * });
 * ```
 */
export class GameEventEmitter {
  private readonly listeners: ListenerTable = createListenerTable();

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    this.listeners[event].push(listener);
    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order. A
   * listener that throws stops the emission and the error reaches
   * the caller of `emit`.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    if (list.length === 0) return;

    // Copy the array so listeners can safely unsubscribe during emission
    const snapshot = [...list];
    for (const fn of snapshot) {
      fn(payload);
    }
  }
}

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

function createListenerTable(): ListenerTable {
  return {
    'hand-dealt': [],
    'turn-started': [],
    'card-played': [],
    'trick-resolved': [],
    'game-ended': [],
    'match-ended': [],
  };
}
