/**
 * Game phase and state types for the card engine.
 *
 * GamePhase represents the high-level lifecycle of a hand of a
 * trick-taking game. GameState is a generic container that tracks
 * players, turn order, and phase transitions.
 */

import { InvariantViolation } from './GameError';

/**
 * High-level phases of a hand.
 *
 * - `awaiting-deal`  -- Created; the deck has not been shuffled and dealt.
 * - `in-progress`    -- Seats take turns playing cards into the trick.
 * - `trick-complete` -- Transient: every seat has played, the trick is
 *                       being resolved.
 * - `game-complete`  -- All hands are empty; scores are final.
 */
export type GamePhase =
  | 'awaiting-deal'
  | 'in-progress'
  | 'trick-complete'
  | 'game-complete';

/**
 * Identifies a player by seat and kind.
 */
export interface PlayerInfo {
  /** Display name for the player. */
  readonly name: string;
  /** Whether this player is controlled by the computer. */
  readonly isAI: boolean;
}

/**
 * Generic game state container.
 *
 * @typeParam T  Game-specific per-player state (a hand of cards,
 *               captured tricks, etc.).
 */
export interface GameState<T> {
  /** Information about each player, indexed by seat. */
  readonly players: readonly PlayerInfo[];
  /** Per-player game-specific state, parallel to `players`. */
  readonly playerStates: T[];
  /** Seat of the player who acts next. */
  currentPlayerIndex: number;
  /** Current high-level phase. */
  phase: GamePhase;
  /** Monotonically increasing turn counter (starts at 0). */
  turnNumber: number;
}

/**
 * Options for creating a new GameState.
 */
export interface GameStateOptions<T> {
  /** Player info (must have at least 2 entries). */
  players: PlayerInfo[];
  /** Initial per-player state factory. Called once per player. */
  createPlayerState: (playerIndex: number) => T;
  /** Seat of the first player to act (defaults to 0). */
  firstPlayerIndex?: number;
}

/**
 * Create a new GameState from options.
 *
 * Games validate caller input before getting here, so a bad player
 * list is a defect in the calling game.
 *
 * @throws InvariantViolation if fewer than 2 players are provided.
 * @throws InvariantViolation if `firstPlayerIndex` is out of bounds.
 */
export function createGameState<T>(options: GameStateOptions<T>): GameState<T> {
  const { players, createPlayerState, firstPlayerIndex = 0 } = options;

  if (players.length < 2) {
    throw new InvariantViolation(
      `A game requires at least 2 players, got ${players.length}`,
    );
  }

  if (firstPlayerIndex < 0 || firstPlayerIndex >= players.length) {
    throw new InvariantViolation(
      `firstPlayerIndex ${firstPlayerIndex} is out of bounds for ${players.length} players`,
    );
  }

  const playerStates = players.map((_, i) => createPlayerState(i));

  return {
    players,
    playerStates,
    currentPlayerIndex: firstPlayerIndex,
    phase: 'awaiting-deal',
    turnNumber: 0,
  };
}
