/**
 * Turn sequencer for the card engine.
 *
 * Provides functions to manage turn order, phase transitions,
 * and seat rotation within a GameState. Operates on the GameState
 * directly (mutation-based); the owning game object keeps the state
 * private so callers only see read-only views.
 *
 * Every function here guards an engine invariant. Games check caller
 * input first and turn it into a `GameError`; reaching a throw in
 * this module means the game itself is wrong.
 */

import type { GamePhase, GameState, PlayerInfo } from './GameState';
import { InvariantViolation } from './GameError';

// ── Query functions ─────────────────────────────────────────

/**
 * Get the currently active player's info.
 */
export function getCurrentPlayer<T>(state: GameState<T>): PlayerInfo {
  return state.players[state.currentPlayerIndex];
}

/**
 * Get the currently active player's game-specific state.
 */
export function getCurrentPlayerState<T>(state: GameState<T>): T {
  return state.playerStates[state.currentPlayerIndex];
}

/**
 * Whether seats are currently playing cards.
 */
export function isPlaying<T>(state: GameState<T>): boolean {
  return state.phase === 'in-progress';
}

// ── Mutation functions ──────────────────────────────────────

/**
 * Advance to the next seat's turn.
 *
 * Rotates `currentPlayerIndex` to the next seat in order
 * (wrapping around) and increments the turn counter.
 *
 * @throws InvariantViolation unless the phase is `in-progress`.
 */
export function advanceTurn<T>(state: GameState<T>): void {
  if (state.phase !== 'in-progress') {
    throw new InvariantViolation(
      `Cannot advance turn in phase "${state.phase}"`,
    );
  }

  state.currentPlayerIndex =
    (state.currentPlayerIndex + 1) % state.players.length;
  state.turnNumber++;
}

/**
 * Hand the turn to a specific seat (e.g. the winner of a trick leads).
 * Increments the turn counter like `advanceTurn`.
 *
 * @throws InvariantViolation if the seat is out of bounds.
 */
export function passTurnTo<T>(state: GameState<T>, seat: number): void {
  if (!Number.isInteger(seat) || seat < 0 || seat >= state.players.length) {
    throw new InvariantViolation(
      `Seat ${seat} is out of bounds for ${state.players.length} players`,
    );
  }

  state.currentPlayerIndex = seat;
  state.turnNumber++;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, readonly GamePhase[]> = {
  'awaiting-deal': ['in-progress'],
  'in-progress': ['trick-complete'],
  'trick-complete': ['in-progress', 'game-complete'],
  'game-complete': [],
};

/**
 * Whether `from -> to` is a legal phase transition.
 */
export function canTransition(from: GamePhase, to: GamePhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Transition the game to a new phase.
 *
 * Valid transitions:
 * - `awaiting-deal`  -> `in-progress`
 * - `in-progress`    -> `trick-complete`
 * - `trick-complete` -> `in-progress` | `game-complete`
 *
 * @throws InvariantViolation if the transition is invalid
 *         (including a transition to the same phase).
 */
export function transitionTo<T>(
  state: GameState<T>,
  newPhase: GamePhase,
): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new InvariantViolation(`Game is already in phase "${current}"`);
  }

  if (!canTransition(current, newPhase)) {
    const allowed = VALID_TRANSITIONS[current];
    throw new InvariantViolation(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

// ── Convenience ─────────────────────────────────────────────

/**
 * Start play once the cards are dealt (awaiting-deal -> in-progress).
 */
export function startGame<T>(state: GameState<T>): void {
  transitionTo(state, 'in-progress');
}

/**
 * End the game after the final trick (trick-complete -> game-complete).
 */
export function endGame<T>(state: GameState<T>): void {
  transitionTo(state, 'game-complete');
}
