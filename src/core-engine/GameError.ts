/**
 * Error taxonomy and result type for the card engine.
 *
 * Caller mistakes (bad player count, out-of-turn play, illegal card)
 * are returned as `Result` values and never mutate engine state.
 * Broken internal invariants are programming defects and throw
 * `InvariantViolation` instead.
 */

import type { Card, Suit } from '../card-system/Card';

// ── Error kinds ─────────────────────────────────────────────

/** The requested player count is incompatible with the deck or the game. */
export interface InvalidPlayerCountError {
  readonly kind: 'InvalidPlayerCount';
  readonly message: string;
  readonly playerCount: number;
}

/** A seat tried to play while it was another seat's turn. */
export interface NotPlayerTurnError {
  readonly kind: 'NotPlayerTurn';
  readonly message: string;
  readonly seat: number;
  readonly expectedSeat: number;
}

/** The seat does not hold the card it tried to play. */
export interface CardNotInHandError {
  readonly kind: 'CardNotInHand';
  readonly message: string;
  readonly seat: number;
  readonly card: Card;
}

/** The card is held but breaks a rule (e.g. follow suit). */
export interface IllegalPlayError {
  readonly kind: 'IllegalPlay';
  readonly message: string;
  readonly seat: number;
  readonly card: Card;
  readonly ledSuit?: Suit;
}

/** The operation is not allowed in the current phase. */
export interface InvalidGameStateError {
  readonly kind: 'InvalidGameState';
  readonly message: string;
  readonly phase: string;
}

/** The injected random source returned an unusable value. */
export interface InvalidRandomSourceError {
  readonly kind: 'InvalidRandomSource';
  readonly message: string;
  readonly value: number;
  readonly bound: number;
}

/** Setup options failed validation. */
export interface InvalidOptionsError {
  readonly kind: 'InvalidOptions';
  readonly message: string;
  readonly issues: readonly string[];
}

export type GameError =
  | InvalidPlayerCountError
  | NotPlayerTurnError
  | CardNotInHandError
  | IllegalPlayError
  | InvalidGameStateError
  | InvalidRandomSourceError
  | InvalidOptionsError;

export type GameErrorKind = GameError['kind'];

// ── Result ──────────────────────────────────────────────────

export type Result<T, E = GameError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = GameError>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Thrown by `unwrap` when a result holds an error.
 * Carries the original `GameError` for inspection.
 */
export class GameErrorException extends Error {
  readonly error: GameError;

  constructor(error: GameError) {
    super(`${error.kind}: ${error.message}`);
    this.name = 'GameErrorException';
    this.error = error;
  }
}

/**
 * Return the value of a successful result, throwing otherwise.
 *
 * For tests and hosts that treat any engine error as fatal.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new GameErrorException(result.error);
  }
  return result.value;
}

// ── Invariants ──────────────────────────────────────────────

/** A broken internal invariant: a bug in the engine, not a caller error. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`[engine invariant] ${message}`);
    this.name = 'InvariantViolation';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message);
  }
}

export function expectDefined<T>(value: T | undefined, context: string): T {
  if (value === undefined) {
    throw new InvariantViolation(context);
  }
  return value;
}
