/**
 * Core Engine Module
 *
 * Game state and phase management, typed lifecycle events, exact
 * point arithmetic, errors and logging shared by every game.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { GamePhase, PlayerInfo, GameState, GameStateOptions } from './GameState';
export { createGameState } from './GameState';

// Turn sequencer functions
export {
  getCurrentPlayer,
  getCurrentPlayerState,
  isPlaying,
  advanceTurn,
  passTurnTo,
  canTransition,
  transitionTo,
  startGame,
  endGame,
} from './TurnSequencer';

// Errors and results
export type {
  GameError,
  GameErrorKind,
  InvalidPlayerCountError,
  NotPlayerTurnError,
  CardNotInHandError,
  IllegalPlayError,
  InvalidGameStateError,
  InvalidRandomSourceError,
  InvalidOptionsError,
  Result,
} from './GameError';
export {
  ok,
  err,
  unwrap,
  GameErrorException,
  InvariantViolation,
  invariant,
  expectDefined,
} from './GameError';

// Exact points
export type { Points } from './Points';
export {
  ZERO_POINTS,
  points,
  sumPoints,
  wholePoints,
  formatPoints,
  ScoreBoard,
  uniqueLeader,
} from './Points';

// Logging
export type { Logger, LogLevel } from './Logger';
export { createConsoleLogger, silentLogger } from './Logger';

// Game event system
export type {
  HandDealtPayload,
  TurnStartedPayload,
  CardPlayedPayload,
  TrickResolvedPayload,
  GameEndedPayload,
  MatchEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';
