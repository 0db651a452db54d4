/**
 * Tressette
 *
 * Four players in two partnerships (or each for themselves) with
 * the 40-card Italian deck: no trumps, follow suit, points counted in
 * thirds, one extra point for the last trick, first side to 31 wins.
 */

export {
  TRICK_RANK_ORDER,
  trickRank,
  compareTrickRank,
  cardPointValue,
  cardPoints,
  DECK_POINTS,
} from './TressetteCards';

export type {
  TressettePlayerCount,
  ScoringMode,
  SideScore,
  FinalScores,
} from './TressetteRules';
export {
  SCORE_TO_WIN,
  LAST_TRICK_BONUS,
  SUPPORTED_PLAYER_COUNTS,
  isSupportedPlayerCount,
  tressetteRules,
  playableCards,
  sideCount,
  sideOfSeat,
  computeFinalScores,
  matchWinner,
  isMatchComplete,
} from './TressetteRules';

export type { TressetteOptions, ResolvedTressetteOptions } from './TressetteOptions';
export { TressetteOptionsSchema, resolveTressetteOptions } from './TressetteOptions';

export type {
  TressettePlayerState,
  TressetteGameState,
  TrickOutcome,
} from './TressetteGame';
export { TressetteGame, createTressetteGame, setupTressetteGame } from './TressetteGame';

export type { TressetteMatchOptions } from './TressetteMatch';
export { TressetteMatch, createTressetteMatch } from './TressetteMatch';

export type { TurnView, AiStrategy } from './AiStrategy';
export { RandomStrategy, GreedyStrategy, AiPlayer } from './AiStrategy';
