/**
 * Rule Engine Module
 *
 * Game-independent trick-taking machinery: seat rotation, trick
 * collection and resolution, and the rules interface games implement.
 */
export const RULE_ENGINE_VERSION = '0.1.0';

export type { Play, PlayLegality, TrickTakingRules } from './TrickTakingRules';
export { highestOfLedSuit, checkFollowSuit, legalPlays } from './TrickTakingRules';

export type { TrickView, CompletedTrick } from './Trick';
export { nextSeat, OngoingTrick } from './Trick';
