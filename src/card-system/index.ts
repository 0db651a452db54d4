/**
 * Card System Module
 *
 * Cards, the Italian and French decks, random sources with the
 * Fisher-Yates shuffler, and the Hand abstraction.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and factory
export type { Card, Rank, Suit } from './Card';
export {
  RANKS,
  SUITS,
  createCard,
  cardsEqual,
  cardKey,
  formatCard,
  parseCard,
  rankIndex,
  suitIndex,
  compareCanonical,
} from './Card';

// French cards and jokers
export type { FrenchRank, FrenchSuit, FrenchCard, Joker, FrenchWithJoker } from './FrenchCard';
export {
  FRENCH_RANKS,
  FRENCH_SUITS,
  JOKER,
  createFrenchCard,
  isJoker,
  frenchCardKey,
  formatFrenchCard,
} from './FrenchCard';

// Random sources and shuffler
export type { RandomSource } from './Random';
export {
  createSeededSource,
  fromFloatGenerator,
  defaultRandomSource,
  drawIndex,
  fisherYates,
} from './Random';

// Deck factory and operations
export {
  ITALIAN_DECK_SIZE,
  FRENCH_DECK_SIZE,
  createItalianDeck,
  createFrenchDeck,
  createFrenchDeckWithJokers,
  createDeckFrom,
  shuffle,
  deal,
  draw,
  drawOrThrow,
  insertAtRandom,
} from './Deck';

// Hand abstraction
export { Hand } from './Hand';
