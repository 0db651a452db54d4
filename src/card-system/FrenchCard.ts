/**
 * The 52-card French deck and jokers.
 *
 * French cards are a separate model from the Italian `Card`: the rank
 * sets differ (2-10 plus Jack, Queen and King) and a French deck may
 * carry jokers, which have neither rank nor suit.
 */

/** French ranks in canonical order (Ace low). */
export type FrenchRank =
  | 'A'
  | '2'
  | '3'
  | '4'
  | '5'
  | '6'
  | '7'
  | '8'
  | '9'
  | '10'
  | 'J'
  | 'Q'
  | 'K';

export const FRENCH_RANKS: readonly FrenchRank[] = [
  'A',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  'J',
  'Q',
  'K',
] as const;

/**
 * French suits, in canonical deck order. Hearts match the Latin cups,
 * diamonds coins, clubs clubs and spades swords.
 */
export type FrenchSuit = 'hearts' | 'diamonds' | 'clubs' | 'spades';

export const FRENCH_SUITS: readonly FrenchSuit[] = [
  'hearts',
  'diamonds',
  'clubs',
  'spades',
] as const;

export interface FrenchCard {
  readonly kind: 'card';
  readonly rank: FrenchRank;
  readonly suit: FrenchSuit;
}

export interface Joker {
  readonly kind: 'joker';
}

/** A card from a French deck that may include jokers. */
export type FrenchWithJoker = FrenchCard | Joker;

export function createFrenchCard(rank: FrenchRank, suit: FrenchSuit): FrenchCard {
  return Object.freeze({ kind: 'card', rank, suit });
}

/** Jokers are interchangeable; every joker is this value. */
export const JOKER: Joker = Object.freeze({ kind: 'joker' });

export function isJoker(card: FrenchWithJoker): card is Joker {
  return card.kind === 'joker';
}

/** Stable key, e.g. `10-hearts`, or `joker`. */
export function frenchCardKey(card: FrenchWithJoker): string {
  return isJoker(card) ? 'joker' : `${card.rank}-${card.suit}`;
}

const FRENCH_RANK_NAMES: Record<FrenchRank, string> = {
  A: 'Ace',
  '2': 'Two',
  '3': 'Three',
  '4': 'Four',
  '5': 'Five',
  '6': 'Six',
  '7': 'Seven',
  '8': 'Eight',
  '9': 'Nine',
  '10': 'Ten',
  J: 'Jack',
  Q: 'Queen',
  K: 'King',
};

/** Human-readable label, e.g. `Queen of spades` or `Joker`. */
export function formatFrenchCard(card: FrenchWithJoker): string {
  return isJoker(card) ? 'Joker' : `${FRENCH_RANK_NAMES[card.rank]} of ${card.suit}`;
}
