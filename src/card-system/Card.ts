/**
 * Card types and factory functions for the card engine.
 *
 * Defines Rank, Suit, and Card for the 40-card Italian deck, the
 * foundational data model consumed by the deck, rule engine and games.
 */

/**
 * Italian card ranks: Ace to 7, then the three figures
 * J (Fante / Jack), N (Cavallo / Knight) and K (Re / King).
 */
export type Rank =
  | 'A'
  | '2'
  | '3'
  | '4'
  | '5'
  | '6'
  | '7'
  | 'J'
  | 'N'
  | 'K';

/** All ranks in canonical order (Ace low, King high). */
export const RANKS: readonly Rank[] = [
  'A',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  'J',
  'N',
  'K',
] as const;

/** The four Latin suits. */
export type Suit = 'coins' | 'cups' | 'swords' | 'clubs';

/** All suits in canonical deck order. */
export const SUITS: readonly Suit[] = [
  'coins',
  'cups',
  'swords',
  'clubs',
] as const;

/**
 * A playing card.
 *
 * Cards are plain frozen values: two cards with the same rank and suit
 * are interchangeable. Compare them with `cardsEqual`, never `===`.
 */
export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

/**
 * Create a single card.
 */
export function createCard(rank: Rank, suit: Suit): Card {
  return Object.freeze({ rank, suit });
}

/** Value equality for cards. */
export function cardsEqual(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

/** Stable string key for a card, e.g. `K-coins`. */
export function cardKey(card: Card): string {
  return `${card.rank}-${card.suit}`;
}

const RANK_NAMES: Record<Rank, string> = {
  A: 'Ace',
  '2': 'Two',
  '3': 'Three',
  '4': 'Four',
  '5': 'Five',
  '6': 'Six',
  '7': 'Seven',
  J: 'Jack',
  N: 'Knight',
  K: 'King',
};

/** Human-readable label, e.g. `King of coins`. */
export function formatCard(card: Card): string {
  return `${RANK_NAMES[card.rank]} of ${card.suit}`;
}

function isRank(value: string): value is Rank {
  return RANKS.some((rank) => rank === value);
}

function isSuit(value: string): value is Suit {
  return SUITS.some((suit) => suit === value);
}

/**
 * Parse a card key produced by `cardKey`.
 *
 * @returns The card, or `undefined` if the key is not a valid card.
 */
export function parseCard(key: string): Card | undefined {
  const dash = key.indexOf('-');
  if (dash <= 0) return undefined;

  const rank = key.slice(0, dash);
  const suit = key.slice(dash + 1);
  if (!isRank(rank) || !isSuit(suit)) return undefined;

  return createCard(rank, suit);
}

/** Position of a rank in canonical order (0 = Ace). */
export function rankIndex(rank: Rank): number {
  return RANKS.indexOf(rank);
}

/** Position of a suit in canonical order (0 = coins). */
export function suitIndex(suit: Suit): number {
  return SUITS.indexOf(suit);
}

/**
 * Comparator for canonical deck order: by suit, then by rank
 * (Ace first). Suitable for `Array.prototype.sort`.
 */
export function compareCanonical(a: Card, b: Card): number {
  return (
    suitIndex(a.suit) - suitIndex(b.suit) || rankIndex(a.rank) - rankIndex(b.rank)
  );
}
