/**
 * Deck operations for the card engine.
 *
 * A Deck is represented as a plain card array. This module provides
 * factory functions for the Italian and French decks and operations
 * (shuffle, deal, draw) that work on any card array.
 */

import type { Card, Rank, Suit } from './Card';
import { RANKS, SUITS, createCard } from './Card';
import type { FrenchCard, FrenchWithJoker } from './FrenchCard';
import { FRENCH_RANKS, FRENCH_SUITS, JOKER, createFrenchCard } from './FrenchCard';
import type { RandomSource } from './Random';
import { drawIndex, fisherYates } from './Random';
import type { Result } from '../core-engine/GameError';
import { ok, err, invariant } from '../core-engine/GameError';

/** Number of cards in an Italian deck. */
export const ITALIAN_DECK_SIZE = SUITS.length * RANKS.length;

/**
 * Create the 40-card Italian deck in canonical order.
 *
 * Cards are ordered by suit (coins, cups, swords, clubs) then rank
 * (Ace through King).
 */
export function createItalianDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push(createCard(rank, suit));
    }
  }
  return deck;
}

/** Number of cards in a French deck without jokers. */
export const FRENCH_DECK_SIZE = FRENCH_SUITS.length * FRENCH_RANKS.length;

/**
 * Create the 52-card French deck in canonical order: hearts, diamonds,
 * clubs, spades, each from Ace to King.
 */
export function createFrenchDeck(): FrenchCard[] {
  const deck: FrenchCard[] = [];
  for (const suit of FRENCH_SUITS) {
    for (const rank of FRENCH_RANKS) {
      deck.push(createFrenchCard(rank, suit));
    }
  }
  return deck;
}

/**
 * Create the French deck followed by `jokers` jokers.
 *
 * @returns The deck, or `InvalidOptions` unless `jokers` is a
 *          non-negative integer.
 */
export function createFrenchDeckWithJokers(jokers: number): Result<FrenchWithJoker[]> {
  if (!Number.isInteger(jokers) || jokers < 0) {
    return err({
      kind: 'InvalidOptions',
      message: `Cannot add ${jokers} jokers to a deck`,
      issues: [`jokers: expected a non-negative integer, got ${jokers}`],
    });
  }
  const deck: FrenchWithJoker[] = createFrenchDeck();
  for (let i = 0; i < jokers; i++) {
    deck.push(JOKER);
  }
  return ok(deck);
}

/**
 * Create a deck from a specific list of rank/suit pairs.
 */
export function createDeckFrom(
  cards: ReadonlyArray<{ rank: Rank; suit: Suit }>,
): Card[] {
  return cards.map((c) => createCard(c.rank, c.suit));
}

/**
 * Shuffle a deck in place with the Fisher-Yates shuffler.
 *
 * @returns The same array reference (mutated), or `InvalidRandomSource`
 *          if the source misbehaves (the deck is then left as it was).
 */
export function shuffle<T>(deck: T[], source: RandomSource): Result<T[]> {
  return fisherYates(deck, source);
}

/**
 * Deal the whole deck round-robin: card `i` (from the front) goes to
 * seat `(firstSeat + i) % playerCount`.
 *
 * Dealing is a destructive read; the deck is empty afterwards.
 *
 * @returns One hand per seat, indexed by seat, or `InvalidPlayerCount`
 *          if the deck cannot be split evenly.
 */
export function deal<T>(
  deck: T[],
  playerCount: number,
  firstSeat: number = 0,
): Result<T[][]> {
  if (!Number.isInteger(playerCount) || playerCount < 1) {
    return err({
      kind: 'InvalidPlayerCount',
      message: `Cannot deal to ${playerCount} players`,
      playerCount,
    });
  }
  if (deck.length % playerCount !== 0) {
    return err({
      kind: 'InvalidPlayerCount',
      message: `A deck of ${deck.length} cards cannot be dealt evenly to ${playerCount} players`,
      playerCount,
    });
  }

  invariant(Number.isInteger(firstSeat), `firstSeat must be an integer, got ${firstSeat}`);
  const start = ((firstSeat % playerCount) + playerCount) % playerCount;

  const hands: T[][] = Array.from({ length: playerCount }, () => []);
  const cards = deck.splice(0, deck.length);
  cards.forEach((card, i) => {
    hands[(start + i) % playerCount].push(card);
  });
  return ok(hands);
}

/**
 * Draw the top card (last element) from a deck.
 *
 * @returns The drawn card, or `undefined` if the deck is empty.
 *          The card is removed from the deck array.
 */
export function draw<T>(deck: T[]): T | undefined {
  return deck.pop();
}

/**
 * Draw the top card from a deck, throwing if the deck is empty.
 *
 * Use this when an empty deck indicates a logic error.
 */
export function drawOrThrow<T>(deck: T[]): T {
  const card = deck.pop();
  if (card === undefined) {
    throw new Error('Cannot draw from an empty deck');
  }
  return card;
}

/**
 * Put a card back into the deck at a uniformly random position.
 */
export function insertAtRandom<T>(
  deck: T[],
  card: T,
  source: RandomSource,
): Result<T[]> {
  const position = drawIndex(source, deck.length + 1);
  if (!position.ok) return position;
  deck.splice(position.value, 0, card);
  return ok(deck);
}
