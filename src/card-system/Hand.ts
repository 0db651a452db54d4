/**
 * Hand abstraction for the card engine.
 *
 * A Hand is the ordered collection of cards a player holds. Cards are
 * kept in the order they were received; lookups are by value, so any
 * Card with the same rank and suit matches.
 */

import type { Card, Suit } from './Card';
import { cardsEqual } from './Card';

export class Hand {
  private readonly cards: Card[];

  /**
   * Create a Hand, optionally pre-populated with cards.
   */
  constructor(cards: readonly Card[] = []) {
    this.cards = [...cards];
  }

  /** Add one or more cards to the end of the hand. */
  give(...newCards: Card[]): void {
    this.cards.push(...newCards);
  }

  /**
   * Remove a card from the hand.
   * @returns The removed card, or `undefined` if it was not held.
   */
  remove(card: Card): Card | undefined {
    const index = this.cards.findIndex((c) => cardsEqual(c, card));
    if (index === -1) return undefined;
    return this.cards.splice(index, 1)[0];
  }

  /** Whether the hand holds the card. */
  has(card: Card): boolean {
    return this.cards.some((c) => cardsEqual(c, card));
  }

  /** Whether the hand holds at least one card of the suit. */
  hasSuit(suit: Suit): boolean {
    return this.cards.some((c) => c.suit === suit);
  }

  /** The held cards of one suit, in hand order. */
  cardsOfSuit(suit: Suit): Card[] {
    return this.cards.filter((c) => c.suit === suit);
  }

  /** Whether the hand is empty. */
  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  /** The number of cards held. */
  size(): number {
    return this.cards.length;
  }

  /**
   * Return a shallow copy of the cards in hand order.
   * Useful for inspection and display.
   */
  toArray(): Card[] {
    return [...this.cards];
  }
}
