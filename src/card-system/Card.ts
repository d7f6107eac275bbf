/**
 * Card types and factories for the card engine.
 *
 * A Card is an immutable (suit, rank, value) tuple. Cards are never
 * built directly by the deck; they go through a CardFactory so new
 * card kinds can be added without touching the deck or its callers.
 */

import { InvalidArgumentError } from './errors';

/** Standard suits, in deck-building order. */
export const STANDARD_SUITS: readonly string[] = [
  'Hearts',
  'Diamonds',
  'Clubs',
  'Spades',
] as const;

/** Standard ranks, weakest first (Ace high). */
export const STANDARD_RANKS: readonly string[] = [
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  'Jack',
  'Queen',
  'King',
  'Ace',
] as const;

/**
 * A playing card.
 *
 * `value` is the rank's strength: its 1-based position in the rank
 * ordering the deck was built from.
 */
export interface Card {
  readonly suit: string;
  readonly rank: string;
  readonly value: number;
}

/** Card kinds a factory can be registered under. */
export type CardType = 'standard' | 'joker' | 'special';

/** Builds cards of one kind from raw attributes. */
export interface CardFactory {
  createCard(suit: string, rank: string, value: number): Card;
}

/** Vocabulary accepted by a StandardCardFactory. */
export interface StandardCardFactoryOptions {
  /** Recognized suits (default STANDARD_SUITS). */
  suits?: readonly string[];
  /** Recognized ranks (default STANDARD_RANKS). */
  ranks?: readonly string[];
}

/**
 * Factory for ordinary suited cards.
 *
 * Rejects suits and ranks outside its vocabulary and any value that
 * is not a positive integer.
 */
export class StandardCardFactory implements CardFactory {
  private readonly suits: ReadonlySet<string>;
  private readonly ranks: ReadonlySet<string>;

  constructor(options: StandardCardFactoryOptions = {}) {
    const { suits = STANDARD_SUITS, ranks = STANDARD_RANKS } = options;
    this.suits = new Set(suits);
    this.ranks = new Set(ranks);
  }

  createCard(suit: string, rank: string, value: number): Card {
    if (!this.suits.has(suit)) {
      throw new InvalidArgumentError(`Unrecognized suit "${suit}"`);
    }
    if (!this.ranks.has(rank)) {
      throw new InvalidArgumentError(`Unrecognized rank "${rank}"`);
    }
    if (!Number.isInteger(value) || value <= 0) {
      throw new InvalidArgumentError(
        `Card value must be a positive integer, got ${value}`,
      );
    }
    return Object.freeze({ suit, rank, value });
  }
}

// ── Value helpers ───────────────────────────────────────────

/** Whether two cards carry the same suit, rank and value. */
export function cardsEqual(a: Card, b: Card): boolean {
  return a.suit === b.suit && a.rank === b.rank && a.value === b.value;
}

/** Identity key for a card, e.g. `"Hearts:Ace"`. */
export function cardKey(card: Card): string {
  return `${card.suit}:${card.rank}`;
}

/** Human-readable name, e.g. `"Ace of Hearts"`. */
export function formatCard(card: Card): string {
  return `${card.rank} of ${card.suit}`;
}
