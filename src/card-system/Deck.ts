/**
 * Deck for the card engine.
 *
 * A Deck owns an ordered sequence of cards. Cards are built through a
 * CardFactory looked up in a CardFactoryRegistry, reordered by an
 * injected ShuffleStrategy, and drawn from the front.
 *
 * Lifecycle:
 *   empty    -- constructed, no cards yet
 *   built    -- createDeck() ran; cards are in suit-major, rank-minor order
 *   shuffled -- shuffleDeck() ran at least once since the last build
 *
 * Drawing keeps the current state and shrinks the deck. Only a
 * rebuild with createDeck() changes the contents otherwise.
 */

import { createLogger } from '../core-engine/Logger';
import type { Card, CardType } from './Card';
import { STANDARD_RANKS, STANDARD_SUITS } from './Card';
import type { CardFactoryRegistry } from './CardFactoryRegistry';
import { createDefaultCardRegistry } from './CardFactoryRegistry';
import { EmptyDeckError, InvalidArgumentError } from './errors';
import type { ShuffleStrategy } from './ShuffleStrategy';
import { RandomShuffle } from './ShuffleStrategy';

const log = createLogger('Deck');

export type DeckState = 'empty' | 'built' | 'shuffled';

export interface DeckOptions {
  /** Shuffle algorithm (default RandomShuffle). */
  shuffleStrategy?: ShuffleStrategy;
  /**
   * Factories to build cards with (default: `standard` only). Decks with
   * their own suits or ranks need a factory that recognizes them, so the
   * same vocabulary is given here and to createDeck().
   */
  registry?: CardFactoryRegistry;
  /** Registry key of the factory used by createDeck (default 'standard'). */
  cardType?: CardType | string;
  /**
   * Reshuffle the remaining cards before every draw instead of
   * dealing from a single shuffled order. Off by default.
   */
  reshuffleOnDraw?: boolean;
}

/** Operations allowed from each state, and the state they lead to. */
const TRANSITIONS: Record<DeckState, { build: DeckState; shuffle: DeckState | null }> = {
  empty: { build: 'built', shuffle: null },
  built: { build: 'built', shuffle: 'shuffled' },
  shuffled: { build: 'built', shuffle: 'shuffled' },
};

function assertUniqueNonEmpty(label: string, values: readonly string[]): void {
  if (values.length === 0) {
    throw new InvalidArgumentError(`Cannot create a deck with no ${label}`);
  }
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new InvalidArgumentError(`Duplicate entry "${value}" in ${label}`);
    }
    seen.add(value);
  }
}

export class Deck {
  private cards: Card[] = [];
  private state: DeckState = 'empty';
  private shuffleStrategy: ShuffleStrategy;
  private readonly registry: CardFactoryRegistry;
  private readonly cardType: string;
  private readonly reshuffleOnDraw: boolean;

  /**
   * @throws UnknownCardTypeError if `cardType` is not registered.
   */
  constructor(options: DeckOptions = {}) {
    this.shuffleStrategy = options.shuffleStrategy ?? new RandomShuffle();
    this.registry = options.registry ?? createDefaultCardRegistry();
    this.cardType = options.cardType ?? 'standard';
    this.reshuffleOnDraw = options.reshuffleOnDraw ?? false;

    // Unknown card types are rejected here, not on the first build.
    this.registry.getFactory(this.cardType);
  }

  /**
   * Build one card per (suit, rank) pair, suits outer and ranks inner.
   * Each card's value is the 1-based position of its rank in `ranks`.
   * Any previous contents are discarded.
   *
   * @throws InvalidArgumentError if either list is empty or has duplicates,
   *         or the factory rejects a suit or rank.
   */
  createDeck(suits: readonly string[], ranks: readonly string[]): this {
    assertUniqueNonEmpty('suits', suits);
    assertUniqueNonEmpty('ranks', ranks);

    const factory = this.registry.getFactory(this.cardType);
    const cards: Card[] = [];
    for (const suit of suits) {
      ranks.forEach((rank, index) => {
        cards.push(factory.createCard(suit, rank, index + 1));
      });
    }

    this.cards = cards;
    this.state = TRANSITIONS[this.state].build;
    log.debug('Deck built', { cardType: this.cardType, size: cards.length });
    return this;
  }

  /**
   * Reorder the remaining cards with the configured strategy. The deck
   * adopts the new order; a copy of it is returned.
   *
   * @throws EmptyDeckError if the deck was never built.
   */
  shuffleDeck(): readonly Card[] {
    const next = TRANSITIONS[this.state].shuffle;
    if (next === null) {
      throw new EmptyDeckError('Cannot shuffle a deck that has not been created');
    }

    this.cards = this.shuffleStrategy.shuffle(this.cards);
    this.state = next;
    log.debug('Deck shuffled', {
      strategy: this.shuffleStrategy.name,
      size: this.cards.length,
    });
    return [...this.cards];
  }

  /**
   * Remove and return the front card.
   *
   * @throws EmptyDeckError if no cards remain.
   */
  drawCard(): Card {
    if (this.cards.length === 0) {
      throw new EmptyDeckError();
    }
    if (this.reshuffleOnDraw) {
      this.shuffleDeck();
    }

    const card = this.cards.shift();
    if (card === undefined) {
      throw new EmptyDeckError();
    }
    if (this.cards.length === 0) {
      log.debug('Deck exhausted');
    }
    return card;
  }

  /** Look at the front card without removing it. */
  peek(): Card | undefined {
    return this.cards[0];
  }

  size(): number {
    return this.cards.length;
  }

  isEmpty(): boolean {
    return this.cards.length === 0;
  }

  getState(): DeckState {
    return this.state;
  }

  /** Copy of the remaining cards, front first. */
  toArray(): Card[] {
    return [...this.cards];
  }

  getShuffleStrategy(): ShuffleStrategy {
    return this.shuffleStrategy;
  }

  /** Swap the algorithm used by later shuffles. */
  setShuffleStrategy(strategy: ShuffleStrategy): void {
    this.shuffleStrategy = strategy;
  }
}

/**
 * Create a standard 52-card deck (no jokers), unshuffled.
 *
 * Cards are ordered by suit (Hearts, Diamonds, Clubs, Spades) then
 * rank (2 through Ace), so values run 1..13 within each suit.
 */
export function createStandardDeck(options: DeckOptions = {}): Deck {
  return new Deck(options).createDeck(STANDARD_SUITS, STANDARD_RANKS);
}
