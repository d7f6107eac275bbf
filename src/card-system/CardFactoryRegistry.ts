/**
 * Registry mapping card-type keys to card factories.
 *
 * Created once at startup and handed to whoever builds cards
 * (usually a Deck). Keys are plain strings at this boundary because
 * they may come from configuration; lookups of unregistered keys
 * fail with UnknownCardTypeError.
 */

import type { Card, CardFactory, CardType } from './Card';
import { StandardCardFactory } from './Card';
import { InvalidArgumentError, UnknownCardTypeError } from './errors';

export class CardFactoryRegistry {
  private readonly factories = new Map<string, CardFactory>();

  /** Register (or replace) the factory for a card type. */
  register(cardType: CardType | string, factory: CardFactory): this {
    if (typeof factory?.createCard !== 'function') {
      throw new InvalidArgumentError(
        `Factory for card type "${cardType}" must implement createCard`,
      );
    }
    this.factories.set(cardType, factory);
    return this;
  }

  /** Whether a factory is registered under `cardType`. */
  has(cardType: string): boolean {
    return this.factories.has(cardType);
  }

  getFactory(cardType: string): CardFactory {
    const factory = this.factories.get(cardType);
    if (!factory) {
      throw new UnknownCardTypeError(cardType);
    }
    return factory;
  }

  /** Build a card through the factory registered under `cardType`. */
  createCard(
    cardType: string,
    suit: string,
    rank: string,
    value: number,
  ): Card {
    return this.getFactory(cardType).createCard(suit, rank, value);
  }

  /** All registered factories, in registration order. */
  getAllFactories(): CardFactory[] {
    return [...this.factories.values()];
  }
}

/**
 * Create a registry with the `standard` factory registered.
 */
export function createDefaultCardRegistry(
  standard: CardFactory = new StandardCardFactory(),
): CardFactoryRegistry {
  return new CardFactoryRegistry().register('standard', standard);
}
