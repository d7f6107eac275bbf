import { describe, it, expect } from 'vitest';
import type { Card, CardFactory } from '../../src/card-system/Card';
import { StandardCardFactory } from '../../src/card-system/Card';
import {
  CardFactoryRegistry,
  createDefaultCardRegistry,
} from '../../src/card-system/CardFactoryRegistry';
import {
  CardSystemError,
  UnknownCardTypeError,
} from '../../src/card-system/errors';

class JokerCardFactory implements CardFactory {
  createCard(suit: string, rank: string, value: number): Card {
    return Object.freeze({ suit, rank, value });
  }
}

describe('CardFactoryRegistry', () => {
  it('should register the standard factory by default', () => {
    const registry = createDefaultCardRegistry();
    expect(registry.has('standard')).toBe(true);
    expect(registry.has('joker')).toBe(false);
    expect(registry.getFactory('standard')).toBeInstanceOf(StandardCardFactory);
  });

  it('should create cards through the registered factory', () => {
    const registry = createDefaultCardRegistry();
    expect(registry.createCard('standard', 'Diamonds', '5', 4)).toEqual({
      suit: 'Diamonds',
      rank: '5',
      value: 4,
    });
  });

  it('should fail with UnknownCardTypeError for an unregistered key', () => {
    const registry = createDefaultCardRegistry();
    expect(() => registry.getFactory('joker')).toThrow(
      'Factory for card type "joker" not found',
    );

    try {
      registry.createCard('special', 'Hearts', '2', 1);
      expect.unreachable('createCard should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownCardTypeError);
      expect(err).toBeInstanceOf(CardSystemError);
      if (err instanceof UnknownCardTypeError) {
        expect(err.code).toBe('UNKNOWN_CARD_TYPE');
        expect(err.cardType).toBe('special');
      }
    }
  });

  it('should add new card types without touching existing ones', () => {
    const registry = createDefaultCardRegistry().register(
      'joker',
      new JokerCardFactory(),
    );

    expect(registry.createCard('joker', 'Red', 'Joker', 14)).toEqual({
      suit: 'Red',
      rank: 'Joker',
      value: 14,
    });
    expect(registry.getAllFactories()).toHaveLength(2);
  });

  it('should replace a factory registered under the same key', () => {
    const custom = new StandardCardFactory({ suits: ['Coins'], ranks: ['1'] });
    const registry = new CardFactoryRegistry()
      .register('standard', new StandardCardFactory())
      .register('standard', custom);

    expect(registry.getFactory('standard')).toBe(custom);
    expect(registry.getAllFactories()).toEqual([custom]);
  });

  it('should start empty when constructed directly', () => {
    const registry = new CardFactoryRegistry();
    expect(registry.getAllFactories()).toEqual([]);
    expect(() => registry.getFactory('standard')).toThrow(UnknownCardTypeError);
  });
});
