/**
 * Card System Module
 *
 * Immutable cards, factories keyed by card type, interchangeable
 * shuffle strategies, and the Deck that ties them together.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card types and factories
export type { Card, CardFactory, CardType, StandardCardFactoryOptions } from './Card';
export {
  STANDARD_SUITS,
  STANDARD_RANKS,
  StandardCardFactory,
  cardsEqual,
  cardKey,
  formatCard,
} from './Card';

// Factory registry
export { CardFactoryRegistry, createDefaultCardRegistry } from './CardFactoryRegistry';

// Shuffle strategies
export type {
  Rng,
  ShuffleStrategy,
  ShuffleStrategyName,
  ShuffleOptions,
  WeakShuffleOptions,
} from './ShuffleStrategy';
export {
  SHUFFLE_STRATEGY_NAMES,
  RandomShuffle,
  RiffleShuffle,
  FisherYatesShuffle,
  WeakShuffle,
  createShuffleStrategy,
} from './ShuffleStrategy';

// Deck
export type { DeckState, DeckOptions } from './Deck';
export { Deck, createStandardDeck } from './Deck';

// Errors
export type { CardSystemErrorCode } from './errors';
export {
  CardSystemError,
  InvalidArgumentError,
  UnknownCardTypeError,
  EmptyDeckError,
} from './errors';
