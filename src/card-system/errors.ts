/**
 * Error types raised by the card system.
 *
 * Every failure is local and synchronous. Callers can branch on
 * `instanceof` or on the machine-readable `code`.
 */

export type CardSystemErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_CARD_TYPE'
  | 'EMPTY_DECK';

/** Base class for all card-system failures. */
export class CardSystemError extends Error {
  readonly code: CardSystemErrorCode;

  constructor(code: CardSystemErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A suit, rank, value, count or list argument was rejected. */
export class InvalidArgumentError extends CardSystemError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/** No card factory is registered under the requested card type. */
export class UnknownCardTypeError extends CardSystemError {
  readonly cardType: string;

  constructor(cardType: string) {
    super('UNKNOWN_CARD_TYPE', `Factory for card type "${cardType}" not found`);
    this.cardType = cardType;
  }
}

/** A card was requested from a deck with no cards left. */
export class EmptyDeckError extends CardSystemError {
  constructor(message = 'Cannot draw from an empty deck') {
    super('EMPTY_DECK', message);
  }
}
