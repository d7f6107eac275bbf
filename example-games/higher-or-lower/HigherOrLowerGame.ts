/**
 * Higher-or-Lower orchestration -- ties together the deck, the rules
 * and the phase sequencer into a playable single-player session.
 *
 * Provides:
 *   - HigherOrLowerSession: full session state
 *   - Game setup (build, shuffle once, deal the first card)
 *   - Guess resolution (draw + score + round/end checks)
 *   - Quitting
 *
 * The deck is shuffled once at setup and dealt sequentially; pass
 * `reshuffleOnDraw` to reshuffle the remaining cards before each draw.
 */

import type { Card } from '../../src/card-system/Card';
import { STANDARD_RANKS, STANDARD_SUITS } from '../../src/card-system/Card';
import type { CardFactoryRegistry } from '../../src/card-system/CardFactoryRegistry';
import { Deck } from '../../src/card-system/Deck';
import { EmptyDeckError, InvalidArgumentError } from '../../src/card-system/errors';
import type { ShuffleStrategy } from '../../src/card-system/ShuffleStrategy';
import { FisherYatesShuffle } from '../../src/card-system/ShuffleStrategy';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { GamePhase } from '../../src/core-engine/GamePhase';
import { endGame, isPlaying, startGame } from '../../src/core-engine/GamePhase';
import { createLogger } from '../../src/core-engine/Logger';
import type { EndReason, Guess } from './HigherOrLowerRules';
import {
  DEFAULT_ROUND_SIZE,
  DEFAULT_STARTING_SCORE,
  canStartRound,
  isCorrectGuess,
  isOutOfPoints,
  scoreDelta,
} from './HigherOrLowerRules';

const log = createLogger('HigherOrLower');

// ── Session state ───────────────────────────────────────────

/** Outcome of one resolved guess. */
export interface GuessResult {
  /** 1-based guess counter across the whole game. */
  turnNumber: number;
  guess: Guess;
  previous: Card;
  next: Card;
  correct: boolean;
  delta: number;
  /** Score after this guess. */
  score: number;
  /** Why the game ended on this guess, or `null` if it continues. */
  ended: EndReason | null;
}

/** A complete Higher-or-Lower game session. */
export interface HigherOrLowerSession {
  readonly deck: Deck;
  readonly emitter: GameEventEmitter;
  readonly roundSize: number;
  phase: GamePhase;
  score: number;
  /** The card the next guess is compared against. */
  currentCard: Card | null;
  /** 1-based round number. */
  round: number;
  guessesThisRound: number;
  /** Guesses resolved so far. */
  turnNumber: number;
  endReason: EndReason | null;
  history: GuessResult[];
}

// ── Setup ───────────────────────────────────────────────────

export interface HigherOrLowerSetupOptions {
  /** Guesses per round (default 8). */
  roundSize?: number;
  /** Points at the start of the game (default 50). */
  startingScore?: number;
  /** Shuffle algorithm (default FisherYatesShuffle). */
  shuffleStrategy?: ShuffleStrategy;
  /** Reshuffle the remaining cards before every draw (default false). */
  reshuffleOnDraw?: boolean;
  /** Suits to build the deck from (default STANDARD_SUITS). */
  suits?: readonly string[];
  /** Ranks to build the deck from, weakest first (default STANDARD_RANKS). */
  ranks?: readonly string[];
  /** Card factories (default: the standard factory only). */
  registry?: CardFactoryRegistry;
  /** Event emitter to publish to (a new one is created if omitted). */
  emitter?: GameEventEmitter;
}

function assertPositiveInteger(label: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${label} must be a positive integer, got ${value}`);
  }
}

/**
 * Set up a new game: build and shuffle the deck, deal the first
 * current card and start round 1.
 *
 * If the deck cannot supply even one full round the session is
 * returned already ended with `deck-exhausted`.
 *
 * @throws InvalidArgumentError for a non-positive round size or
 *         starting score, or a rejected suit/rank list.
 */
export function setupHigherOrLowerGame(
  options: HigherOrLowerSetupOptions = {},
): HigherOrLowerSession {
  const {
    roundSize = DEFAULT_ROUND_SIZE,
    startingScore = DEFAULT_STARTING_SCORE,
    shuffleStrategy = new FisherYatesShuffle(),
    reshuffleOnDraw = false,
    suits = STANDARD_SUITS,
    ranks = STANDARD_RANKS,
    registry,
    emitter = new GameEventEmitter(),
  } = options;

  assertPositiveInteger('Round size', roundSize);
  assertPositiveInteger('Starting score', startingScore);

  const deck = new Deck({ shuffleStrategy, registry, reshuffleOnDraw });
  deck.createDeck(suits, ranks);
  deck.shuffleDeck();

  const session: HigherOrLowerSession = {
    deck,
    emitter,
    roundSize,
    phase: 'setup',
    score: startingScore,
    currentCard: null,
    round: 0,
    guessesThisRound: 0,
    turnNumber: 0,
    endReason: null,
    history: [],
  };

  session.currentCard = drawAndAnnounce(session);
  startGame(session);
  beginNextRound(session);

  log.debug('Game set up', {
    strategy: shuffleStrategy.name,
    deckSize: deck.size() + 1,
    roundSize,
    startingScore,
  });
  return session;
}

// ── Play ────────────────────────────────────────────────────

/**
 * Resolve one guess against the next card of the deck.
 *
 * @returns The guess outcome, or `null` if the deck ran out before
 *          the guess could be resolved (the game is then ended with
 *          `deck-exhausted`).
 * @throws If the game is not in the playing phase.
 */
export function playGuess(
  session: HigherOrLowerSession,
  guess: Guess,
): GuessResult | null {
  const previous = session.currentCard;
  if (!isPlaying(session) || previous === null) {
    throw new Error(`Cannot guess: game is in phase "${session.phase}"`);
  }

  let next: Card;
  try {
    next = drawAndAnnounce(session);
  } catch (err) {
    if (err instanceof EmptyDeckError) {
      finishGame(session, 'deck-exhausted');
      return null;
    }
    throw err;
  }

  const correct = isCorrectGuess(guess, previous, next);
  const delta = scoreDelta(correct);
  session.score += delta;
  session.turnNumber++;
  session.guessesThisRound++;
  session.currentCard = next;

  session.emitter.emit('guess-resolved', {
    turnNumber: session.turnNumber,
    guess,
    previous,
    next,
    correct,
    delta,
    score: session.score,
  });

  if (isOutOfPoints(session.score)) {
    finishGame(session, 'out-of-points');
  } else if (session.guessesThisRound >= session.roundSize) {
    beginNextRound(session);
  }

  const result: GuessResult = {
    turnNumber: session.turnNumber,
    guess,
    previous,
    next,
    correct,
    delta,
    score: session.score,
    ended: session.endReason,
  };
  session.history.push(result);
  return result;
}

/**
 * End the game at the player's request. Has no effect on a game
 * that has already ended.
 */
export function quitGame(session: HigherOrLowerSession): void {
  if (session.phase !== 'ended') {
    finishGame(session, 'quit');
  }
}

// ── Internals ───────────────────────────────────────────────

function drawAndAnnounce(session: HigherOrLowerSession): Card {
  const card = session.deck.drawCard();
  session.emitter.emit('card-drawn', {
    card,
    cardsRemaining: session.deck.size(),
  });
  return card;
}

function beginNextRound(session: HigherOrLowerSession): void {
  const cardsRemaining = session.deck.size();
  if (!canStartRound(cardsRemaining, session.roundSize)) {
    finishGame(session, 'deck-exhausted');
    return;
  }

  session.round++;
  session.guessesThisRound = 0;
  session.emitter.emit('round-started', {
    round: session.round,
    cardsRemaining,
  });
}

function finishGame(session: HigherOrLowerSession, reason: EndReason): void {
  session.endReason = reason;
  endGame(session);
  log.debug('Game ended', { reason, score: session.score, turns: session.turnNumber });
  session.emitter.emit('game-ended', {
    reason,
    finalScore: session.score,
    turnsPlayed: session.turnNumber,
  });
}
