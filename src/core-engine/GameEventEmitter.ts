/**
 * Typed event emitter for game lifecycle events.
 *
 * Games emit these events at key points of a session; front ends
 * and tests subscribe to them to render output or to assert on the
 * sequence of play without reaching into game state.
 */

import type { Card } from '../card-system/Card';

// ── Event Payloads ──────────────────────────────────────────

/** Emitted when a new round of guesses begins. */
export interface RoundStartedPayload {
  /** 1-based round number. */
  readonly round: number;
  /** Cards left in the deck when the round started. */
  readonly cardsRemaining: number;
}

/** Emitted whenever a card leaves the deck. */
export interface CardDrawnPayload {
  readonly card: Card;
  /** Cards left in the deck after the draw. */
  readonly cardsRemaining: number;
}

/** Emitted after a guess has been scored. */
export interface GuessResolvedPayload {
  /** Monotonically increasing guess counter (1-based). */
  readonly turnNumber: number;
  readonly guess: 'higher' | 'lower';
  readonly previous: Card;
  readonly next: Card;
  readonly correct: boolean;
  /** Points gained (positive) or lost (negative). */
  readonly delta: number;
  /** Score after applying `delta`. */
  readonly score: number;
}

/** Emitted once when the game has ended. */
export interface GameEndedPayload {
  readonly reason: 'out-of-points' | 'deck-exhausted' | 'quit';
  readonly finalScore: number;
  readonly turnsPlayed: number;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'round-started': RoundStartedPayload;
  'card-drawn': CardDrawnPayload;
  'guess-resolved': GuessResolvedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('guess-resolved', (payload) => {
 *   console.log(`Guess ${payload.turnNumber}: ${payload.correct ? 'right' : 'wrong'}`);
 * });
 * ```
 */
export class GameEventEmitter {
  private listeners: ListenerTable = GameEventEmitter.emptyTable();

  private static emptyTable(): ListenerTable {
    return {
      'round-started': [],
      'card-drawn': [],
      'guess-resolved': [],
      'game-ended': [],
    };
  }

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    list.push(listener);
    return () => this.off(event, listener);
  }

  /**
   * Subscribe to an event for a single emission only.
   * Returns an unsubscribe function (in case you want to
   * cancel before it fires).
   */
  once<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    const wrapper: GameEventListener<K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };
    return this.on(event, wrapper);
  }

  /** Remove a specific listener for an event. */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event with the given payload.
   * Listeners are called synchronously in registration order.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    const list: Array<GameEventListener<K>> = this.listeners[event];
    // Copy the array so listeners can safely unsubscribe during emission
    for (const fn of [...list]) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: GameEventName): void {
    if (event) {
      this.listeners[event].length = 0;
    } else {
      this.listeners = GameEventEmitter.emptyTable();
    }
  }

  /** Return the number of listeners for a given event. */
  listenerCount(event: GameEventName): number {
    return this.listeners[event].length;
  }
}
