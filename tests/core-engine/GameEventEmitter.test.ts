import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  GameEventEmitter,
  type CardDrawnPayload,
  type GameEndedPayload,
  type GuessResolvedPayload,
  type RoundStartedPayload,
} from '../../src/core-engine/GameEventEmitter';

const twoOfHearts = { suit: 'Hearts', rank: '2', value: 1 };
const kingOfClubs = { suit: 'Clubs', rank: 'King', value: 12 };

describe('GameEventEmitter', () => {
  let emitter: GameEventEmitter;

  beforeEach(() => {
    emitter = new GameEventEmitter();
  });

  // ── Basic emission & subscription ─────────────────────

  describe('on / emit', () => {
    it('should call listener when event is emitted', () => {
      const listener = vi.fn();
      emitter.on('card-drawn', listener);

      const payload: CardDrawnPayload = { card: twoOfHearts, cardsRemaining: 51 };
      emitter.emit('card-drawn', payload);

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(payload);
    });

    it('should support multiple listeners for the same event', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('round-started', a);
      emitter.on('round-started', b);

      const payload: RoundStartedPayload = { round: 1, cardsRemaining: 51 };
      emitter.emit('round-started', payload);

      expect(a).toHaveBeenCalledOnce();
      expect(b).toHaveBeenCalledOnce();
    });

    it('should call listeners in registration order', () => {
      const order: number[] = [];
      emitter.on('round-started', () => order.push(1));
      emitter.on('round-started', () => order.push(2));
      emitter.on('round-started', () => order.push(3));

      emitter.emit('round-started', { round: 2, cardsRemaining: 43 });
      expect(order).toEqual([1, 2, 3]);
    });

    it('should not call listeners for different events', () => {
      const listener = vi.fn();
      emitter.on('game-ended', listener);

      emitter.emit('round-started', { round: 1, cardsRemaining: 10 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should do nothing when emitting with no listeners', () => {
      expect(() =>
        emitter.emit('game-ended', { reason: 'quit', finalScore: 50, turnsPlayed: 0 }),
      ).not.toThrow();
    });

    it('should deliver the full guess payload', () => {
      const received: GuessResolvedPayload[] = [];
      emitter.on('guess-resolved', (p) => received.push(p));

      const payload: GuessResolvedPayload = {
        turnNumber: 1,
        guess: 'higher',
        previous: twoOfHearts,
        next: kingOfClubs,
        correct: true,
        delta: 20,
        score: 70,
      };
      emitter.emit('guess-resolved', payload);

      expect(received).toEqual([payload]);
    });
  });

  // ── Unsubscribe ───────────────────────────────────────

  describe('unsubscribe', () => {
    it('should stop calling a listener after the returned function runs', () => {
      const listener = vi.fn();
      const off = emitter.on('card-drawn', listener);

      off();
      emitter.emit('card-drawn', { card: twoOfHearts, cardsRemaining: 0 });
      expect(listener).not.toHaveBeenCalled();
    });

    it('should remove only the given listener with off()', () => {
      const a = vi.fn();
      const b = vi.fn();
      emitter.on('card-drawn', a);
      emitter.on('card-drawn', b);

      emitter.off('card-drawn', a);
      emitter.emit('card-drawn', { card: twoOfHearts, cardsRemaining: 3 });

      expect(a).not.toHaveBeenCalled();
      expect(b).toHaveBeenCalledOnce();
    });

    it('should ignore off() for a listener that was never added', () => {
      expect(() => emitter.off('game-ended', vi.fn())).not.toThrow();
    });

    it('should let a listener unsubscribe during emission', () => {
      const calls: string[] = [];
      const off = emitter.on('round-started', () => {
        calls.push('first');
        off();
      });
      emitter.on('round-started', () => calls.push('second'));

      emitter.emit('round-started', { round: 1, cardsRemaining: 5 });
      emitter.emit('round-started', { round: 2, cardsRemaining: 3 });

      expect(calls).toEqual(['first', 'second', 'second']);
    });
  });

  // ── once ──────────────────────────────────────────────

  describe('once', () => {
    it('should fire only on the first emission', () => {
      const listener = vi.fn();
      emitter.once('game-ended', listener);

      const payload: GameEndedPayload = {
        reason: 'out-of-points',
        finalScore: -10,
        turnsPlayed: 4,
      };
      emitter.emit('game-ended', payload);
      emitter.emit('game-ended', payload);

      expect(listener).toHaveBeenCalledOnce();
      expect(listener).toHaveBeenCalledWith(payload);
    });

    it('should be cancellable before it fires', () => {
      const listener = vi.fn();
      const off = emitter.once('game-ended', listener);
      off();

      emitter.emit('game-ended', { reason: 'quit', finalScore: 50, turnsPlayed: 0 });
      expect(listener).not.toHaveBeenCalled();
    });
  });

  // ── Bookkeeping ───────────────────────────────────────

  describe('listenerCount / removeAllListeners', () => {
    it('should count listeners per event', () => {
      emitter.on('card-drawn', vi.fn());
      emitter.on('card-drawn', vi.fn());
      emitter.on('game-ended', vi.fn());

      expect(emitter.listenerCount('card-drawn')).toBe(2);
      expect(emitter.listenerCount('game-ended')).toBe(1);
      expect(emitter.listenerCount('round-started')).toBe(0);
    });

    it('should remove listeners for one event only', () => {
      emitter.on('card-drawn', vi.fn());
      emitter.on('game-ended', vi.fn());

      emitter.removeAllListeners('card-drawn');

      expect(emitter.listenerCount('card-drawn')).toBe(0);
      expect(emitter.listenerCount('game-ended')).toBe(1);
    });

    it('should remove every listener', () => {
      const listener = vi.fn();
      emitter.on('card-drawn', listener);
      emitter.on('game-ended', vi.fn());

      emitter.removeAllListeners();
      emitter.emit('card-drawn', { card: twoOfHearts, cardsRemaining: 1 });

      expect(listener).not.toHaveBeenCalled();
      expect(emitter.listenerCount('game-ended')).toBe(0);
    });
  });
});
