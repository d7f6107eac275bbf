/**
 * Higher-or-Lower rules -- guess parsing, scoring and end-of-game
 * detection.
 *
 * Turn flow:
 *   1. The player sees the current card and guesses whether the next
 *      card's value will be higher or lower.
 *   2. The next card is drawn. A guess is correct only if the next
 *      value is strictly higher / strictly lower; ties lose.
 *   3. Correct: +20 points. Incorrect: -15 points.
 *   4. The next card becomes the current card.
 *
 * Game ending:
 *   - The score drops to 0 or below.
 *   - A new round would start with fewer cards left than the round
 *     size, or a draw finds the deck empty.
 *   - The player quits.
 */

import type { Card } from '../../src/card-system/Card';

export type Guess = 'higher' | 'lower';

export type EndReason = 'out-of-points' | 'deck-exhausted' | 'quit';

export const CORRECT_GUESS_POINTS = 20;
export const WRONG_GUESS_PENALTY = 15;
export const DEFAULT_STARTING_SCORE = 50;
export const DEFAULT_ROUND_SIZE = 8;

const GUESS_ALIASES = new Map<string, Guess>([
  ['h', 'higher'],
  ['higher', 'higher'],
  ['l', 'lower'],
  ['lower', 'lower'],
]);

/**
 * Parse raw player input into a guess.
 *
 * @returns The guess, or `null` if the input is not recognized.
 */
export function parseGuess(input: string): Guess | null {
  return GUESS_ALIASES.get(input.trim().toLowerCase()) ?? null;
}

/** Whether `guess` correctly predicts `next` relative to `current`. */
export function isCorrectGuess(guess: Guess, current: Card, next: Card): boolean {
  return guess === 'higher'
    ? next.value > current.value
    : next.value < current.value;
}

/** Points gained (positive) or lost (negative) for a guess outcome. */
export function scoreDelta(correct: boolean): number {
  return correct ? CORRECT_GUESS_POINTS : -WRONG_GUESS_PENALTY;
}

/** Whether the player has run out of points. */
export function isOutOfPoints(score: number): boolean {
  return score <= 0;
}

/**
 * Whether the deck can support another full round of guesses.
 * A round needs `roundSize` cards beyond the current one.
 */
export function canStartRound(cardsRemaining: number, roundSize: number): boolean {
  return cardsRemaining >= roundSize;
}
