/**
 * Text front end for Higher-or-Lower.
 *
 * Drives a session through a minimal prompt/print interface so the
 * same loop runs against a terminal (see main.ts) or scripted input
 * in tests.
 */

import { formatCard } from '../../src/card-system/Card';
import { isPlaying } from '../../src/core-engine/GamePhase';
import type { HigherOrLowerSession } from './HigherOrLowerGame';
import { playGuess, quitGame } from './HigherOrLowerGame';
import type { EndReason } from './HigherOrLowerRules';
import {
  CORRECT_GUESS_POINTS,
  WRONG_GUESS_PENALTY,
  parseGuess,
} from './HigherOrLowerRules';

/** Line-oriented player interface. */
export interface ConsoleIO {
  /** Show `prompt` and resolve with the player's answer. */
  ask(prompt: string): Promise<string>;
  print(line: string): void;
}

export const GUESS_PROMPT =
  'Will the next card be higher or lower than the current card? (h/l, q to quit): ';

export const INVALID_INPUT_MESSAGE =
  "Invalid input. Please enter 'h' for higher or 'l' for lower.";

const END_MESSAGES: Record<Exclude<EndReason, 'quit'>, string> = {
  'out-of-points': 'You have no points left. Game over.',
  'deck-exhausted': 'There are no more cards left in the deck. Game over.',
};

/** Welcome banner shown before the first card. */
export function welcomeLines(startingScore: number): string[] {
  return [
    'Welcome to Higher or Lower.',
    'You have to choose whether the next card to be shown will be higher or lower than the current card.',
    `Getting it right adds ${CORRECT_GUESS_POINTS} points; get it wrong and you lose ${WRONG_GUESS_PENALTY} points.`,
    `You have ${startingScore} points to start.`,
    '',
  ];
}

export function roundHeader(round: number, cardsRemaining: number): string {
  return `-- Round ${round} (${cardsRemaining} cards left) --`;
}

/** Closing line for a finished game. */
export function endLine(reason: EndReason, finalScore: number): string {
  return reason === 'quit'
    ? `Thanks for playing. Final score: ${finalScore} points.`
    : END_MESSAGES[reason];
}

/**
 * Play `session` to completion, reading guesses from `io`.
 * Unrecognized input is reported and asked again without using up
 * a guess; `q` quits.
 *
 * @returns The final score.
 */
export async function runHigherOrLower(
  session: HigherOrLowerSession,
  io: ConsoleIO,
): Promise<number> {
  for (const line of welcomeLines(session.score)) {
    io.print(line);
  }
  if (session.endReason !== null) {
    io.print(endLine(session.endReason, session.score));
    return session.score;
  }
  if (session.currentCard !== null) {
    io.print(roundHeader(session.round, session.deck.size()));
    io.print(
      `Your current card is ${formatCard(session.currentCard)}. You have ${session.score} points.`,
    );
  }

  const unsubscribe = [
    session.emitter.on('guess-resolved', ({ next, correct }) => {
      io.print(`The next card is ${formatCard(next)}.`);
      io.print(
        correct
          ? `Correct! You gain ${CORRECT_GUESS_POINTS} points.`
          : `Incorrect! You lose ${WRONG_GUESS_PENALTY} points.`,
      );
    }),
    session.emitter.on('round-started', ({ round, cardsRemaining }) => {
      io.print(roundHeader(round, cardsRemaining));
    }),
    session.emitter.on('game-ended', ({ reason, finalScore }) => {
      io.print(endLine(reason, finalScore));
    }),
  ];

  try {
    while (isPlaying(session)) {
      const answer = await io.ask(GUESS_PROMPT);
      if (answer.trim().toLowerCase() === 'q') {
        quitGame(session);
        break;
      }

      const guess = parseGuess(answer);
      if (guess === null) {
        io.print(INVALID_INPUT_MESSAGE);
        continue;
      }

      const result = playGuess(session, guess);
      if (result !== null && result.ended === null) {
        io.print(
          `Your current card is now ${formatCard(result.next)}. You have ${result.score} points.`,
        );
      }
    }
  } finally {
    for (const off of unsubscribe) off();
  }

  return session.score;
}
