/**
 * Game phases and phase transitions.
 *
 * Operates on any state object carrying a `phase` field and mutates
 * it in place.
 */

/**
 * High-level phases of a game.
 *
 * - `setup`   -- Deck built, first card not yet dealt.
 * - `playing` -- Guesses are being taken.
 * - `ended`   -- No further moves; the result is final.
 */
export type GamePhase = 'setup' | 'playing' | 'ended';

/** Anything that tracks a game phase. */
export interface HasPhase {
  phase: GamePhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, GamePhase[]> = {
  setup: ['playing', 'ended'],
  playing: ['ended'],
  ended: [],
};

/** Whether the game has ended. */
export function isGameOver(state: HasPhase): boolean {
  return state.phase === 'ended';
}

/** Whether the game is in the active playing phase. */
export function isPlaying(state: HasPhase): boolean {
  return state.phase === 'playing';
}

/**
 * Transition to a new phase.
 *
 * @throws If transitioning to the same phase, or along an edge not
 *         in the transition table (e.g. `ended` -> `playing`).
 */
export function transitionTo(state: HasPhase, newPhase: GamePhase): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Game is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Start the game (setup -> playing). */
export function startGame(state: HasPhase): void {
  transitionTo(state, 'playing');
}

/** End the game (setup or playing -> ended). */
export function endGame(state: HasPhase): void {
  transitionTo(state, 'ended');
}
