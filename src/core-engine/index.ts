/**
 * Core Engine Module
 *
 * Game phase management, the typed lifecycle event emitter and
 * tagged logging shared by every game built on the card system.
 */
export const ENGINE_VERSION = '0.1.0';

// Phase management
export type { GamePhase, HasPhase } from './GamePhase';
export {
  isGameOver,
  isPlaying,
  transitionTo,
  startGame,
  endGame,
} from './GamePhase';

// Game event system
export type {
  RoundStartedPayload,
  CardDrawnPayload,
  GuessResolvedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Logging
export type { LogLevel, LogFormat, LogContext, LogSink } from './Logger';
export {
  LOG_LEVELS,
  LOG_FORMATS,
  Logger,
  createLogger,
  setLogLevel,
  getLogLevel,
  setLogFormat,
  setLogSink,
} from './Logger';
