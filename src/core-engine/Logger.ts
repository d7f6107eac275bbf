/**
 * Levelled, tagged console logging.
 *
 * Each module creates its own tagged logger (`createLogger('Deck')`)
 * and writes lines such as `[Deck] Deck built {"size":52}`. Level
 * and format are process-wide and set once at startup from the
 * game configuration; `json` format emits one object per line for
 * log collectors.
 */

/** Levels from most to least verbose. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['text', 'json'] as const;

export type LogFormat = (typeof LOG_FORMATS)[number];

export type LogContext = Record<string, unknown>;

/** Where log lines are written. Matches the shape of `console`. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  sink: LogSink;
}

const settings: LoggerSettings = {
  level: 'info',
  format: 'text',
  sink: console,
};

/** Set the minimum level written by every logger. */
export function setLogLevel(level: LogLevel): void {
  settings.level = level;
}

export function getLogLevel(): LogLevel {
  return settings.level;
}

export function setLogFormat(format: LogFormat): void {
  settings.format = format;
}

/**
 * Redirect all loggers to `sink`. Returns a function that restores
 * the previous sink.
 */
export function setLogSink(sink: LogSink): () => void {
  const previous = settings.sink;
  settings.sink = sink;
  return () => {
    settings.sink = previous;
  };
}

export class Logger {
  constructor(readonly tag: string) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(settings.level)) {
      return;
    }

    const line = this.format(level, message, context);
    switch (level) {
      case 'warn':
        settings.sink.warn(line);
        break;
      case 'error':
        settings.sink.error(line);
        break;
      default:
        settings.sink.log(line);
    }
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    if (settings.format === 'json') {
      return JSON.stringify({
        ...context,
        timestamp: new Date().toISOString(),
        level,
        tag: this.tag,
        message,
      });
    }
    const ctx = context ? ` ${JSON.stringify(context)}` : '';
    return `[${this.tag}] ${message}${ctx}`;
  }
}

export function createLogger(tag: string): Logger {
  return new Logger(tag);
}
