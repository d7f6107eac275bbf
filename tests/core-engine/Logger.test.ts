import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  getLogLevel,
  setLogFormat,
  setLogLevel,
  setLogSink,
} from '../../src/core-engine/Logger';

describe('Logger', () => {
  const sink = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
  let restore: () => void;

  beforeEach(() => {
    sink.log.mockClear();
    sink.warn.mockClear();
    sink.error.mockClear();
    restore = setLogSink(sink);
  });

  afterEach(() => {
    restore();
    setLogLevel('info');
    setLogFormat('text');
  });

  it('should default to the info level', () => {
    expect(getLogLevel()).toBe('info');
  });

  it('should prefix lines with the tag and append context as JSON', () => {
    createLogger('Deck').info('Deck built', { size: 52 });
    expect(sink.log).toHaveBeenCalledWith('[Deck] Deck built {"size":52}');
  });

  it('should omit the context when none is given', () => {
    createLogger('main').info('hello');
    expect(sink.log).toHaveBeenCalledWith('[main] hello');
  });

  it('should route warn and error to their own sink methods', () => {
    const log = createLogger('Game');
    log.warn('careful');
    log.error('broken');

    expect(sink.warn).toHaveBeenCalledWith('[Game] careful');
    expect(sink.error).toHaveBeenCalledWith('[Game] broken');
    expect(sink.log).not.toHaveBeenCalled();
  });

  it('should drop messages below the current level', () => {
    const log = createLogger('Deck');
    log.debug('hidden');
    expect(sink.log).not.toHaveBeenCalled();

    setLogLevel('debug');
    log.debug('shown');
    expect(sink.log).toHaveBeenCalledWith('[Deck] shown');
  });

  it('should keep only errors at the error level', () => {
    setLogLevel('error');
    const log = createLogger('Deck');
    log.info('quiet');
    log.warn('quiet');
    log.error('loud');

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.warn).not.toHaveBeenCalled();
    expect(sink.error).toHaveBeenCalledOnce();
  });

  it('should write one JSON object per line in json format', () => {
    setLogFormat('json');
    createLogger('Deck').warn('Deck exhausted', { round: 3 });

    const line: unknown = sink.warn.mock.calls[0][0];
    expect(typeof line).toBe('string');
    const entry: unknown = JSON.parse(String(line));
    expect(entry).toMatchObject({
      level: 'warn',
      tag: 'Deck',
      message: 'Deck exhausted',
      round: 3,
    });
    expect(entry).toHaveProperty('timestamp');
  });

  it('should not let context keys replace the fixed json fields', () => {
    setLogFormat('json');
    createLogger('Deck').error('boom', { level: 'debug', message: 'fine', size: 4 });

    const entry: unknown = JSON.parse(String(sink.error.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'error', tag: 'Deck', message: 'boom', size: 4 });
  });

  it('should restore the previous sink', () => {
    restore();
    const other = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const undo = setLogSink(other);
    createLogger('x').info('to other');
    undo();
    restore = setLogSink(sink);
    createLogger('x').info('to sink');

    expect(other.log).toHaveBeenCalledWith('[x] to other');
    expect(sink.log).toHaveBeenCalledWith('[x] to sink');
  });
});
