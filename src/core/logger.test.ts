import { describe, it, expect, vi } from 'vitest';
import { Logger, parseLogLevel } from './logger';

function fakeSink() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseLogLevel', () => {
  it.each([
    ['debug', 'debug'],
    ['INFO', 'info'],
    ['warn', 'warn'],
    ['warning', 'warn'],
    ['error', 'error'],
    ['none', 'none'],
    ['verbose', 'info'],
    [undefined, 'info'],
  ])('parses %s as %s', (input, expected) => {
    expect(parseLogLevel(input)).toBe(expected);
  });
});

describe('Logger', () => {
  it('prefixes lines with the level', () => {
    const sink = fakeSink();
    const logger = new Logger('debug', sink);

    logger.debug('a');
    logger.info('b', 42);
    logger.warn('c');
    logger.error('d');

    expect(sink.debug).toHaveBeenCalledWith('[DEBUG] a');
    expect(sink.info).toHaveBeenCalledWith('[INFO] b', 42);
    expect(sink.warn).toHaveBeenCalledWith('[WARN] c');
    expect(sink.error).toHaveBeenCalledWith('[ERROR] d');
  });

  it('drops lines below the level', () => {
    const sink = fakeSink();
    const logger = new Logger('warn', sink);

    logger.debug('a');
    logger.info('b');
    logger.warn('c');

    expect(sink.debug).not.toHaveBeenCalled();
    expect(sink.info).not.toHaveBeenCalled();
    expect(sink.warn).toHaveBeenCalledTimes(1);
  });

  it('logs nothing at none', () => {
    const sink = fakeSink();
    const logger = new Logger('none', sink);

    logger.error('x');

    expect(sink.error).not.toHaveBeenCalled();
    expect(logger.isEnabled('error')).toBe(false);
  });
});
