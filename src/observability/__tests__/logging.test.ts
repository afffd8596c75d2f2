/**
 * Tests for logging utilities
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { ConsoleLogger, NOOP_LOGGER, logParseFailure, type Logger } from '../logging.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the minimum level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'warn' });

    logger.info('ignored');
    logger.warn('kept');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should stamp the protocol on every line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ protocol: 'rest-xml' });

    logger.error('Response parsing failed', { statusCode: 500 });

    expect(error).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[[^\]]+\] \[ERROR\] \[rest-xml\] Response parsing failed \{"statusCode":500\}$/
      )
    );
  });

  it('should omit the protocol and context when not given', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: 'trace' });

    logger.trace('Decoding member');

    expect(debug).toHaveBeenCalledWith(expect.stringMatching(/^\[[^\]]+\] \[TRACE\] Decoding member$/));
  });

  it('should default to the info level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger();

    logger.debug('hidden');
    logger.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith(expect.stringMatching(/\[INFO\] shown$/));
  });
});

describe('NOOP_LOGGER', () => {
  it('should write nothing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    NOOP_LOGGER.error('nothing');

    expect(error).not.toHaveBeenCalled();
    error.mockRestore();
  });

  it('should be shared and immutable', () => {
    expect(Object.isFrozen(NOOP_LOGGER)).toBe(true);
  });
});

describe('logParseFailure', () => {
  it('should log the error name and message', () => {
    const logger: Logger = {
      error: vi.fn(),
      warn: vi.fn(),
      info: vi.fn(),
      debug: vi.fn(),
      trace: vi.fn(),
    };

    logParseFailure(logger, 'ec2', 400, new TypeError('bad input'));

    expect(logger.error).toHaveBeenCalledWith('Response parsing failed', {
      protocol: 'ec2',
      statusCode: 400,
      errorName: 'TypeError',
      errorMessage: 'bad input',
    });
  });
});
