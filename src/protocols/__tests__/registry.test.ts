/**
 * Tests for the protocol parser registry
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { PROTOCOL_PARSERS, createParser, createParserFromConfig } from '../registry.js';
import { shapes } from '../../builders/shapes.js';
import { PROTOCOL_NAMES } from '../../config/index.js';
import { ResponseParserError } from '../../error/index.js';
import type { Logger } from '../../observability/logging.js';

function createMockLogger(): Logger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

describe('createParser', () => {
  it('should register a parser for every protocol', () => {
    expect(Object.keys(PROTOCOL_PARSERS).sort()).toEqual([...PROTOCOL_NAMES].sort());
  });

  it.each([...PROTOCOL_NAMES])('should return only metadata for an empty %s success', (protocol) => {
    const parser = createParser(protocol);

    expect(parser.protocol).toBe(protocol);
    expect(parser.parse({ status: 200, headers: {}, body: '' }, shapes.structure({}))).toEqual({
      ResponseMetadata: { RequestId: '' },
    });
  });

  it('should reject an unknown protocol', () => {
    expect(() => createParser('soap')).toThrow('Unknown protocol: soap');
    expect(() => createParser('soap')).toThrow(ResponseParserError);
  });

  it('should pass the timestamp parser to the protocol', () => {
    const epoch = new Date(0);
    const parser = createParser('json', { timestampParser: () => epoch });
    const shape = shapes.structure({ At: shapes.timestamp() });

    const result = parser.parse({ status: 200, headers: {}, body: '{"At":"yesterday"}' }, shape);

    expect(result['At']).toBe(epoch);
  });
});

describe('createParserFromConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should prefer a logger passed in options', () => {
    const logger = createMockLogger();
    const parser = createParserFromConfig(
      { protocol: 'rest-xml', logLevel: 'debug', logging: true },
      { logger }
    );

    parser.parse({ status: 200, headers: {}, body: '' });

    expect(parser.protocol).toBe('rest-xml');
    expect(logger.debug).toHaveBeenCalledWith('Parsing response', {
      protocol: 'rest-xml',
      statusCode: 200,
      path: 'success',
    });
  });

  it('should write to the console when logging is enabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const parser = createParserFromConfig({ protocol: 'json', logLevel: 'debug', logging: true });

    parser.parse({ status: 200, headers: {}, body: '' });

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith(
      expect.stringContaining(
        '[DEBUG] [json] Parsing response {"protocol":"json","statusCode":200,"path":"success"}'
      )
    );
  });

  it('should stay silent when logging is disabled', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const parser = createParserFromConfig({ protocol: 'json', logLevel: 'debug', logging: false });

    parser.parse({ status: 200, headers: {}, body: '' });

    expect(debug).not.toHaveBeenCalled();
  });
});
