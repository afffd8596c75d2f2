/**
 * Protocol parser registry.
 *
 * @module protocols/registry
 */

import {
  protocolNameSchema,
  validateConfig,
  type ParserConfig,
  type ParserOptions,
  type ProtocolName,
} from '../config/index.js';
import { ResponseParserError } from '../error/index.js';
import { ConsoleLogger, NOOP_LOGGER } from '../observability/logging.js';
import { ResponseParser } from '../parser.js';
import { parseTimestamp } from '../timestamp/index.js';
import { Ec2QueryParser } from './ec2.js';
import { JsonParser } from './json.js';
import { QueryParser } from './query.js';
import { RestJsonParser } from './rest-json.js';
import { RestXmlParser } from './rest-xml.js';
import type { ProtocolContext, ProtocolParser } from './types.js';

export type ProtocolParserFactory = (context: ProtocolContext) => ProtocolParser;

/**
 * Protocol identifier to parser constructor.
 */
export const PROTOCOL_PARSERS: Readonly<Record<ProtocolName, ProtocolParserFactory>> = {
  ec2: (context) => new Ec2QueryParser(context),
  query: (context) => new QueryParser(context),
  json: (context) => new JsonParser(context),
  'rest-json': (context) => new RestJsonParser(context),
  'rest-xml': (context) => new RestXmlParser(context),
};

/**
 * Create a parser for a protocol identifier.
 *
 * Each call returns a fresh parser. Parsers keep no per-call state, so one
 * instance may be reused for any number of responses.
 *
 * @param protocol - One of `ec2`, `query`, `json`, `rest-json`, `rest-xml`
 * @param options - Timestamp converter and logger
 * @throws {ResponseParserError} `UnknownProtocol` for any other identifier
 *
 * @example
 * ```typescript
 * const parser = createParser('json');
 * const result = parser.parse(response, outputShape);
 * ```
 */
export function createParser(protocol: string, options: ParserOptions = {}): ResponseParser {
  const name = protocolNameSchema.safeParse(protocol);
  if (!name.success) {
    throw new ResponseParserError({
      kind: 'UnknownProtocol',
      message: `Unknown protocol: ${protocol}`,
      protocol,
    });
  }

  const context: ProtocolContext = {
    timestampParser: options.timestampParser ?? parseTimestamp,
    logger: options.logger ?? NOOP_LOGGER,
  };
  return new ResponseParser(PROTOCOL_PARSERS[name.data](context), context.logger);
}

/**
 * Create a parser from configuration. A logger in `options` takes
 * precedence over the configured console logging.
 *
 * @throws {ResponseParserError} `Configuration` if the configuration is invalid
 */
export function createParserFromConfig(
  config: ParserConfig,
  options: ParserOptions = {}
): ResponseParser {
  validateConfig(config);
  const logger =
    options.logger ??
    (config.logging
      ? new ConsoleLogger({ level: config.logLevel, protocol: config.protocol })
      : NOOP_LOGGER);
  return createParser(config.protocol, { ...options, logger });
}
