/**
 * Configuration for response parsers.
 * @module config
 */

import { z } from 'zod';
import { ResponseParserError } from '../error/index.js';
import type { LogLevel, Logger } from '../observability/logging.js';
import type { TimestampParser } from '../timestamp/index.js';

/**
 * Wire protocol identifiers.
 */
export const PROTOCOL_NAMES = ['ec2', 'query', 'json', 'rest-json', 'rest-xml'] as const;

export type ProtocolName = (typeof PROTOCOL_NAMES)[number];

/**
 * Default protocol when none is configured.
 */
export const DEFAULT_PROTOCOL: ProtocolName = 'query';

/**
 * Default minimum log level of the console logger.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Parser configuration.
 */
export interface ParserConfig {
  /** Wire protocol of the responses */
  readonly protocol: ProtocolName;
  /** Minimum level written by the console logger */
  readonly logLevel: LogLevel;
  /** Write logs to the console; when false logging is discarded */
  readonly logging: boolean;
}

/**
 * Runtime collaborators injected into a parser.
 */
export interface ParserOptions {
  /** Timestamp converter (defaults to `parseTimestamp`) */
  readonly timestampParser?: TimestampParser;
  /** Logger (defaults to a no-op logger) */
  readonly logger?: Logger;
}

export const protocolNameSchema = z.enum(PROTOCOL_NAMES);

const logLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'trace']);

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  protocol: protocolNameSchema,
  logLevel: logLevelSchema,
  logging: z.boolean(),
});

/**
 * Creates the default configuration.
 */
export function createDefaultConfig(): ParserConfig {
  return {
    protocol: DEFAULT_PROTOCOL,
    logLevel: DEFAULT_LOG_LEVEL,
    logging: false,
  };
}

/**
 * Validates a configuration.
 *
 * @throws {ResponseParserError} If any field is invalid
 */
export function validateConfig(config: ParserConfig): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ResponseParserError({
      kind: 'Configuration',
      message: `Invalid configuration: ${issues.join(', ')}`,
    });
  }
}

/**
 * Loads parser configuration from environment variables.
 *
 * Supported environment variables:
 * - RESPONSE_PARSER_PROTOCOL: one of ec2, query, json, rest-json, rest-xml
 * - RESPONSE_PARSER_LOG_LEVEL: error, warn, info, debug or trace
 * - RESPONSE_PARSER_LOGGING: set to 'true' to log to the console
 *
 * @param env - Environment to read (defaults to `process.env`)
 * @returns Validated configuration
 * @throws {ResponseParserError} If a variable holds an invalid value
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const defaults = createDefaultConfig();
  const result = configSchema.safeParse({
    protocol: env.RESPONSE_PARSER_PROTOCOL ?? defaults.protocol,
    logLevel: env.RESPONSE_PARSER_LOG_LEVEL ?? defaults.logLevel,
    logging: env.RESPONSE_PARSER_LOGGING === undefined
      ? defaults.logging
      : env.RESPONSE_PARSER_LOGGING === 'true',
  });

  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ResponseParserError({
      kind: 'Configuration',
      message: `Invalid environment configuration: ${issues.join(', ')}`,
    });
  }
  return result.data;
}
