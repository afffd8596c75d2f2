/**
 * Protocol parser interface.
 *
 * @module protocols/types
 */

import type { ProtocolName } from '../config/index.js';
import type { Logger } from '../observability/logging.js';
import type { TimestampParser } from '../timestamp/index.js';
import type { ErrorResponse, HttpResponse, ParsedResponse } from '../types/response.js';
import type { StructureShape } from '../types/shape.js';

/**
 * Collaborators shared by every protocol parser. Parsers hold nothing else,
 * so one instance can serve any number of concurrent parse calls.
 */
export interface ProtocolContext {
  readonly timestampParser: TimestampParser;
  readonly logger: Logger;
}

/**
 * Success and error decoding for one wire protocol.
 */
export interface ProtocolParser {
  readonly protocol: ProtocolName;

  /**
   * Decode a successful response (status < 301) into the output members
   * plus `ResponseMetadata`. Without a shape only the metadata is returned.
   */
  parseSuccess(response: HttpResponse, shape?: StructureShape): ParsedResponse;

  /**
   * Decode an error response (status >= 301) into `Error` and `ResponseMetadata`.
   */
  parseError(response: HttpResponse, shape?: StructureShape): ErrorResponse;
}
