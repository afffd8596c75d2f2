/**
 * Top-level response parser.
 *
 * @module parser
 */

import type { ProtocolName } from './config/index.js';
import { ResponseParserError } from './error/index.js';
import { isErrorStatus } from './http/status.js';
import { NOOP_LOGGER, logParseFailure, type Logger } from './observability/logging.js';
import type { ProtocolParser } from './protocols/types.js';
import type { HttpResponse, ParsedResponse } from './types/response.js';
import type { StructureShape } from './types/shape.js';

/**
 * Parses HTTP responses of one protocol into result mappings.
 *
 * A status below 301 is decoded against the output shape; anything else is
 * decoded as an API error. API errors are returned, not thrown: check the
 * result with `isErrorResult`. Only undecodable input throws.
 *
 * @example
 * ```typescript
 * const parser = createParser('rest-xml');
 * const result = parser.parse(
 *   { status: 404, headers: { 'x-amz-request-id': 'r-1' }, body: '' },
 *   outputShape
 * );
 * // { Error: { Code: '404', Message: 'Not Found' },
 * //   ResponseMetadata: { RequestId: 'r-1', HostId: '' } }
 * ```
 */
export class ResponseParser {
  constructor(
    private readonly protocolParser: ProtocolParser,
    private readonly logger: Logger = NOOP_LOGGER
  ) {}

  get protocol(): ProtocolName {
    return this.protocolParser.protocol;
  }

  /**
   * Parse a response.
   *
   * @param response - Status, headers and fully buffered body
   * @param shape - Output shape; when omitted only metadata is returned on success
   * @returns Decoded members (or `Error`) plus `ResponseMetadata`
   * @throws {ResponseParserError} If the body is malformed or violates the shape
   */
  parse(response: HttpResponse, shape?: StructureShape): ParsedResponse {
    const errorPath = isErrorStatus(response.status);
    this.logger.debug('Parsing response', {
      protocol: this.protocol,
      statusCode: response.status,
      path: errorPath ? 'error' : 'success',
    });

    try {
      return errorPath
        ? this.protocolParser.parseError(response, shape)
        : this.protocolParser.parseSuccess(response, shape);
    } catch (error) {
      if (error instanceof Error) {
        logParseFailure(this.logger, this.protocol, response.status, error);
      }
      if (error instanceof ResponseParserError) {
        throw error.withContext(this.protocol, response.status);
      }
      throw error;
    }
  }
}
