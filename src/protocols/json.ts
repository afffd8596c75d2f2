/**
 * Parser for the `json` protocol.
 *
 * @module protocols/json
 */

import { JsonShapeDecoder, isJsonObject, parseJsonBody, type JsonObject } from '../decoder/json.js';
import { bufferedBody } from '../http/body.js';
import { getHeader } from '../http/headers.js';
import { REQUEST_ID_HEADER } from '../rest/metadata.js';
import type {
  ErrorResponse,
  HttpResponse,
  ParsedResponse,
  ResponseMetadata,
} from '../types/response.js';
import type { StructureShape } from '../types/shape.js';
import { errorResult, stringOr, stripErrorNamespace, successResult } from './results.js';
import type { ProtocolContext, ProtocolParser } from './types.js';

function jsonMetadata(headers: Record<string, string>): ResponseMetadata {
  return { RequestId: getHeader(headers, REQUEST_ID_HEADER) ?? '' };
}

export class JsonParser implements ProtocolParser {
  readonly protocol = 'json';
  private readonly decoder: JsonShapeDecoder;

  constructor(context: ProtocolContext) {
    this.decoder = new JsonShapeDecoder(context.timestampParser);
  }

  parseSuccess(response: HttpResponse, shape?: StructureShape): ParsedResponse {
    const body = parseJsonBody(bufferedBody(response.body));
    const members = shape === undefined ? {} : this.decoder.decodeStructure(shape, body);
    return successResult(members, jsonMetadata(response.headers));
  }

  /**
   * Errors look like `{"__type": "com.example#ThrottlingException", "message": "..."}`.
   * The message key may also be capitalized.
   */
  parseError(response: HttpResponse): ErrorResponse {
    const parsed = parseJsonBody(bufferedBody(response.body));
    const body: JsonObject = isJsonObject(parsed) ? parsed : {};
    const type = stringOr(body['__type']);

    return errorResult(
      {
        Code: type === undefined ? '' : stripErrorNamespace(type),
        Message: stringOr(body['message']) ?? stringOr(body['Message']) ?? '',
      },
      jsonMetadata(response.headers)
    );
  }
}
