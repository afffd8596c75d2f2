/**
 * Parser for the `rest-json` protocol.
 *
 * @module protocols/rest-json
 */

import {
  JsonShapeDecoder,
  isJsonObject,
  parseJsonBody,
  type JsonObject,
  type JsonValue,
} from '../decoder/json.js';
import { bufferedBody } from '../http/body.js';
import { getHeader } from '../http/headers.js';
import { RestDecoder, type BodyFormat } from '../rest/decoder.js';
import { headerMetadata } from '../rest/metadata.js';
import type { ErrorResponse, HttpResponse, ParsedResponse } from '../types/response.js';
import type { StructureShape } from '../types/shape.js';
import { errorResult, stringOr, stripErrorNamespace, successResult } from './results.js';
import type { ProtocolContext, ProtocolParser } from './types.js';

export const ERROR_TYPE_HEADER = 'x-amzn-errortype';

/**
 * JSON body format for REST decoding.
 */
export function jsonBodyFormat(decoder: JsonShapeDecoder): BodyFormat<JsonValue> {
  return {
    decoder,
    parseBody: (body) => parseJsonBody(bufferedBody(body)),
  };
}

/**
 * Error code from the `x-amzn-errortype` header, which may carry a suffix
 * after a colon (`ValidationException:http://internal.example.com/`), or
 * from the body when the header is absent.
 */
function restJsonErrorCode(headers: Record<string, string>, body: JsonObject): string {
  const header = getHeader(headers, ERROR_TYPE_HEADER);
  if (header !== undefined) {
    return header.split(':')[0];
  }
  const code = stringOr(body['code']) ?? stringOr(body['__type']);
  return code === undefined ? '' : stripErrorNamespace(code);
}

export class RestJsonParser implements ProtocolParser {
  readonly protocol = 'rest-json';
  private readonly rest: RestDecoder<JsonValue>;

  constructor(context: ProtocolContext) {
    const format = jsonBodyFormat(new JsonShapeDecoder(context.timestampParser));
    this.rest = new RestDecoder(format, context.timestampParser);
  }

  parseSuccess(response: HttpResponse, shape?: StructureShape): ParsedResponse {
    const members = shape === undefined ? {} : this.rest.decode(response, shape);
    return successResult(members, headerMetadata(response.headers));
  }

  parseError(response: HttpResponse): ErrorResponse {
    const parsed = parseJsonBody(bufferedBody(response.body));
    const body: JsonObject = isJsonObject(parsed) ? parsed : {};

    return errorResult(
      {
        Code: restJsonErrorCode(response.headers, body),
        Message: stringOr(body['message']) ?? '',
      },
      headerMetadata(response.headers)
    );
  }
}
