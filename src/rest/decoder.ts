/**
 * REST response decoding: members bound to headers and the status code,
 * plus the body or payload member.
 *
 * The body format is a pluggable strategy, so the same extractor serves
 * both rest-json and rest-xml.
 *
 * @module rest/decoder
 */

import type { DecodedMap, ShapeDecoder } from '../decoder/dispatch.js';
import { parseScalarText } from '../decoder/scalars.js';
import { decodeError } from '../error/index.js';
import { bodyToBytes, bodyToText, bufferedBody, isEmptyBody } from '../http/body.js';
import { headersWithPrefix } from '../http/headers.js';
import type { HttpResponse, ResponseBody } from '../types/response.js';
import type { Shape, StructureShape } from '../types/shape.js';
import type { TimestampParser } from '../timestamp/index.js';

/**
 * A body format: how to tokenize a body and how to decode the tokens.
 */
export interface BodyFormat<TNode> {
  readonly decoder: ShapeDecoder<TNode>;
  parseBody(body: ResponseBody): TNode;
}

export class RestDecoder<TNode> {
  constructor(
    private readonly format: BodyFormat<TNode>,
    private readonly timestampParser: TimestampParser
  ) {}

  /**
   * Decode every member of an output shape from a response. Header and
   * status members win over body members of the same name.
   */
  decode(response: HttpResponse, shape: StructureShape): DecodedMap {
    const parsed: DecodedMap = {};
    this.extractBody(response, shape, parsed);
    this.extractAttributes(response, shape, parsed);
    return parsed;
  }

  /**
   * Copy members located in the status line and headers.
   */
  extractAttributes(response: HttpResponse, shape: StructureShape, parsed: DecodedMap): void {
    for (const [memberName, memberShape] of Object.entries(shape.members)) {
      const { location, name } = memberShape.serialization;
      switch (location) {
        case 'statusCode':
          parsed[memberName] = response.status;
          break;
        case 'header': {
          const headerName = name ?? memberName;
          if (Object.hasOwn(response.headers, headerName)) {
            parsed[memberName] = this.headerValue(memberShape, response.headers[headerName]);
          }
          break;
        }
        case 'headers':
          parsed[memberName] = headersWithPrefix(response.headers, name ?? '');
          break;
        default:
          break;
      }
    }
  }

  /**
   * Decode the body into the payload member, or into the output members
   * when no payload is declared.
   */
  extractBody(response: HttpResponse, shape: StructureShape, parsed: DecodedMap): void {
    const payloadName = shape.serialization.payload;
    if (payloadName === undefined) {
      const members = this.format.decoder.decodeStructure(shape, this.format.parseBody(response.body));
      Object.assign(parsed, members);
      return;
    }

    if (!Object.hasOwn(shape.members, payloadName)) {
      throw decodeError(`Payload member '${payloadName}' is not declared on the output shape`);
    }
    const payloadShape = shape.members[payloadName];

    switch (payloadShape.kind) {
      case 'blob':
        parsed[payloadName] = bodyToBytes(bufferedBody(response.body));
        break;
      case 'string':
        parsed[payloadName] = bodyToText(bufferedBody(response.body));
        break;
      default:
        if (!isEmptyBody(response.body)) {
          parsed[payloadName] = this.format.decoder.decode(
            payloadShape,
            this.format.parseBody(response.body)
          );
        }
    }
  }

  private headerValue(shape: Shape, raw: string): unknown {
    if (shape.kind === 'structure' || shape.kind === 'list' || shape.kind === 'map') {
      return raw;
    }
    return parseScalarText(shape, raw, this.timestampParser);
  }
}
