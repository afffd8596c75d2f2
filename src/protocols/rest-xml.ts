/**
 * Parser for the `rest-xml` protocol.
 *
 * Error bodies come in two forms. Object-storage services return a bare
 * `Error` root whose request ids duplicate the headers:
 *
 * ```xml
 * <Error>
 *   <Code>NoSuchKey</Code>
 *   <Message>The specified key does not exist.</Message>
 *   <RequestId>req-4</RequestId>
 *   <HostId>host-4</HostId>
 * </Error>
 * ```
 *
 * Other services wrap the error like `query` does:
 *
 * ```xml
 * <ErrorResponse>
 *   <Error><Type>Sender</Type><Code>InvalidInput</Code><Message>bad</Message></Error>
 *   <RequestId>req-5</RequestId>
 * </ErrorResponse>
 * ```
 *
 * @module protocols/rest-xml
 */

import { XmlShapeDecoder, type XmlValue } from '../decoder/xml.js';
import { isEmptyBody } from '../http/body.js';
import { getHeader } from '../http/headers.js';
import { RestDecoder, type BodyFormat } from '../rest/decoder.js';
import { HOST_ID_HEADER, LEGACY_REQUEST_ID_HEADER, headerMetadata } from '../rest/metadata.js';
import type { ErrorResponse, HttpResponse, ParsedResponse } from '../types/response.js';
import type { StructureShape } from '../types/shape.js';
import { parseXmlBody } from '../xml/parser.js';
import {
  bodyMetadata,
  errorDetails,
  errorResult,
  statusErrorDetails,
  successResult,
} from './results.js';
import type { ProtocolContext, ProtocolParser } from './types.js';
import { collapseDocument, collapsedErrorFields } from './xml-common.js';

/**
 * XML body format for REST decoding.
 */
export function xmlBodyFormat(decoder: XmlShapeDecoder): BodyFormat<XmlValue> {
  return { decoder, parseBody: parseXmlBody };
}

export class RestXmlParser implements ProtocolParser {
  readonly protocol = 'rest-xml';
  private readonly rest: RestDecoder<XmlValue>;

  constructor(context: ProtocolContext) {
    const format = xmlBodyFormat(new XmlShapeDecoder(context.timestampParser));
    this.rest = new RestDecoder(format, context.timestampParser);
  }

  parseSuccess(response: HttpResponse, shape?: StructureShape): ParsedResponse {
    const members = shape === undefined ? {} : this.rest.decode(response, shape);
    return successResult(members, headerMetadata(response.headers));
  }

  parseError(response: HttpResponse): ErrorResponse {
    if (isEmptyBody(response.body)) {
      return errorResult(statusErrorDetails(response.status), {
        RequestId: getHeader(response.headers, LEGACY_REQUEST_ID_HEADER) ?? '',
        HostId: getHeader(response.headers, HOST_ID_HEADER) ?? '',
      });
    }

    const root = parseXmlBody(response.body);
    const collapsed = collapseDocument(root);

    if (root.tag === 'Error') {
      const fields = { ...collapsed };
      delete fields['RequestId'];
      delete fields['HostId'];
      return errorResult(errorDetails(fields), headerMetadata(response.headers));
    }

    const requestId = collapsed['RequestId'];
    return errorResult(
      errorDetails(collapsedErrorFields(root, collapsed)),
      typeof requestId === 'string' ? bodyMetadata(requestId) : headerMetadata(response.headers)
    );
  }
}
