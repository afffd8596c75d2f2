/**
 * Parser for the `query` protocol.
 *
 * Success bodies look like:
 *
 * ```xml
 * <ListQueuesResponse>
 *   <ListQueuesResult>
 *     <QueueUrl>https://queue.example.com/1/first</QueueUrl>
 *   </ListQueuesResult>
 *   <ResponseMetadata><RequestId>req-1</RequestId></ResponseMetadata>
 * </ListQueuesResponse>
 * ```
 *
 * Errors look like:
 *
 * ```xml
 * <ErrorResponse>
 *   <Error><Type>Sender</Type><Code>InvalidInput</Code><Message>bad</Message></Error>
 *   <RequestId>req-2</RequestId>
 * </ErrorResponse>
 * ```
 *
 * @module protocols/query
 */

import { XmlShapeDecoder } from '../decoder/xml.js';
import { isEmptyBody } from '../http/body.js';
import { headerMetadata } from '../rest/metadata.js';
import type {
  ErrorResponse,
  HttpResponse,
  ParsedResponse,
  ResponseMetadata,
} from '../types/response.js';
import type { StructureShape } from '../types/shape.js';
import { buildTagIndex, entryText, type XmlElement } from '../xml/element.js';
import { parseXmlBody } from '../xml/parser.js';
import {
  bodyMetadata,
  errorDetails,
  errorResult,
  statusErrorDetails,
  successResult,
} from './results.js';
import type { ProtocolContext, ProtocolParser } from './types.js';
import { collapseDocument, collapsedErrorFields, decodeWrappedOutput } from './xml-common.js';

/**
 * Metadata of a query document: the `ResponseMetadata` block flattened to
 * text, else a top-level `RequestId`.
 */
function queryMetadata(root: XmlElement): ResponseMetadata {
  const index = buildTagIndex(root);
  const block = index.get('ResponseMetadata');
  if (block !== undefined && !Array.isArray(block)) {
    const metadata: ResponseMetadata = { RequestId: '' };
    for (const [key, entry] of buildTagIndex(block)) {
      metadata[key] = entryText(entry) ?? '';
    }
    return metadata;
  }
  return { RequestId: entryText(index.get('RequestId')) ?? '' };
}

export class QueryParser implements ProtocolParser {
  readonly protocol = 'query';
  private readonly decoder: XmlShapeDecoder;

  constructor(context: ProtocolContext) {
    this.decoder = new XmlShapeDecoder(context.timestampParser);
  }

  parseSuccess(response: HttpResponse, shape?: StructureShape): ParsedResponse {
    const root = parseXmlBody(response.body);
    const members = decodeWrappedOutput(this.decoder, root, shape);
    return successResult(members, queryMetadata(root));
  }

  parseError(response: HttpResponse): ErrorResponse {
    if (isEmptyBody(response.body)) {
      return errorResult(statusErrorDetails(response.status), headerMetadata(response.headers));
    }

    const root = parseXmlBody(response.body);
    const collapsed = collapseDocument(root);
    return errorResult(
      errorDetails(collapsedErrorFields(root, collapsed)),
      bodyMetadata(collapsed['RequestId'])
    );
  }
}
