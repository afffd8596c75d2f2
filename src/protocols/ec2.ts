/**
 * Parser for the `ec2` protocol.
 *
 * Bodies are decoded like `query`, but the request id is a top-level
 * `requestId` element, and errors carry an extra `Errors` wrapper and a
 * `RequestID` element:
 *
 * ```xml
 * <Response>
 *   <Errors>
 *     <Error><Code>InvalidInstanceID.Malformed</Code><Message>Invalid id</Message></Error>
 *   </Errors>
 *   <RequestID>req-3</RequestID>
 * </Response>
 * ```
 *
 * @module protocols/ec2
 */

import { XmlShapeDecoder } from '../decoder/xml.js';
import { isEmptyBody } from '../http/body.js';
import type { Logger } from '../observability/logging.js';
import { headerMetadata } from '../rest/metadata.js';
import type { ErrorResponse, HttpResponse, ParsedResponse } from '../types/response.js';
import type { StructureShape } from '../types/shape.js';
import { buildTagIndex, entryText, type CollapsedXml, type CollapsedXmlMap } from '../xml/element.js';
import { parseXmlBody } from '../xml/parser.js';
import {
  bodyMetadata,
  errorDetails,
  errorResult,
  isCollapsedMap,
  statusErrorDetails,
  successResult,
} from './results.js';
import type { ProtocolContext, ProtocolParser } from './types.js';
import { collapseDocument, collapsedErrorFields, decodeWrappedOutput } from './xml-common.js';

export class Ec2QueryParser implements ProtocolParser {
  readonly protocol = 'ec2';
  private readonly decoder: XmlShapeDecoder;
  private readonly logger: Logger;

  constructor(context: ProtocolContext) {
    this.decoder = new XmlShapeDecoder(context.timestampParser);
    this.logger = context.logger;
  }

  parseSuccess(response: HttpResponse, shape?: StructureShape): ParsedResponse {
    const root = parseXmlBody(response.body);
    const members = decodeWrappedOutput(this.decoder, root, shape);
    const requestId = entryText(buildTagIndex(root).get('requestId')) ?? '';
    return successResult(members, { RequestId: requestId });
  }

  parseError(response: HttpResponse): ErrorResponse {
    if (isEmptyBody(response.body)) {
      return errorResult(statusErrorDetails(response.status), headerMetadata(response.headers));
    }

    const root = parseXmlBody(response.body);
    const collapsed = collapseDocument(root);
    const errors = collapsed['Errors'];
    const error = isCollapsedMap(errors)
      ? this.singleError(errors['Error'], response.status)
      : collapsedErrorFields(root, collapsed);

    return errorResult(
      errorDetails(error),
      bodyMetadata(collapsed['RequestID'] ?? collapsed['RequestId'])
    );
  }

  /**
   * Only one error per response is supported; extra errors are dropped.
   */
  private singleError(error: CollapsedXml | undefined, status: number): CollapsedXmlMap {
    if (Array.isArray(error)) {
      this.logger.warn('Error response carries several errors, keeping the first', {
        protocol: this.protocol,
        statusCode: status,
        errorCount: error.length,
      });
      return this.singleError(error[0], status);
    }
    return isCollapsedMap(error) ? error : {};
  }
}
