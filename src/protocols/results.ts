/**
 * Result assembly shared by the protocol parsers.
 *
 * @module protocols/results
 */

import type { DecodedMap } from '../decoder/dispatch.js';
import { reasonPhrase } from '../http/status.js';
import type {
  ErrorDetails,
  ErrorResponse,
  ParsedResponse,
  ResponseMetadata,
} from '../types/response.js';
import type { CollapsedXml, CollapsedXmlMap } from '../xml/element.js';

/**
 * Check whether a collapsed XML value is a mapping.
 */
export function isCollapsedMap(value: CollapsedXml | undefined): value is CollapsedXmlMap {
  return typeof value === 'object' && !Array.isArray(value);
}

/**
 * A value if it is a string, else undefined.
 */
export function stringOr(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Error code without its namespace.
 *
 * @example
 * ```typescript
 * stripErrorNamespace('com.amazonaws.dynamodb.v20120810#ResourceNotFoundException');
 * // 'ResourceNotFoundException'
 * ```
 */
export function stripErrorNamespace(code: string): string {
  return code.slice(code.lastIndexOf('#') + 1);
}

/**
 * Success result: decoded members plus metadata.
 */
export function successResult(members: DecodedMap, metadata: ResponseMetadata): ParsedResponse {
  const result: ParsedResponse = { ResponseMetadata: metadata };
  for (const [key, value] of Object.entries(members)) {
    if (key !== 'ResponseMetadata') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Error details with `Code` and `Message` guaranteed to be strings.
 */
export function errorDetails(fields: Record<string, unknown>): ErrorDetails {
  return {
    ...fields,
    Code: stringOr(fields['Code']) ?? '',
    Message: stringOr(fields['Message']) ?? '',
  };
}

/**
 * Error result holding exactly `Error` and `ResponseMetadata`.
 */
export function errorResult(error: ErrorDetails, metadata: ResponseMetadata): ErrorResponse {
  return { Error: error, ResponseMetadata: metadata };
}

/**
 * Error details derived from the status line alone, for error responses
 * without a body.
 */
export function statusErrorDetails(status: number): ErrorDetails {
  return { Code: String(status), Message: reasonPhrase(status) };
}

/**
 * Metadata from a request id found in a collapsed body.
 */
export function bodyMetadata(requestId: CollapsedXml | undefined): ResponseMetadata {
  return { RequestId: typeof requestId === 'string' ? requestId : '' };
}
