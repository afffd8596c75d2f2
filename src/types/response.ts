/**
 * HTTP response and parse result types.
 *
 * @module types/response
 */

import type { XmlElement } from '../xml/element.js';

/**
 * Raw response body.
 *
 * XML protocols also accept an already-parsed document root, which lets
 * callers that inspected the body reuse it without tokenizing twice.
 */
export type ResponseBody = Uint8Array | string | XmlElement;

/**
 * HTTP response handed to a parser.
 *
 * @example
 * ```typescript
 * const response: HttpResponse = {
 *   status: 200,
 *   headers: { 'x-amzn-requestid': 'req-123' },
 *   body: new TextEncoder().encode('{"TableNames":[]}'),
 * };
 * ```
 */
export interface HttpResponse {
  /**
   * HTTP status code (e.g., 200, 400, 500).
   */
  status: number;

  /**
   * HTTP headers as key-value pairs.
   * Lookups are case-insensitive except for header-located members.
   */
  headers: Record<string, string>;

  /**
   * Fully buffered response body.
   */
  body: ResponseBody;
}

/**
 * Protocol-independent metadata injected into every result.
 */
export interface ResponseMetadata {
  /** Request identifier, empty when the response carried none */
  RequestId: string;
  /** Extended request identifier returned by some REST services */
  HostId?: string;
  [key: string]: string | undefined;
}

/**
 * Error details of an API-level error response.
 */
export interface ErrorDetails {
  Code: string;
  Message: string;
  [key: string]: unknown;
}

/**
 * Result of parsing any response.
 */
export interface ParsedResponse {
  ResponseMetadata: ResponseMetadata;
  Error?: ErrorDetails;
  [member: string]: unknown;
}

/**
 * Result of parsing an error response (status >= 301).
 */
export interface ErrorResponse extends ParsedResponse {
  Error: ErrorDetails;
}

/**
 * Check whether a parse result describes an API-level error.
 *
 * @example
 * ```typescript
 * const result = parser.parse(response, shape);
 * if (isErrorResult(result)) {
 *   console.error(result.Error.Code, result.Error.Message);
 * }
 * ```
 */
export function isErrorResult(result: ParsedResponse): result is ErrorResponse {
  return result.Error !== undefined;
}
