/**
 * HTTP status helpers.
 *
 * @module http/status
 */

import { STATUS_CODES } from 'node:http';

/**
 * Responses with a status at or above this value are parsed as errors.
 */
export const ERROR_STATUS_THRESHOLD = 301;

/**
 * Check whether a status code selects the error parsing path.
 */
export function isErrorStatus(status: number): boolean {
  return status >= ERROR_STATUS_THRESHOLD;
}

/**
 * Standard reason phrase for a status code, or an empty string if unknown.
 *
 * @example
 * ```typescript
 * reasonPhrase(404); // 'Not Found'
 * reasonPhrase(799); // ''
 * ```
 */
export function reasonPhrase(status: number): string {
  return STATUS_CODES[status] ?? '';
}
