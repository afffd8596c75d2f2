/**
 * Default timestamp conversion.
 *
 * Wire timestamps arrive as ISO 8601 strings (XML and most JSON bodies),
 * RFC 1123 strings (headers) or epoch seconds (JSON numbers).
 *
 * @module timestamp
 */

import { ResponseParserError } from '../error/index.js';

/**
 * Converts a raw wire timestamp into a calendar value.
 */
export type TimestampParser = (value: string | number) => Date;

const EPOCH_SECONDS = /^-?\d+(\.\d+)?$/;

/**
 * Convert a wire timestamp into a `Date`.
 *
 * @param value - Epoch seconds, or an ISO 8601 / RFC 1123 date string
 * @throws {ResponseParserError} If the value is not a valid timestamp
 *
 * @example
 * ```typescript
 * parseTimestamp('2024-01-15T10:30:00Z'); // Date
 * parseTimestamp(1705314600);             // Date (2024-01-15T10:30:00.000Z)
 * parseTimestamp('Mon, 15 Jan 2024 10:30:00 GMT');
 * ```
 */
export function parseTimestamp(value: string | number): Date {
  let date: Date;
  if (typeof value === 'number') {
    date = new Date(value * 1000);
  } else {
    const text = value.trim();
    date = EPOCH_SECONDS.test(text) ? new Date(Number(text) * 1000) : new Date(text);
  }

  if (isNaN(date.getTime())) {
    throw new ResponseParserError({
      kind: 'InvalidTimestamp',
      message: `Invalid timestamp: ${String(value)}`,
    });
  }
  return date;
}
