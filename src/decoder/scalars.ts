/**
 * Conversions from wire text to scalar values, shared by the XML body
 * decoder and the REST header extractor.
 *
 * @module decoder/scalars
 */

import { decodeError } from '../error/index.js';
import { decodeBase64 } from '../http/body.js';
import type { ScalarShape } from '../types/shape.js';
import type { TimestampParser } from '../timestamp/index.js';

const INTEGER_TEXT = /^\s*[+-]?\d+\s*$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const SPECIAL_FLOATS = new Map<string, number>([
  ['NaN', Number.NaN],
  ['Infinity', Number.POSITIVE_INFINITY],
  ['+Infinity', Number.POSITIVE_INFINITY],
  ['-Infinity', Number.NEGATIVE_INFINITY],
]);

/**
 * Boolean text: only the literal `true` is true.
 */
export function parseBooleanText(text: string): boolean {
  return text === 'true';
}

/**
 * Strict base-10 integer text. Values outside the safe integer range come
 * back as a `bigint` so no digits are lost.
 *
 * @throws {ResponseParserError} `DecodeError` for anything but an optionally signed digit run
 */
export function parseIntegerText(text: string): number | bigint {
  if (!INTEGER_TEXT.test(text)) {
    throw decodeError(`Invalid integer value: '${text}'`);
  }
  const value = Number.parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : BigInt(text.trim());
}

/**
 * Decimal floating point text, including `NaN` and signed `Infinity`.
 * Hex, binary and octal literals are rejected.
 *
 * @throws {ResponseParserError} `DecodeError` if the text is not a number
 */
export function parseFloatText(text: string): number {
  const trimmed = text.trim();
  const special = SPECIAL_FLOATS.get(trimmed);
  if (special !== undefined) {
    return special;
  }
  if (!FLOAT_TEXT.test(trimmed)) {
    throw decodeError(`Invalid float value: '${text}'`);
  }
  return Number(trimmed);
}

/**
 * Convert scalar wire text according to a shape kind.
 * Strings, characters and unknown kinds keep the text unchanged.
 */
export function parseScalarText(
  shape: ScalarShape,
  text: string,
  timestampParser: TimestampParser
): unknown {
  switch (shape.kind) {
    case 'boolean':
      return parseBooleanText(text);
    case 'integer':
    case 'long':
      return parseIntegerText(text);
    case 'float':
    case 'double':
      return parseFloatText(text);
    case 'timestamp':
      return timestampParser(text);
    case 'blob':
      return decodeBase64(text);
    default:
      return text;
  }
}
