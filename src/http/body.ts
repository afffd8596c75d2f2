/**
 * Response body conversions.
 *
 * @module http/body
 */

import { ResponseParserError } from '../error/index.js';
import type { ResponseBody } from '../types/response.js';
import { isXmlElement } from '../xml/element.js';

const utf8Decoder = new TextDecoder('utf-8');

/**
 * Decode a buffered body as UTF-8 text.
 */
export function bodyToText(body: Uint8Array | string): string {
  return typeof body === 'string' ? body : utf8Decoder.decode(body);
}

/**
 * Raw bytes of a buffered body. String bodies are UTF-8 encoded.
 */
export function bodyToBytes(body: Uint8Array | string): Uint8Array {
  return typeof body === 'string' ? new Uint8Array(Buffer.from(body, 'utf8')) : body;
}

/**
 * Whether a body holds no data. A pre-parsed document is never empty.
 */
export function isEmptyBody(body: ResponseBody): boolean {
  return !isXmlElement(body) && body.length === 0;
}

/**
 * Decode base64 text into raw bytes. The bytes are never re-read as text.
 */
export function decodeBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64'));
}

/**
 * The buffered form of a body.
 *
 * @throws {ResponseParserError} `UnsupportedBody` for a pre-parsed XML document
 */
export function bufferedBody(body: ResponseBody): Uint8Array | string {
  if (isXmlElement(body)) {
    throw new ResponseParserError({
      kind: 'UnsupportedBody',
      message: 'A pre-parsed XML document cannot be read as a raw body',
    });
  }
  return body;
}
