/**
 * JSON body decoding.
 *
 * The tokenizer already produces native strings, numbers and booleans, so
 * only containers, blobs and timestamps need shape-driven work.
 *
 * @module decoder/json
 */

import { decodeError, malformedBody } from '../error/index.js';
import { bodyToText, decodeBase64 } from '../http/body.js';
import type { ListShape, MapShape, ScalarShape, StructureShape } from '../types/shape.js';
import { ShapeDecoder, type DecodedMap } from './dispatch.js';

/**
 * A value produced by `JSON.parse`.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Check whether a JSON value is an object.
 */
export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tokenize a JSON body. An empty body is an empty object.
 *
 * @throws {ResponseParserError} `MalformedBody` if the body is not valid JSON
 */
export function parseJsonBody(body: Uint8Array | string): JsonValue {
  const text = bodyToText(body);
  if (text.trim() === '') {
    return {};
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (error) {
    throw malformedBody('JSON', error);
  }
}

function expectObject(node: JsonValue, what: string): JsonObject {
  if (!isJsonObject(node)) {
    throw decodeError(`Expected a JSON object for ${what}, found ${describe(node)}`);
  }
  return node;
}

function describe(node: JsonValue): string {
  if (node === null) {
    return 'null';
  }
  return Array.isArray(node) ? 'array' : typeof node;
}

/**
 * Decoder for JSON bodies.
 */
export class JsonShapeDecoder extends ShapeDecoder<JsonValue> {
  decodeStructure(shape: StructureShape, node: JsonValue): DecodedMap {
    const object = expectObject(node, 'structure');
    const parsed: DecodedMap = {};

    for (const [memberName, memberShape] of Object.entries(shape.members)) {
      const jsonName = memberShape.serialization.name ?? memberName;
      const raw = Object.hasOwn(object, jsonName) ? object[jsonName] : null;
      if (raw !== null) {
        parsed[memberName] = this.decode(memberShape, raw);
      }
    }
    return parsed;
  }

  protected listItems(_shape: ListShape, node: JsonValue): JsonValue[] {
    if (!Array.isArray(node)) {
      throw decodeError(`Expected a JSON array for list, found ${describe(node)}`);
    }
    return node;
  }

  protected decodeMap(shape: MapShape, node: JsonValue): DecodedMap {
    const parsed: DecodedMap = {};
    for (const [rawKey, rawValue] of Object.entries(expectObject(node, 'map'))) {
      const key = this.decode(shape.key, rawKey);
      this.setEntry(parsed, key, this.decode(shape.value, rawValue));
    }
    return parsed;
  }

  protected decodeBlob(_shape: ScalarShape, node: JsonValue): Uint8Array {
    if (typeof node !== 'string') {
      throw decodeError(`Expected a base64 string for blob, found ${describe(node)}`);
    }
    return decodeBase64(node);
  }

  protected decodeTimestamp(_shape: ScalarShape, node: JsonValue): Date {
    if (typeof node !== 'string' && typeof node !== 'number') {
      throw decodeError(`Expected a string or number for timestamp, found ${describe(node)}`);
    }
    return this.timestampParser(node);
  }
}
