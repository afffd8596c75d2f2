/**
 * XML body decoding.
 *
 * Structures are matched through a tag index of the element's children,
 * so repeated tags arrive as arrays and single tags as bare elements.
 *
 * @module decoder/xml
 */

import { decodeError } from '../error/index.js';
import { decodeBase64 } from '../http/body.js';
import type { ListShape, MapShape, ScalarShape, Shape, StructureShape } from '../types/shape.js';
import {
  buildTagIndex,
  isXmlElement,
  localName,
  type XmlElement,
  type XmlIndexEntry,
} from '../xml/element.js';
import { ShapeDecoder, type DecodedMap } from './dispatch.js';
import { parseBooleanText, parseFloatText, parseIntegerText } from './scalars.js';

/**
 * A node seen by the XML decoder: an element, the elements of a repeated
 * tag, or a raw scalar.
 */
export type XmlValue = XmlIndexEntry | string;

const DEFAULT_MAP_KEY_NAME = 'key';
const DEFAULT_MAP_VALUE_NAME = 'value';

/**
 * Tag name a structure member is read from.
 *
 * A flattened list has no wrapper element, so when its member shape names
 * the repeated element that name is what appears in the parent.
 */
export function xmlMemberName(shape: Shape, memberName: string): string {
  if (shape.kind === 'list' && shape.serialization.flattened) {
    const itemName = shape.member.serialization.name;
    if (itemName !== undefined) {
      return itemName;
    }
  }
  return shape.serialization.name ?? memberName;
}

function expectElement(node: XmlValue, what: string): XmlElement {
  if (isXmlElement(node)) {
    return node;
  }
  if (Array.isArray(node)) {
    throw decodeError(`Expected a single ${what} element, found ${node.length} repeated elements`);
  }
  throw decodeError(`Expected a ${what} element, found text`);
}

function textOf(node: XmlValue): string {
  if (typeof node === 'string') {
    return node;
  }
  return expectElement(node, 'scalar').text ?? '';
}

/**
 * Decoder for XML bodies.
 */
export class XmlShapeDecoder extends ShapeDecoder<XmlValue> {
  decodeStructure(shape: StructureShape, node: XmlValue): DecodedMap {
    const index = buildTagIndex(expectElement(node, 'structure'));
    const parsed: DecodedMap = {};

    for (const [memberName, memberShape] of Object.entries(shape.members)) {
      // Located members come from headers or the status line
      if (memberShape.serialization.location !== undefined) {
        continue;
      }
      const entry = index.get(xmlMemberName(memberShape, memberName));
      if (entry !== undefined) {
        parsed[memberName] = this.decode(memberShape, entry);
      }
    }
    return parsed;
  }

  protected listItems(shape: ListShape, node: XmlValue): XmlValue[] {
    if (shape.serialization.flattened) {
      // A single flattened item is indexed as a bare element
      return Array.isArray(node) ? node : [node];
    }
    if (Array.isArray(node)) {
      return node;
    }
    return [...expectElement(node, 'list').children];
  }

  protected decodeMap(shape: MapShape, node: XmlValue): DecodedMap {
    const keyName = shape.key.serialization.name ?? DEFAULT_MAP_KEY_NAME;
    const valueName = shape.value.serialization.name ?? DEFAULT_MAP_VALUE_NAME;
    const entries = shape.serialization.flattened
      ? Array.isArray(node) ? node : [expectElement(node, 'map entry')]
      : expectElement(node, 'map').children;

    const parsed: DecodedMap = {};
    for (const entry of entries) {
      let key: unknown;
      let value: unknown;
      let hasKey = false;
      let hasValue = false;

      for (const child of entry.children) {
        const tag = localName(child.tag);
        if (tag === keyName && !hasKey) {
          key = this.decode(shape.key, child);
          hasKey = true;
        } else if (tag === valueName && !hasValue) {
          value = this.decode(shape.value, child);
          hasValue = true;
        } else if (tag === keyName || tag === valueName) {
          throw decodeError(`Duplicate tag in map entry: ${tag}`);
        } else {
          throw decodeError(`Unknown tag in map entry: ${tag}`);
        }
      }

      if (!hasKey || !hasValue) {
        throw decodeError(`Map entry is missing its ${hasKey ? valueName : keyName} element`);
      }
      this.setEntry(parsed, key, value);
    }
    return parsed;
  }

  protected decodeBoolean(_shape: ScalarShape, node: XmlValue): boolean {
    return parseBooleanText(textOf(node));
  }

  protected decodeInteger(_shape: ScalarShape, node: XmlValue): number | bigint {
    return parseIntegerText(textOf(node));
  }

  protected decodeFloat(_shape: ScalarShape, node: XmlValue): number {
    return parseFloatText(textOf(node));
  }

  protected decodeTimestamp(_shape: ScalarShape, node: XmlValue): Date {
    return this.timestampParser(textOf(node));
  }

  protected decodeBlob(_shape: ScalarShape, node: XmlValue): Uint8Array {
    return decodeBase64(textOf(node));
  }

  protected decodeString(_shape: ScalarShape, node: XmlValue): string {
    return textOf(node);
  }

  protected decodeDefault(node: XmlValue): unknown {
    return isXmlElement(node) ? node.text ?? '' : node;
  }
}
