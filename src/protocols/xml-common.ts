/**
 * Decoding steps shared by the XML protocols.
 *
 * @module protocols/xml-common
 */

import type { DecodedMap } from '../decoder/dispatch.js';
import type { XmlShapeDecoder } from '../decoder/xml.js';
import type { StructureShape } from '../types/shape.js';
import {
  buildTagIndex,
  collapseIndex,
  localName,
  type CollapsedXmlMap,
  type XmlElement,
  type XmlIndexEntry,
} from '../xml/element.js';
import { isCollapsedMap } from './results.js';

/**
 * Decode the output members of a query-style document, descending into the
 * result wrapper element when the shape names one.
 */
export function decodeWrappedOutput(
  decoder: XmlShapeDecoder,
  root: XmlElement,
  shape: StructureShape | undefined
): DecodedMap {
  if (shape === undefined) {
    return {};
  }

  let start: XmlIndexEntry | undefined = root;
  const wrapper = shape.serialization.resultWrapper;
  if (wrapper !== undefined) {
    start = buildTagIndex(root).get(wrapper);
  }
  return start === undefined ? {} : decoder.decodeStructure(shape, start);
}

/**
 * Collapse a whole document below its root into plain values.
 */
export function collapseDocument(root: XmlElement): CollapsedXmlMap {
  return collapseIndex(buildTagIndex(root));
}

/**
 * The error fields of a collapsed error document: its `Error` child, or the
 * document itself when the root element is `Error`.
 */
export function collapsedErrorFields(root: XmlElement, collapsed: CollapsedXmlMap): CollapsedXmlMap {
  const error = collapsed['Error'];
  if (isCollapsedMap(error)) {
    return error;
  }
  return localName(root.tag) === 'Error' ? collapsed : {};
}
