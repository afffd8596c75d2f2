/**
 * XML tokenizing for protocol response bodies
 * @module xml/parser
 */

import { XMLParser } from 'fast-xml-parser';
import { malformedBody } from '../error/index.js';
import { bodyToText, isEmptyBody } from '../http/body.js';
import type { ResponseBody } from '../types/response.js';
import { createElement, isXmlElement, type XmlElement } from './element.js';

const TEXT_NODE = '#text';
const ATTRIBUTES_NODE = ':@';

/**
 * Parser options for ordered, lossless element trees.
 *
 * Values stay strings and keep their whitespace: the shape decides how text
 * is interpreted.
 */
const PARSER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: true,
  textNodeName: TEXT_NODE,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true,
};

/**
 * Creates a configured XML parser instance for protocol responses
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convertElement(tag: string, content: unknown): XmlElement {
  const children: XmlElement[] = [];
  let text: string | undefined;

  if (Array.isArray(content)) {
    for (const item of content) {
      if (!isRecord(item)) {
        continue;
      }
      for (const [key, value] of Object.entries(item)) {
        if (key === ATTRIBUTES_NODE) {
          continue;
        }
        if (key === TEXT_NODE) {
          text = (text ?? '') + String(value);
        } else {
          children.push(convertElement(key, value));
        }
      }
    }
  }

  return createElement(tag, children, text);
}

/**
 * Parse an XML document into its root element.
 *
 * @param xml - XML document text
 * @returns Root element
 * @throws {ResponseParserError} `MalformedBody` if the document is not well formed
 *
 * @example
 * ```typescript
 * const root = parseXmlDocument('<Root><Value>test</Value></Root>');
 * root.tag;                  // 'Root'
 * root.children[0].text;     // 'test'
 * ```
 */
export function parseXmlDocument(xml: string): XmlElement {
  let nodes: unknown;
  try {
    nodes = createXmlParser().parse(xml, true);
  } catch (error) {
    throw malformedBody('XML', error);
  }

  if (Array.isArray(nodes)) {
    for (const node of nodes) {
      if (!isRecord(node)) {
        continue;
      }
      const tag = Object.keys(node).find((key) => key !== ATTRIBUTES_NODE && key !== TEXT_NODE);
      if (tag !== undefined) {
        return convertElement(tag, node[tag]);
      }
    }
  }
  throw malformedBody('XML', new Error('document has no root element'));
}

/**
 * Root element of a response body. A pre-parsed document is returned as is
 * and an empty body becomes an empty, untagged element.
 *
 * @throws {ResponseParserError} `MalformedBody` if the body is not well formed
 */
export function parseXmlBody(body: ResponseBody): XmlElement {
  if (isXmlElement(body)) {
    return body;
  }
  if (isEmptyBody(body)) {
    return createElement('');
  }
  return parseXmlDocument(bodyToText(body));
}
