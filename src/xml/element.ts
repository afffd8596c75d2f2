/**
 * XML element tree and tag index utilities.
 *
 * @module xml/element
 */

/**
 * An XML element. Attributes are not retained: no protocol reads them.
 */
export interface XmlElement {
  /** Tag name as written, including any namespace qualifier */
  readonly tag: string;
  /** Concatenated character data, absent for empty elements */
  readonly text?: string;
  /** Child elements in document order */
  readonly children: readonly XmlElement[];
}

/**
 * A tag index entry: a single element, or every element sharing a repeated tag.
 */
export type XmlIndexEntry = XmlElement | XmlElement[];

/**
 * Children of an element grouped by local tag name.
 */
export type XmlTagIndex = Map<string, XmlIndexEntry>;

/**
 * A subtree collapsed into plain values: leaves become their text, parents
 * become mappings, and repeated tags become arrays.
 */
export type CollapsedXml = string | CollapsedXmlMap | CollapsedXml[];

export interface CollapsedXmlMap {
  [tag: string]: CollapsedXml;
}

const CLARK_NAMESPACE = /^\{[^}]*\}/;

/**
 * Tag name without its namespace, in either Clark (`{uri}Name`) or prefixed
 * (`ns:Name`) form.
 *
 * @example
 * ```typescript
 * localName('{http://s3.amazonaws.com/doc/2006-03-01/}Bucket'); // 'Bucket'
 * localName('ec2:requestId'); // 'requestId'
 * ```
 */
export function localName(tag: string): string {
  const name = tag.replace(CLARK_NAMESPACE, '');
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

/**
 * Create an element. Used for synthetic documents such as an empty body.
 */
export function createElement(
  tag: string,
  children: readonly XmlElement[] = [],
  text?: string
): XmlElement {
  return text === undefined ? { tag, children } : { tag, text, children };
}

/**
 * Type guard distinguishing an element from the other values a decoder sees.
 */
export function isXmlElement(value: unknown): value is XmlElement {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'tag' in value &&
    'children' in value
  );
}

/**
 * Group the immediate children of an element by local tag name.
 * A repeated tag maps to its elements in document order.
 *
 * @example
 * ```typescript
 * // <r><a>1</a><b>2</b><a>3</a></r>
 * const index = buildTagIndex(root);
 * index.get('a'); // [<a>1</a>, <a>3</a>]
 * index.get('b'); // <b>2</b>
 * ```
 */
export function buildTagIndex(parent: XmlElement): XmlTagIndex {
  const index: XmlTagIndex = new Map();
  for (const child of parent.children) {
    const key = localName(child.tag);
    const existing = index.get(key);
    if (existing === undefined) {
      index.set(key, child);
    } else if (Array.isArray(existing)) {
      existing.push(child);
    } else {
      index.set(key, [existing, child]);
    }
  }
  return index;
}

/**
 * Character data of an index entry's element, or undefined for repeated tags.
 */
export function entryText(entry: XmlIndexEntry | undefined): string | undefined {
  if (entry === undefined || Array.isArray(entry)) {
    return undefined;
  }
  return entry.text ?? '';
}

/**
 * Collapse an element: a mapping of its children when it has any, else its text.
 */
export function collapseElement(element: XmlElement): CollapsedXml {
  if (element.children.length > 0) {
    return collapseIndex(buildTagIndex(element));
  }
  return element.text ?? '';
}

/**
 * Collapse every entry of a tag index into plain values.
 *
 * @example
 * ```typescript
 * // <ErrorResponse><Error><Code>Throttling</Code></Error><RequestId>r-1</RequestId></ErrorResponse>
 * collapseIndex(buildTagIndex(root));
 * // { Error: { Code: 'Throttling' }, RequestId: 'r-1' }
 * ```
 */
export function collapseIndex(index: XmlTagIndex): CollapsedXmlMap {
  const collapsed: CollapsedXmlMap = {};
  for (const [key, entry] of index) {
    collapsed[key] = Array.isArray(entry) ? entry.map(collapseElement) : collapseElement(entry);
  }
  return collapsed;
}
