/**
 * Response header helpers.
 *
 * @module http/headers
 */

/**
 * Look up a header by name, ignoring case.
 *
 * @param headers - Response headers
 * @param name - Header name
 * @returns Header value if present
 *
 * @example
 * ```typescript
 * getHeader({ 'X-Amzn-RequestId': 'abc' }, 'x-amzn-requestid'); // 'abc'
 * ```
 */
export function getHeader(headers: Record<string, string>, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(headers, name)) {
    return headers[name];
  }
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}

/**
 * Collect every header whose name starts with a prefix, ignoring case.
 * Keys in the result are the header names with the prefix removed.
 *
 * @example
 * ```typescript
 * headersWithPrefix({ 'x-amz-meta-Owner': 'ops', 'content-type': 'text/plain' }, 'x-amz-meta-');
 * // { Owner: 'ops' }
 * ```
 */
export function headersWithPrefix(
  headers: Record<string, string>,
  prefix: string
): Record<string, string> {
  const wanted = prefix.toLowerCase();
  const collected: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase().startsWith(wanted)) {
      collected[key.slice(prefix.length)] = value;
    }
  }
  return collected;
}
