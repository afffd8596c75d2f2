/**
 * Response metadata taken from headers.
 *
 * @module rest/metadata
 */

import { getHeader } from '../http/headers.js';
import type { ResponseMetadata } from '../types/response.js';

export const REQUEST_ID_HEADER = 'x-amzn-requestid';
export const LEGACY_REQUEST_ID_HEADER = 'x-amz-request-id';
export const HOST_ID_HEADER = 'x-amz-id-2';

/**
 * Metadata from the request id headers.
 *
 * `x-amzn-requestid` wins; otherwise `x-amz-request-id` supplies the
 * request id and `x-amz-id-2` the host id.
 *
 * @example
 * ```typescript
 * headerMetadata({ 'x-amz-request-id': 'r-1', 'x-amz-id-2': 'h-1' });
 * // { RequestId: 'r-1', HostId: 'h-1' }
 * ```
 */
export function headerMetadata(headers: Record<string, string>): ResponseMetadata {
  const requestId = getHeader(headers, REQUEST_ID_HEADER);
  if (requestId !== undefined) {
    return { RequestId: requestId };
  }

  const legacyRequestId = getHeader(headers, LEGACY_REQUEST_ID_HEADER);
  if (legacyRequestId !== undefined) {
    return {
      RequestId: legacyRequestId,
      HostId: getHeader(headers, HOST_ID_HEADER) ?? '',
    };
  }

  return { RequestId: '' };
}
