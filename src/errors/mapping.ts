/**
 * Maps service error responses to error instances
 * @module s3-complete-multipart/errors/mapping
 */

import type { ParsedError } from '../xml/error.js';
import { ServiceError } from './categories.js';

const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  'InternalError',
  'ServiceUnavailable',
  'SlowDown',
  'RequestTimeout',
]);

/**
 * Whether an HTTP status is worth retrying at the transport level
 */
export function isRetryableStatus(status: number): boolean {
  return status === 500 || status === 502 || status === 503 || status === 504;
}

/**
 * Builds a ServiceError from a parsed `<Error>` document
 *
 * @param status - HTTP status of the response
 * @param error - Parsed error body
 * @param requestId - Request ID from the response headers, used when the body has none
 */
export function mapServiceError(
  status: number,
  error: ParsedError,
  requestId?: string
): ServiceError {
  return new ServiceError({
    message: `${error.code}: ${error.message}`,
    code: error.code,
    status,
    requestId: error.requestId ?? requestId,
    isRetryable: RETRYABLE_CODES.has(error.code) || isRetryableStatus(status),
    details: error.resource ? { resource: error.resource } : undefined,
  });
}
