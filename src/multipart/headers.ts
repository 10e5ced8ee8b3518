/**
 * Header assembly for CompleteMultipartUpload
 * @module s3-complete-multipart/multipart/headers
 */

import type { CompleteMultipartUploadInput, Optional } from '../types/index.js';
import { RequestPayer } from '../types/index.js';
import { requireEnumValue } from './validation.js';

/**
 * Request payer values accepted when none are configured
 */
export const DEFAULT_REQUEST_PAYER_VALUES: readonly string[] = Object.freeze(
  Object.values(RequestPayer)
);

/**
 * Optional input fields that map one-to-one onto a header
 */
const HEADER_FIELDS = [
  ['ChecksumCRC32', 'x-amz-checksum-crc32'],
  ['ChecksumCRC32C', 'x-amz-checksum-crc32c'],
  ['ChecksumSHA1', 'x-amz-checksum-sha1'],
  ['ChecksumSHA256', 'x-amz-checksum-sha256'],
  ['RequestPayer', 'x-amz-request-payer'],
  ['ExpectedBucketOwner', 'x-amz-expected-bucket-owner'],
  ['IfMatch', 'If-Match'],
  ['IfNoneMatch', 'If-None-Match'],
  ['SSECustomerAlgorithm', 'x-amz-server-side-encryption-customer-algorithm'],
  ['SSECustomerKey', 'x-amz-server-side-encryption-customer-key'],
  ['SSECustomerKeyMD5', 'x-amz-server-side-encryption-customer-key-MD5'],
] as const satisfies ReadonlyArray<readonly [keyof CompleteMultipartUploadInput, string]>;

export interface HeaderOptions {
  /**
   * Allowed values for `RequestPayer`
   */
  readonly requestPayerValues?: readonly string[];
}

/**
 * Builds the header map.
 *
 * Only set fields produce a header. Conditional headers are passed through
 * verbatim and the SSE-C headers are not checked against each other.
 *
 * @throws {ValidationError} InvalidEnumValue for an unknown RequestPayer
 */
export function buildCompleteMultipartHeaders(
  input: CompleteMultipartUploadInput,
  options: HeaderOptions = {}
): Record<string, string> {
  const headers: Record<string, string> = {
    'content-type': 'application/xml',
  };

  for (const [field, header] of HEADER_FIELDS) {
    const value: Optional<string> = input[field];
    if (value === undefined || value === null) {
      continue;
    }

    headers[header] =
      field === 'RequestPayer'
        ? requireEnumValue(
            field,
            value,
            options.requestPayerValues ?? DEFAULT_REQUEST_PAYER_VALUES
          )
        : value;
  }

  return headers;
}
