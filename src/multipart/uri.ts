/**
 * URI and query encoding for CompleteMultipartUpload
 * @module s3-complete-multipart/multipart/uri
 */

import type { Optional } from '../types/index.js';
import { ValidationError } from '../errors/index.js';
import { requireField } from './validation.js';

/**
 * Percent-encodes a string per RFC 3986.
 *
 * Only `A-Z a-z 0-9 - _ . ~` stay literal; `encodeURIComponent` also leaves
 * `! ' ( ) *` alone, so those are encoded here.
 *
 * @throws {ValidationError} If the value contains a lone surrogate
 */
export function rawUrlEncode(value: string): string {
  let encoded: string;
  try {
    encoded = encodeURIComponent(value);
  } catch (error) {
    throw new ValidationError({
      message: 'Value is not well-formed UTF-16 and cannot be percent-encoded',
      code: 'InvalidEncoding',
      cause: error,
    });
  }
  return encoded.replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Encodes an object key, keeping its `/` separators
 *
 * @example
 * ```typescript
 * encodeObjectKey('videos/2024/a b.mp4'); // 'videos/2024/a%20b.mp4'
 * ```
 */
export function encodeObjectKey(key: string): string {
  return rawUrlEncode(key).replace(/%2F/g, '/');
}

/**
 * Builds `/{bucket}/{key}`
 *
 * @throws {ValidationError} MissingRequiredField for a missing bucket, then key
 */
export function buildObjectPath(bucket: Optional<string>, key: Optional<string>): string {
  const bucketName = requireField('Bucket', bucket);
  const objectKey = requireField('Key', key);
  return `/${rawUrlEncode(bucketName)}/${encodeObjectKey(objectKey)}`;
}

/**
 * Builds the query parameters. Values stay raw; see {@link formatQueryString}.
 *
 * @throws {ValidationError} MissingRequiredField for a missing upload ID
 */
export function buildCompleteMultipartQuery(uploadId: Optional<string>): Record<string, string> {
  return { uploadId: requireField('UploadId', uploadId) };
}

/**
 * Encodes query parameters into a query string (without the leading `?`)
 *
 * @example
 * ```typescript
 * formatQueryString({ uploadId: 'a/b+c' }); // 'uploadId=a%2Fb%2Bc'
 * ```
 */
export function formatQueryString(query: Readonly<Record<string, string>>): string {
  return Object.entries(query)
    .map(([name, value]) => `${rawUrlEncode(name)}=${rawUrlEncode(value)}`)
    .join('&');
}
