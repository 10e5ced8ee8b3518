/**
 * CompleteMultipartUpload request builder
 * @module s3-complete-multipart/multipart/complete
 */

import type { CompleteMultipartUploadInput, RequestDescriptor } from '../types/index.js';
import { serializeCompleteMultipartBody } from '../xml/index.js';
import { CompleteMultipartUploadRequest } from './request.js';
import { validateCompleteMultipartInput } from './validation.js';
import { buildCompleteMultipartHeaders, type HeaderOptions } from './headers.js';
import { buildCompleteMultipartQuery, buildObjectPath } from './uri.js';

/**
 * Options for {@link buildCompleteMultipartUploadRequest}
 */
export type BuildOptions = HeaderOptions;

/**
 * Builds the outbound request for CompleteMultipartUpload
 *
 * Steps run in a fixed order: validate required fields, assemble headers,
 * query, path, then the XML body. Any failure aborts the build, so no
 * partially built descriptor is ever returned. The function is pure:
 * the same input always yields byte-identical output.
 *
 * @param input - Raw parameters or a {@link CompleteMultipartUploadRequest}
 * @param options - Build options (allowed request payer values)
 * @returns Frozen request descriptor
 * @throws {ValidationError} MissingRequiredField or InvalidEnumValue
 * @throws {SerializationError} If the XML body cannot be written
 *
 * @example
 * ```typescript
 * const request = buildCompleteMultipartUploadRequest({
 *   Bucket: 'media',
 *   Key: 'videos/intro.mp4',
 *   UploadId: 'upload-1',
 *   MultipartUpload: { Parts: [{ PartNumber: 1, ETag: '"a1"' }] },
 * });
 * request.path; // '/media/videos/intro.mp4'
 * request.query; // { uploadId: 'upload-1' }
 * ```
 */
export function buildCompleteMultipartUploadRequest(
  input: CompleteMultipartUploadInput | CompleteMultipartUploadRequest,
  options: BuildOptions = {}
): RequestDescriptor {
  const params = CompleteMultipartUploadRequest.create(input).input;

  const validated = validateCompleteMultipartInput(params);
  const headers = buildCompleteMultipartHeaders(validated, options);
  const query = buildCompleteMultipartQuery(validated.UploadId);
  const path = buildObjectPath(validated.Bucket, validated.Key);
  const body = serializeCompleteMultipartBody(validated.MultipartUpload);

  const descriptor: RequestDescriptor = {
    method: 'POST',
    path,
    query: Object.freeze(query),
    headers: Object.freeze(headers),
    body,
  };
  return Object.freeze(descriptor);
}
