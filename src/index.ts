/**
 * Request builder for the S3 CompleteMultipartUpload operation
 *
 * @module s3-complete-multipart
 *
 * @example
 * ```typescript
 * import { buildCompleteMultipartUploadRequest, withEndpoint } from 's3-complete-multipart';
 *
 * const descriptor = buildCompleteMultipartUploadRequest({
 *   Bucket: 'media',
 *   Key: 'videos/intro.mp4',
 *   UploadId: 'upload-1',
 *   MultipartUpload: {
 *     Parts: [
 *       { PartNumber: 1, ETag: '"a1"' },
 *       { PartNumber: 2, ETag: '"b2"' },
 *     ],
 *   },
 * });
 *
 * const { url } = withEndpoint(descriptor, { region: 'eu-west-1' });
 * ```
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './multipart/index.js';
export * from './xml/index.js';
export * from './config/index.js';
export * from './transport/index.js';
export * from './observability/index.js';
export * from './client/index.js';
