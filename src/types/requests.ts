/**
 * Request type definitions
 * @module s3-complete-multipart/types/requests
 */

import type { CompletedMultipartUpload, Optional } from './common.js';

/**
 * Parameters of a CompleteMultipartUpload call.
 *
 * `Bucket`, `Key` and `UploadId` are required when the request is built;
 * they are typed as optional so that input coming from untyped sources is
 * rejected by the builder rather than assumed.
 */
export interface CompleteMultipartUploadInput {
  /**
   * Name of the bucket to which the multipart upload was initiated
   */
  readonly Bucket?: Optional<string>;

  /**
   * Object key for which the multipart upload was initiated
   */
  readonly Key?: Optional<string>;

  /**
   * Parts to assemble into the final object
   */
  readonly MultipartUpload?: Optional<CompletedMultipartUpload>;

  /**
   * ID returned when the multipart upload was created
   */
  readonly UploadId?: Optional<string>;

  /**
   * Base64-encoded CRC-32 checksum of the object
   */
  readonly ChecksumCRC32?: Optional<string>;

  /**
   * Base64-encoded CRC-32C checksum of the object
   */
  readonly ChecksumCRC32C?: Optional<string>;

  /**
   * Base64-encoded SHA-1 digest of the object
   */
  readonly ChecksumSHA1?: Optional<string>;

  /**
   * Base64-encoded SHA-256 digest of the object
   */
  readonly ChecksumSHA256?: Optional<string>;

  /**
   * Confirms that the requester knows they will be charged.
   * Must be one of the configured request payer values (see {@link RequestPayer}).
   */
  readonly RequestPayer?: Optional<string>;

  /**
   * Account ID of the expected bucket owner
   */
  readonly ExpectedBucketOwner?: Optional<string>;

  /**
   * Complete only if the existing object's ETag matches
   */
  readonly IfMatch?: Optional<string>;

  /**
   * Complete only if the key does not exist yet (expects `*`)
   */
  readonly IfNoneMatch?: Optional<string>;

  /**
   * SSE-C algorithm, e.g. AES256
   */
  readonly SSECustomerAlgorithm?: Optional<string>;

  /**
   * Base64-encoded SSE-C key
   */
  readonly SSECustomerKey?: Optional<string>;

  /**
   * Base64-encoded MD5 digest of the SSE-C key
   */
  readonly SSECustomerKeyMD5?: Optional<string>;

  /**
   * Region override for this request. Used only when resolving the endpoint.
   */
  readonly '@region'?: Optional<string>;
}

/**
 * Field names of {@link CompleteMultipartUploadInput}
 */
export type CompleteMultipartUploadField = keyof CompleteMultipartUploadInput;
