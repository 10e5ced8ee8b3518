/**
 * Response type definitions
 * @module s3-complete-multipart/types/responses
 */

/**
 * HTTP method used by the operation
 */
export type HttpMethod = 'POST';

/**
 * Outbound request produced by the builder.
 *
 * Transport-agnostic: the query holds raw values and the body is the exact
 * byte sequence to send.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;

  /**
   * Percent-encoded path, `/{bucket}/{key}`
   */
  readonly path: string;

  /**
   * Raw (unencoded) query parameters
   */
  readonly query: Readonly<Record<string, string>>;

  readonly headers: Readonly<Record<string, string>>;

  /**
   * UTF-8 XML body, empty when no parts were given
   */
  readonly body: Uint8Array;
}

/**
 * A request descriptor bound to an absolute URL
 */
export interface ResolvedRequest extends RequestDescriptor {
  readonly url: string;
}

/**
 * Result of a completed multipart upload
 */
export interface CompleteMultipartUploadOutput {
  /**
   * URI that identifies the newly created object
   */
  readonly location?: string;

  readonly bucket?: string;

  readonly key?: string;

  /**
   * Entity tag of the assembled object, without surrounding quotes
   */
  readonly eTag?: string;

  readonly checksumCRC32?: string;

  readonly checksumCRC32C?: string;

  readonly checksumSHA1?: string;

  readonly checksumSHA256?: string;

  /**
   * Version ID (for versioned buckets)
   */
  readonly versionId?: string;

  /**
   * Expiration rule applied to the object, if any
   */
  readonly expiration?: string;

  /**
   * Server-side encryption algorithm
   */
  readonly serverSideEncryption?: string;

  readonly sseKmsKeyId?: string;

  readonly bucketKeyEnabled?: boolean;

  /**
   * Set to `requester` when the requester was charged
   */
  readonly requestCharged?: string;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;
}
