/**
 * Common type definitions shared by requests and responses
 * @module s3-complete-multipart/types/common
 */

/**
 * A part that was uploaded and is referenced when completing the upload
 */
export interface CompletedPart {
  /**
   * Part number (1-10000)
   */
  readonly PartNumber: number;

  /**
   * Entity tag returned from the part upload
   */
  readonly ETag: string;
}

/**
 * Container for the completed parts of a multipart upload.
 *
 * Parts are sent in the order given here; they are never re-sorted.
 */
export interface CompletedMultipartUpload {
  readonly Parts?: readonly CompletedPart[] | null;
}

/**
 * Values accepted by the x-amz-request-payer header
 */
export const RequestPayer = {
  REQUESTER: 'requester',
} as const;

export type RequestPayer = (typeof RequestPayer)[keyof typeof RequestPayer];

/**
 * Checksum algorithms that may accompany the completed object
 */
export const ChecksumAlgorithm = {
  CRC32: 'crc32',
  CRC32C: 'crc32c',
  SHA1: 'sha1',
  SHA256: 'sha256',
} as const;

export type ChecksumAlgorithm = (typeof ChecksumAlgorithm)[keyof typeof ChecksumAlgorithm];

/**
 * A value the caller may leave unset
 */
export type Optional<T> = T | null | undefined;
