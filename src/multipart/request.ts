/**
 * Immutable CompleteMultipartUpload parameters
 * @module s3-complete-multipart/multipart/request
 */

import type {
  CompleteMultipartUploadInput,
  CompleteMultipartUploadField,
  CompletedMultipartUpload,
  CompletedPart,
} from '../types/index.js';

function freezeUpload(
  upload: CompleteMultipartUploadInput['MultipartUpload']
): CompleteMultipartUploadInput['MultipartUpload'] {
  if (upload === undefined || upload === null) {
    return upload;
  }
  const parts = upload.Parts;
  if (parts === undefined || parts === null) {
    return Object.freeze({ Parts: parts });
  }
  const frozenParts: readonly CompletedPart[] = Object.freeze(
    parts.map((part) => Object.freeze({ PartNumber: part.PartNumber, ETag: part.ETag }))
  );
  const frozen: CompletedMultipartUpload = { Parts: frozenParts };
  return Object.freeze(frozen);
}

/**
 * Snapshot of the parameters of a CompleteMultipartUpload call.
 *
 * Instances never change. `with()` returns a new snapshot, so one request can
 * be shared between concurrent builds.
 *
 * @example
 * ```typescript
 * const base = CompleteMultipartUploadRequest.create({ Bucket: 'media', Key: 'video.mp4' });
 * const request = base
 *   .with('UploadId', 'upload-1')
 *   .with('MultipartUpload', { Parts: [{ PartNumber: 1, ETag: '"a1"' }] });
 * ```
 */
export class CompleteMultipartUploadRequest {
  readonly input: Readonly<CompleteMultipartUploadInput>;

  private constructor(input: CompleteMultipartUploadInput) {
    this.input = Object.freeze({
      ...input,
      MultipartUpload: freezeUpload(input.MultipartUpload),
    });
  }

  /**
   * Creates a request from raw parameters, or returns an existing request as-is
   */
  static create(
    input: CompleteMultipartUploadInput | CompleteMultipartUploadRequest = {}
  ): CompleteMultipartUploadRequest {
    return input instanceof CompleteMultipartUploadRequest
      ? input
      : new CompleteMultipartUploadRequest(input);
  }

  /**
   * Returns a copy with one field replaced. Passing `null` or `undefined` unsets it.
   */
  with<K extends CompleteMultipartUploadField>(
    field: K,
    value: CompleteMultipartUploadInput[K]
  ): CompleteMultipartUploadRequest {
    return new CompleteMultipartUploadRequest({ ...this.input, [field]: value });
  }

  get bucket(): string | undefined {
    return this.input.Bucket ?? undefined;
  }

  get key(): string | undefined {
    return this.input.Key ?? undefined;
  }

  get uploadId(): string | undefined {
    return this.input.UploadId ?? undefined;
  }

  get multipartUpload(): CompletedMultipartUpload | undefined {
    return this.input.MultipartUpload ?? undefined;
  }

  get region(): string | undefined {
    return this.input['@region'] ?? undefined;
  }
}
