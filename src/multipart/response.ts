/**
 * CompleteMultipartUpload response handling
 * @module s3-complete-multipart/multipart/response
 */

import type { CompleteMultipartUploadOutput } from '../types/index.js';
import { ServiceError, isRetryableStatus, mapServiceError } from '../errors/index.js';
import { getHeader, getRequestId, type HttpResponse } from '../transport/index.js';
import { isErrorResponse, parseErrorResponse, parseCompleteMultipartResult } from '../xml/index.js';

/**
 * Turns the service's answer into an output value
 *
 * The service can fail a completion after it has sent 200 OK; in that case
 * the body is an `<Error>` document and is treated like any other failure.
 *
 * @throws {ServiceError} If the service reported an error
 * @throws {SerializationError} If a success body is malformed
 */
export function parseCompleteMultipartUploadResponse(
  response: HttpResponse
): CompleteMultipartUploadOutput {
  const requestId = getRequestId(response.headers);
  const text = new TextDecoder().decode(response.body);

  if (isErrorResponse(text)) {
    throw mapServiceError(response.status, parseErrorResponse(text), requestId);
  }

  if (response.status >= 400) {
    throw new ServiceError({
      message: `CompleteMultipartUpload failed with HTTP ${response.status}`,
      code: `Http${response.status}`,
      status: response.status,
      requestId,
      isRetryable: isRetryableStatus(response.status),
    });
  }

  const result = parseCompleteMultipartResult(text);
  const bucketKeyEnabled = getHeader(
    response.headers,
    'x-amz-server-side-encryption-bucket-key-enabled'
  );

  return {
    ...result,
    versionId: getHeader(response.headers, 'x-amz-version-id'),
    expiration: getHeader(response.headers, 'x-amz-expiration'),
    serverSideEncryption: getHeader(response.headers, 'x-amz-server-side-encryption'),
    sseKmsKeyId: getHeader(response.headers, 'x-amz-server-side-encryption-aws-kms-key-id'),
    bucketKeyEnabled:
      bucketKeyEnabled === undefined ? undefined : bucketKeyEnabled.toLowerCase() === 'true',
    requestCharged: getHeader(response.headers, 'x-amz-request-charged'),
    requestId,
  };
}
