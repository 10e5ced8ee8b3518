/**
 * CompleteMultipartUpload request construction
 * @module s3-complete-multipart/multipart
 */

export { CompleteMultipartUploadRequest } from './request.js';

export {
  REQUIRED_FIELDS,
  validateCompleteMultipartInput,
  requireField,
  requireEnumValue,
  type RequiredField,
  type ValidatedInput,
} from './validation.js';

export {
  DEFAULT_REQUEST_PAYER_VALUES,
  buildCompleteMultipartHeaders,
  type HeaderOptions,
} from './headers.js';

export {
  rawUrlEncode,
  encodeObjectKey,
  buildObjectPath,
  buildCompleteMultipartQuery,
  formatQueryString,
} from './uri.js';

export { buildCompleteMultipartUploadRequest, type BuildOptions } from './complete.js';

export { parseCompleteMultipartUploadResponse } from './response.js';
