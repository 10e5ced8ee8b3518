/**
 * Type definitions
 * @module s3-complete-multipart/types
 */

export {
  RequestPayer,
  ChecksumAlgorithm,
  type CompletedPart,
  type CompletedMultipartUpload,
  type Optional,
} from './common.js';

export type { CompleteMultipartUploadInput, CompleteMultipartUploadField } from './requests.js';

export type {
  HttpMethod,
  RequestDescriptor,
  ResolvedRequest,
  CompleteMultipartUploadOutput,
} from './responses.js';
