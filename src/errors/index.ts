/**
 * Error system
 * @module s3-complete-multipart/errors
 */

export { S3RequestError, isS3RequestError, type S3RequestErrorParams } from './error.js';

export { ValidationError, SerializationError, ConfigError, ServiceError } from './categories.js';

export { mapServiceError, isRetryableStatus } from './mapping.js';
