/**
 * Specific error categories
 * @module s3-complete-multipart/errors/categories
 */

import { S3RequestError, type S3RequestErrorParams } from './error.js';

type CategoryParams = Omit<S3RequestErrorParams, 'type' | 'isRetryable'> & {
  readonly isRetryable?: boolean;
};

/**
 * Input that cannot be turned into a request
 */
export class ValidationError extends S3RequestError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'validation_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  /**
   * A required parameter was absent or null
   */
  static missingRequiredField(field: string): ValidationError {
    return new ValidationError({
      message: `Missing required parameter "${field}": the value cannot be null`,
      code: 'MissingRequiredField',
      details: { field },
    });
  }

  /**
   * A parameter holds a value outside of its permitted set
   */
  static invalidEnumValue(
    field: string,
    value: string,
    allowed: readonly string[]
  ): ValidationError {
    return new ValidationError({
      message: `Invalid value "${value}" for parameter "${field}", expected one of: ${allowed.join(', ')}`,
      code: 'InvalidEnumValue',
      details: { field, value, allowed: [...allowed] },
    });
  }
}

/**
 * XML could not be written or read
 */
export class SerializationError extends S3RequestError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      code: params.code ?? 'SerializationError',
      type: 'serialization_error',
      isRetryable: false,
    });
    this.name = 'SerializationError';
    Object.setPrototypeOf(this, SerializationError.prototype);
  }
}

/**
 * Configuration and initialization errors
 */
export class ConfigError extends S3RequestError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'config_error',
      isRetryable: false,
    });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  /**
   * Invalid endpoint URL
   */
  static invalidEndpoint(endpoint: string): ConfigError {
    return new ConfigError({
      message: `Invalid endpoint URL: ${endpoint}`,
      code: 'InvalidEndpoint',
      details: { endpoint },
    });
  }

  /**
   * Invalid configuration parameter
   */
  static invalidConfig(paramName: string, message?: string): ConfigError {
    return new ConfigError({
      message: message ?? `Invalid configuration parameter: ${paramName}`,
      code: 'InvalidConfig',
      details: { paramName },
    });
  }
}

/**
 * Error reported by the storage service
 */
export class ServiceError extends S3RequestError {
  constructor(params: CategoryParams) {
    super({
      ...params,
      type: 'service_error',
      isRetryable: params.isRetryable ?? false,
    });
    this.name = 'ServiceError';
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}
