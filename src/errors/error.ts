/**
 * Base error class
 * @module s3-complete-multipart/errors/error
 */

/**
 * Parameters for creating an S3RequestError
 */
export interface S3RequestErrorParams {
  /**
   * Error type/category
   */
  readonly type: string;

  /**
   * Human-readable error message
   */
  readonly message: string;

  /**
   * HTTP status code (if applicable)
   */
  readonly status?: number;

  /**
   * Machine-readable error code
   */
  readonly code?: string;

  /**
   * Whether this error is retryable
   */
  readonly isRetryable: boolean;

  /**
   * Request ID for troubleshooting
   */
  readonly requestId?: string;

  /**
   * Additional error details
   */
  readonly details?: Record<string, unknown>;

  /**
   * Underlying error, if any
   */
  readonly cause?: unknown;
}

/**
 * Base error class for everything this package throws
 */
export class S3RequestError extends Error {
  readonly type: string;

  readonly status?: number;

  readonly code?: string;

  readonly isRetryable: boolean;

  readonly requestId?: string;

  readonly details?: Record<string, unknown>;

  constructor(params: S3RequestErrorParams) {
    super(params.message, params.cause === undefined ? undefined : { cause: params.cause });

    // Set the prototype explicitly to maintain instanceof checks
    Object.setPrototypeOf(this, S3RequestError.prototype);

    this.name = 'S3RequestError';
    this.type = params.type;
    this.status = params.status;
    this.code = params.code;
    this.isRetryable = params.isRetryable;
    this.requestId = params.requestId;
    this.details = params.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, S3RequestError);
    }
  }

  /**
   * Converts the error to a JSON representation
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      type: this.type,
      message: this.message,
      status: this.status,
      code: this.code,
      isRetryable: this.isRetryable,
      requestId: this.requestId,
      details: this.details,
    };
  }

  toString(): string {
    const parts = [this.name, this.type];

    if (this.code) {
      parts.push(`[${this.code}]`);
    }

    if (this.status) {
      parts.push(`(${this.status})`);
    }

    parts.push(`- ${this.message}`);

    if (this.requestId) {
      parts.push(`(RequestId: ${this.requestId})`);
    }

    return parts.join(' ');
  }
}

/**
 * Type guard for errors raised by this package
 */
export function isS3RequestError(error: unknown): error is S3RequestError {
  return error instanceof S3RequestError;
}
