/**
 * Configuration type definitions
 * @module s3-complete-multipart/config/types
 */

import type { LogLevel } from '../observability/index.js';

/**
 * Configuration accepted from callers. Every field is optional.
 */
export interface S3RequestConfig {
  /**
   * Region used to derive the endpoint.
   * @default 'us-east-1'
   */
  region?: string;

  /**
   * Custom endpoint URL (optional).
   * If not provided, `https://s3.<region>.amazonaws.com` is used.
   */
  endpoint?: string;

  /**
   * Values accepted for the RequestPayer parameter.
   * @default ['requester']
   */
  requestPayerValues?: readonly string[];

  /**
   * Minimum level for the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;
}

/**
 * Configuration with defaults applied
 */
export interface NormalizedS3RequestConfig {
  readonly region: string;
  readonly endpoint?: string;
  readonly requestPayerValues: readonly string[];
  readonly logLevel: LogLevel;
}
