/**
 * Fluent configuration builder
 * @module s3-complete-multipart/config/builder
 */

import type { LogLevel } from '../observability/index.js';
import type { S3RequestConfig, NormalizedS3RequestConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Fluent builder for constructing configuration.
 */
export class S3RequestConfigBuilder {
  private config: S3RequestConfig = {};

  /**
   * Sets the region used to derive the endpoint.
   */
  region(region: string): this {
    this.config.region = region;
    return this;
  }

  /**
   * Sets a custom endpoint URL.
   */
  endpoint(url: string): this {
    this.config.endpoint = url;
    return this;
  }

  /**
   * Replaces the allowed RequestPayer values.
   */
  requestPayerValues(values: readonly string[]): this {
    this.config.requestPayerValues = values;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Validates the configuration and applies defaults.
   *
   * @throws {ConfigError} If configuration is invalid
   */
  build(): NormalizedS3RequestConfig {
    return normalizeConfig({ ...this.config });
  }
}
