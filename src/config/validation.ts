/**
 * Configuration validation and normalization
 * @module s3-complete-multipart/config/validation
 */

import { ConfigError } from '../errors/index.js';
import { isLogLevel } from '../observability/index.js';
import type { S3RequestConfig, NormalizedS3RequestConfig } from './types.js';
import { DEFAULT_REQUEST_PAYER_VALUES } from '../multipart/index.js';
import { DEFAULT_REGION, DEFAULT_LOG_LEVEL } from './defaults.js';

const REGION_PATTERN = /^[a-z0-9-]+$/;

/**
 * Checks that a region can be used as a hostname label
 *
 * @throws {ConfigError} If the region holds anything but lowercase letters, digits and hyphens
 */
export function validateRegion(region: string): string {
  if (!REGION_PATTERN.test(region)) {
    throw ConfigError.invalidConfig(
      'region',
      `region must contain only lowercase letters, digits and hyphens, got: ${region}`
    );
  }
  return region;
}

/**
 * Checks that an endpoint is an absolute http(s) URL
 *
 * @throws {ConfigError} If the endpoint cannot be used
 */
export function validateEndpoint(endpoint: string): URL {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigError({
      message: `Invalid endpoint URL: ${endpoint}`,
      code: 'InvalidEndpoint',
      details: { endpoint },
      cause: error,
    });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError({
      message: 'endpoint must use http or https protocol',
      code: 'InvalidEndpointProtocol',
      details: { endpoint },
    });
  }

  return url;
}

/**
 * Validates configuration.
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function validateConfig(config: S3RequestConfig): void {
  if (config.region !== undefined) {
    validateRegion(config.region);
  }

  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }

  if (config.requestPayerValues !== undefined) {
    if (config.requestPayerValues.length === 0) {
      throw ConfigError.invalidConfig('requestPayerValues', 'requestPayerValues cannot be empty');
    }
    if (config.requestPayerValues.some((value) => value.trim() === '')) {
      throw ConfigError.invalidConfig(
        'requestPayerValues',
        'requestPayerValues cannot contain empty values'
      );
    }
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    throw ConfigError.invalidConfig('logLevel', `Unknown log level: ${String(config.logLevel)}`);
  }
}

/**
 * Validates configuration and applies defaults
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function normalizeConfig(config: S3RequestConfig = {}): NormalizedS3RequestConfig {
  validateConfig(config);

  return Object.freeze({
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint?.replace(/\/+$/, ''),
    requestPayerValues: Object.freeze([
      ...(config.requestPayerValues ?? DEFAULT_REQUEST_PAYER_VALUES),
    ]),
    logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
  });
}
