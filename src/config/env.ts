/**
 * Environment variable configuration loading
 * @module s3-complete-multipart/config/env
 */

import { ConfigError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../observability/index.js';
import type { S3RequestConfig, NormalizedS3RequestConfig } from './types.js';
import { normalizeConfig } from './validation.js';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  REGION: 'S3_REGION',
  ENDPOINT: 'S3_ENDPOINT',
  REQUEST_PAYER_VALUES: 'S3_REQUEST_PAYER_VALUES',
  LOG_LEVEL: 'S3_LOG_LEVEL',
} as const;

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

function parseListEnv(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function parseLogLevelEnv(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError({
      message: `${ENV_VARS.LOG_LEVEL} must be one of error, warn, info, debug, trace, got: ${value}`,
      code: 'InvalidLogLevel',
    });
  }
  return level;
}

/**
 * Creates configuration from environment variables.
 *
 * Environment variables (all optional):
 * - S3_REGION: region used to derive the endpoint
 * - S3_ENDPOINT: custom endpoint URL
 * - S3_REQUEST_PAYER_VALUES: comma-separated allowed RequestPayer values
 * - S3_LOG_LEVEL: error, warn, info, debug or trace
 *
 * @param env - Environment to read, `process.env` by default
 * @throws {ConfigError} If a variable holds an invalid value
 */
export function createConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): NormalizedS3RequestConfig {
  const config: S3RequestConfig = {
    region: readEnv(env, ENV_VARS.REGION),
    endpoint: readEnv(env, ENV_VARS.ENDPOINT),
    requestPayerValues: parseListEnv(readEnv(env, ENV_VARS.REQUEST_PAYER_VALUES)),
    logLevel: parseLogLevelEnv(readEnv(env, ENV_VARS.LOG_LEVEL)),
  };

  return normalizeConfig(config);
}
