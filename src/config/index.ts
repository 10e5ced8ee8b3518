/**
 * Configuration
 * @module s3-complete-multipart/config
 */

export type { S3RequestConfig, NormalizedS3RequestConfig } from './types.js';
export { DEFAULT_REGION, DEFAULT_LOG_LEVEL } from './defaults.js';
export { validateConfig, validateEndpoint, validateRegion, normalizeConfig } from './validation.js';
export { createConfigFromEnv, ENV_VARS } from './env.js';
export { S3RequestConfigBuilder } from './builder.js';
export { resolveEndpoint, withEndpoint, type EndpointOptions } from './endpoint.js';
