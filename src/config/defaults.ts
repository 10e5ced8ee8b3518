/**
 * Default configuration values
 * @module s3-complete-multipart/config/defaults
 */

import type { LogLevel } from '../observability/index.js';

/**
 * Region used when neither the request nor the configuration names one.
 */
export const DEFAULT_REGION = 'us-east-1';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
