/**
 * Endpoint resolution for built requests
 * @module s3-complete-multipart/config/endpoint
 */

import type { RequestDescriptor, ResolvedRequest } from '../types/index.js';
import { formatQueryString } from '../multipart/index.js';
import type { NormalizedS3RequestConfig } from './types.js';
import { DEFAULT_REGION } from './defaults.js';
import { validateEndpoint, validateRegion } from './validation.js';

/**
 * Where a request is sent
 */
export interface EndpointOptions {
  /**
   * Per-request region; takes precedence over the configured region
   */
  readonly region?: string;
  readonly config?: Pick<NormalizedS3RequestConfig, 'region' | 'endpoint'>;
}

/**
 * Resolves the base URL, without a trailing slash.
 *
 * A configured endpoint wins; otherwise the regional S3 endpoint is used.
 *
 * @throws {ConfigError} If the per-request region or the configured endpoint is invalid
 */
export function resolveEndpoint(options: EndpointOptions = {}): string {
  if (options.region !== undefined) {
    validateRegion(options.region);
  }

  if (options.config?.endpoint) {
    const url = validateEndpoint(options.config.endpoint);
    return `${url.origin}${url.pathname.replace(/\/+$/, '')}`;
  }

  const region = options.region ?? options.config?.region ?? DEFAULT_REGION;
  return `https://s3.${region}.amazonaws.com`;
}

/**
 * Binds a request descriptor to an absolute path-style URL
 *
 * @example
 * ```typescript
 * const resolved = withEndpoint(descriptor, { region: 'eu-west-1' });
 * resolved.url; // 'https://s3.eu-west-1.amazonaws.com/media/intro.mp4?uploadId=upload-1'
 * ```
 *
 * @throws {ConfigError} If the per-request region or the configured endpoint is invalid
 */
export function withEndpoint(
  descriptor: RequestDescriptor,
  options: EndpointOptions = {}
): ResolvedRequest {
  const queryString = formatQueryString(descriptor.query);
  const url = `${resolveEndpoint(options)}${descriptor.path}${queryString ? `?${queryString}` : ''}`;

  const resolved: ResolvedRequest = { ...descriptor, url };
  return Object.freeze(resolved);
}
