/**
 * Multipart upload client
 * @module s3-complete-multipart/client
 */

import type {
  CompleteMultipartUploadInput,
  CompleteMultipartUploadOutput,
} from '../types/index.js';
import { normalizeConfig, withEndpoint, type NormalizedS3RequestConfig } from '../config/index.js';
import {
  CompleteMultipartUploadRequest,
  buildCompleteMultipartUploadRequest,
  parseCompleteMultipartUploadResponse,
} from '../multipart/index.js';
import {
  ConsoleLogger,
  describeRequest,
  logError,
  type Logger,
} from '../observability/index.js';
import type { HttpTransport } from '../transport/index.js';

export interface MultipartUploadClientOptions {
  /**
   * Transport that signs and sends requests
   */
  readonly transport: HttpTransport;

  /**
   * Normalized configuration; defaults apply when omitted
   */
  readonly config?: NormalizedS3RequestConfig;

  /**
   * Defaults to a ConsoleLogger at the configured level
   */
  readonly logger?: Logger;
}

/**
 * Completes multipart uploads over an {@link HttpTransport}.
 *
 * Each call builds the request, binds it to the endpoint, sends it once and
 * parses the answer. Retrying is left to the transport.
 */
export class MultipartUploadClient {
  private readonly transport: HttpTransport;

  private readonly config: NormalizedS3RequestConfig;

  private readonly logger: Logger;

  constructor(options: MultipartUploadClientOptions) {
    this.transport = options.transport;
    this.config = options.config ?? normalizeConfig();
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel);
  }

  /**
   * Completes a multipart upload
   *
   * @throws {ValidationError} If the input cannot be built into a request
   * @throws {ServiceError} If the service rejects the completion
   */
  async complete(
    input: CompleteMultipartUploadInput | CompleteMultipartUploadRequest
  ): Promise<CompleteMultipartUploadOutput> {
    const request = CompleteMultipartUploadRequest.create(input);

    try {
      const descriptor = buildCompleteMultipartUploadRequest(request, {
        requestPayerValues: this.config.requestPayerValues,
      });
      const resolved = withEndpoint(descriptor, {
        region: request.region,
        config: this.config,
      });

      this.logger.debug('Sending CompleteMultipartUpload', {
        ...describeRequest(resolved),
        partCount: request.multipartUpload?.Parts?.length ?? 0,
      });

      const response = await this.transport.send({
        method: resolved.method,
        url: resolved.url,
        headers: { ...resolved.headers },
        body: resolved.body,
      });

      const output = parseCompleteMultipartUploadResponse(response);

      this.logger.info('Multipart upload completed', {
        bucket: request.bucket,
        key: request.key,
        requestId: output.requestId,
      });

      return output;
    } catch (error) {
      if (error instanceof Error) {
        logError(this.logger, 'CompleteMultipartUpload', error);
      }
      throw error;
    }
  }
}
