/**
 * Tests for MultipartUploadClient
 */

import { MultipartUploadClient } from '../client.js';
import { normalizeConfig } from '../../config/index.js';
import { ConfigError, ServiceError, ValidationError } from '../../errors/index.js';
import type { Logger } from '../../observability/index.js';
import type { HttpRequest, HttpResponse } from '../../transport/index.js';
import { S3_XMLNS } from '../../xml/index.js';

const RESULT_BODY =
  '<CompleteMultipartUploadResult>' +
  '<Location>https://s3.eu-west-1.amazonaws.com/media/intro.mp4</Location>' +
  '<Bucket>media</Bucket><Key>intro.mp4</Key><ETag>"etag-2"</ETag>' +
  '</CompleteMultipartUploadResult>';

function createLogger(): Logger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  };
}

function createTransport(status: number, body: string, headers: Record<string, string> = {}) {
  const requests: HttpRequest[] = [];
  const send = vi.fn(async (request: HttpRequest): Promise<HttpResponse> => {
    requests.push(request);
    return { status, headers, body: new TextEncoder().encode(body) };
  });
  return { transport: { send }, requests };
}

describe('MultipartUploadClient', () => {
  it('should send the built request to the regional endpoint', async () => {
    const { transport, requests } = createTransport(200, RESULT_BODY, {
      'x-amz-request-id': 'req-9',
    });
    const logger = createLogger();
    const client = new MultipartUploadClient({
      transport,
      logger,
      config: normalizeConfig({ region: 'eu-west-1' }),
    });

    const output = await client.complete({
      Bucket: 'media',
      Key: 'intro.mp4',
      UploadId: 'upload-1',
      RequestPayer: 'requester',
      MultipartUpload: { Parts: [{ PartNumber: 1, ETag: '"a"' }] },
    });

    expect(transport.send).toHaveBeenCalledTimes(1);
    expect(requests[0].method).toBe('POST');
    expect(requests[0].url).toBe(
      'https://s3.eu-west-1.amazonaws.com/media/intro.mp4?uploadId=upload-1'
    );
    expect(requests[0].headers).toEqual({
      'content-type': 'application/xml',
      'x-amz-request-payer': 'requester',
    });
    expect(new TextDecoder().decode(requests[0].body)).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        `<CompleteMultipartUpload xmlns="${S3_XMLNS}">` +
        '<Part><PartNumber>1</PartNumber><ETag>"a"</ETag></Part>' +
        '</CompleteMultipartUpload>'
    );

    expect(output.eTag).toBe('etag-2');
    expect(output.requestId).toBe('req-9');
    expect(logger.info).toHaveBeenCalledWith('Multipart upload completed', {
      bucket: 'media',
      key: 'intro.mp4',
      requestId: 'req-9',
    });
    expect(logger.debug).toHaveBeenCalledWith(
      'Sending CompleteMultipartUpload',
      expect.objectContaining({ method: 'POST', path: '/media/intro.mp4', partCount: 1 })
    );
  });

  it('should honor a per-request region', async () => {
    const { transport, requests } = createTransport(200, RESULT_BODY);
    const client = new MultipartUploadClient({ transport, logger: createLogger() });

    await client.complete({
      Bucket: 'media',
      Key: 'intro.mp4',
      UploadId: 'upload-1',
      '@region': 'ap-south-1',
    });

    expect(requests[0].url).toBe(
      'https://s3.ap-south-1.amazonaws.com/media/intro.mp4?uploadId=upload-1'
    );
    expect(requests[0].body?.byteLength).toBe(0);
  });

  it('should not send a request whose region override is invalid', async () => {
    const { transport } = createTransport(200, RESULT_BODY);
    const logger = createLogger();
    const client = new MultipartUploadClient({ transport, logger });

    await expect(
      client.complete({
        Bucket: 'b',
        Key: 'k',
        UploadId: 'u',
        SSECustomerKey: 'test-key',
        '@region': 'evil.example#',
      })
    ).rejects.toBeInstanceOf(ConfigError);

    expect(transport.send).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      'S3 operation failed',
      expect.objectContaining({ errorName: 'ConfigError' })
    );
  });

  it('should use the configured request payer allow-list', async () => {
    const { transport, requests } = createTransport(200, RESULT_BODY);
    const client = new MultipartUploadClient({
      transport,
      logger: createLogger(),
      config: normalizeConfig({ requestPayerValues: ['requester', 'owner'] }),
    });

    await client.complete({ Bucket: 'b', Key: 'k', UploadId: 'u', RequestPayer: 'owner' });

    expect(requests[0].headers['x-amz-request-payer']).toBe('owner');
  });

  it('should log and rethrow validation failures without sending', async () => {
    const { transport } = createTransport(200, RESULT_BODY);
    const logger = createLogger();
    const client = new MultipartUploadClient({ transport, logger });

    await expect(client.complete({ Key: 'k', UploadId: 'u' })).rejects.toBeInstanceOf(
      ValidationError
    );

    expect(transport.send).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('S3 operation failed', {
      operation: 'CompleteMultipartUpload',
      errorName: 'ValidationError',
      errorMessage: 'Missing required parameter "Bucket": the value cannot be null',
    });
  });

  it('should log and rethrow service errors', async () => {
    const { transport } = createTransport(
      404,
      '<Error><Code>NoSuchUpload</Code><Message>The specified upload does not exist.</Message></Error>'
    );
    const logger = createLogger();
    const client = new MultipartUploadClient({ transport, logger });

    await expect(
      client.complete({ Bucket: 'b', Key: 'k', UploadId: 'gone' })
    ).rejects.toBeInstanceOf(ServiceError);

    expect(logger.error).toHaveBeenCalledWith('S3 operation failed', {
      operation: 'CompleteMultipartUpload',
      errorName: 'ServiceError',
      errorMessage: 'NoSuchUpload: The specified upload does not exist.',
    });
    expect(logger.info).not.toHaveBeenCalled();
  });

  it('should propagate transport failures', async () => {
    const send = vi.fn(async (_request: HttpRequest): Promise<HttpResponse> => {
      throw new Error('socket hang up');
    });
    const client = new MultipartUploadClient({ transport: { send }, logger: createLogger() });

    await expect(client.complete({ Bucket: 'b', Key: 'k', UploadId: 'u' })).rejects.toThrow(
      'socket hang up'
    );
  });
});
