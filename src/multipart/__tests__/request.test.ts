/**
 * Tests for the immutable request parameters
 */

import { CompleteMultipartUploadRequest } from '../request.js';

describe('CompleteMultipartUploadRequest', () => {
  it('should expose the given fields', () => {
    const request = CompleteMultipartUploadRequest.create({
      Bucket: 'media',
      Key: 'intro.mp4',
      UploadId: 'upload-1',
      '@region': 'eu-west-1',
    });

    expect(request.bucket).toBe('media');
    expect(request.key).toBe('intro.mp4');
    expect(request.uploadId).toBe('upload-1');
    expect(request.region).toBe('eu-west-1');
    expect(request.multipartUpload).toBeUndefined();
  });

  it('should return an existing request unchanged from create', () => {
    const request = CompleteMultipartUploadRequest.create({ Bucket: 'media' });

    expect(CompleteMultipartUploadRequest.create(request)).toBe(request);
  });

  it('should create an empty request without arguments', () => {
    expect(CompleteMultipartUploadRequest.create().input).toEqual({ MultipartUpload: undefined });
  });

  it('should return a new request from with() and leave the original alone', () => {
    const original = CompleteMultipartUploadRequest.create({ Bucket: 'media', Key: 'a' });
    const updated = original.with('Key', 'b');

    expect(updated).not.toBe(original);
    expect(updated.key).toBe('b');
    expect(original.key).toBe('a');
    expect(updated.bucket).toBe('media');
  });

  it('should unset a field when given null', () => {
    const request = CompleteMultipartUploadRequest.create({ Bucket: 'media' }).with('Bucket', null);

    expect(request.bucket).toBeUndefined();
  });

  it('should not be affected by later changes to the caller parts array', () => {
    const parts = [{ PartNumber: 1, ETag: 'a' }];
    const request = CompleteMultipartUploadRequest.create({ MultipartUpload: { Parts: parts } });

    parts.push({ PartNumber: 2, ETag: 'b' });

    expect(request.multipartUpload?.Parts).toEqual([{ PartNumber: 1, ETag: 'a' }]);
  });

  it('should freeze its input', () => {
    const request = CompleteMultipartUploadRequest.create({
      Bucket: 'media',
      MultipartUpload: { Parts: [{ PartNumber: 1, ETag: 'a' }] },
    });

    expect(Object.isFrozen(request.input)).toBe(true);
    expect(Object.isFrozen(request.multipartUpload?.Parts)).toBe(true);
  });
});
