/**
 * Tests for path and query encoding
 */

import {
  rawUrlEncode,
  encodeObjectKey,
  buildObjectPath,
  buildCompleteMultipartQuery,
  formatQueryString,
} from '../uri.js';
import { ValidationError } from '../../errors/index.js';

describe('URI encoding', () => {
  describe('rawUrlEncode', () => {
    it('should leave unreserved characters alone', () => {
      expect(rawUrlEncode('AZaz09-_.~')).toBe('AZaz09-_.~');
    });

    it('should encode characters that encodeURIComponent keeps', () => {
      expect(rawUrlEncode("!'()*")).toBe('%21%27%28%29%2A');
    });

    it('should encode spaces, slashes and plus signs', () => {
      expect(rawUrlEncode('a b/c+d')).toBe('a%20b%2Fc%2Bd');
    });

    it('should encode non-ASCII characters as UTF-8', () => {
      expect(rawUrlEncode('ü')).toBe('%C3%BC');
    });

    it('should reject lone surrogates', () => {
      expect(() => rawUrlEncode('\uD800')).toThrow(ValidationError);
    });
  });

  describe('encodeObjectKey', () => {
    it('should keep path separators', () => {
      expect(encodeObjectKey('videos/2024/a b.mp4')).toBe('videos/2024/a%20b.mp4');
    });

    it('should not decode an encoded slash that was part of the key', () => {
      expect(encodeObjectKey('a%2Fb')).toBe('a%252Fb');
    });

    it('should keep leading and repeated slashes', () => {
      expect(encodeObjectKey('/a//b/')).toBe('/a//b/');
    });
  });

  describe('buildObjectPath', () => {
    it('should join bucket and key', () => {
      expect(buildObjectPath('my-bucket', 'dir/file.txt')).toBe('/my-bucket/dir/file.txt');
    });

    it('should keep an empty key', () => {
      expect(buildObjectPath('b', '')).toBe('/b/');
    });

    it('should fail on a missing bucket before a missing key', () => {
      expect(() => buildObjectPath(null, null)).toThrow('"Bucket"');
    });

    it('should fail on a missing key', () => {
      expect(() => buildObjectPath('b', undefined)).toThrow('"Key"');
    });
  });

  describe('buildCompleteMultipartQuery', () => {
    it('should carry only the upload id', () => {
      expect(buildCompleteMultipartQuery('abc')).toEqual({ uploadId: 'abc' });
    });

    it('should fail on a missing upload id', () => {
      expect(() => buildCompleteMultipartQuery(null)).toThrow('"UploadId"');
    });
  });

  describe('formatQueryString', () => {
    it('should encode query values', () => {
      expect(formatQueryString({ uploadId: 'a/b+c' })).toBe('uploadId=a%2Fb%2Bc');
    });

    it('should return an empty string for no parameters', () => {
      expect(formatQueryString({})).toBe('');
    });
  });
});
