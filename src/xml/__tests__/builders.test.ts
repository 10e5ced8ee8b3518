/**
 * Tests for request body builders
 */

import {
  S3_XMLNS,
  buildCompleteMultipartXml,
  serializeCompleteMultipartBody,
} from '../builders.js';
import { SerializationError } from '../../errors/index.js';
import type { CompletedPart } from '../../types/index.js';

describe('XML builders', () => {
  describe('buildCompleteMultipartXml', () => {
    it('should write the declaration and namespaced root', () => {
      const xml = buildCompleteMultipartXml({ Parts: [{ PartNumber: 5, ETag: 'e5' }] });

      expect(xml).toBe(
        '<?xml version="1.0" encoding="UTF-8"?>\n' +
          `<CompleteMultipartUpload xmlns="${S3_XMLNS}">` +
          '<Part><PartNumber>5</PartNumber><ETag>e5</ETag></Part>' +
          '</CompleteMultipartUpload>'
      );
    });

    it('should write an empty root for an empty parts list', () => {
      const xml = buildCompleteMultipartXml({ Parts: [] });

      expect(xml).toBe(
        '<?xml version="1.0" encoding="UTF-8"?>\n' +
          `<CompleteMultipartUpload xmlns="${S3_XMLNS}"></CompleteMultipartUpload>`
      );
    });

    it('should write an empty root when parts are unset', () => {
      expect(buildCompleteMultipartXml({})).toBe(buildCompleteMultipartXml({ Parts: [] }));
    });
  });

  describe('serializeCompleteMultipartBody', () => {
    it('should return an empty body for an absent upload', () => {
      expect(serializeCompleteMultipartBody(undefined).byteLength).toBe(0);
      expect(serializeCompleteMultipartBody(null).byteLength).toBe(0);
    });

    it('should return the UTF-8 bytes of the document', () => {
      const upload = { Parts: [{ PartNumber: 1, ETag: 'x' }] };

      expect(new TextDecoder().decode(serializeCompleteMultipartBody(upload))).toBe(
        buildCompleteMultipartXml(upload)
      );
    });

    it('should reject a non-integer part number', () => {
      const parts: CompletedPart[] = [{ PartNumber: 1.5, ETag: 'x' }];

      expect(() => serializeCompleteMultipartBody({ Parts: parts })).toThrow(SerializationError);
    });

    it('should reject a part without an ETag', () => {
      const parsed: unknown = JSON.parse('{"Parts":[{"PartNumber":1}]}');
      const parts: CompletedPart[] = [];
      if (typeof parsed === 'object' && parsed !== null && 'Parts' in parsed && Array.isArray(parsed.Parts)) {
        parts.push(...parsed.Parts);
      }

      expect(() => serializeCompleteMultipartBody({ Parts: parts })).toThrow(
        'Part 1 has no ETag'
      );
    });

    it('should reject an ETag with a lone surrogate', () => {
      const upload = { Parts: [{ PartNumber: 2, ETag: 'a\uD800b' }] };

      expect(() => serializeCompleteMultipartBody(upload)).toThrow(SerializationError);
      expect(() => serializeCompleteMultipartBody(upload)).toThrow(
        'Part 2 has an ETag that is not well-formed UTF-16'
      );
    });

    it('should reject an ETag with a character XML cannot carry', () => {
      const upload = { Parts: [{ PartNumber: 3, ETag: 'a\u0001b' }] };

      expect(() => serializeCompleteMultipartBody(upload)).toThrow(SerializationError);
      expect(() => buildCompleteMultipartXml(upload)).toThrow(
        'Part 3 has an ETag with a character not allowed in XML'
      );
    });

    it('should accept surrogate pairs and tabs', () => {
      const upload = { Parts: [{ PartNumber: 1, ETag: 'a😀\tb' }] };

      expect(new TextDecoder().decode(serializeCompleteMultipartBody(upload))).toContain(
        '<ETag>a😀\tb</ETag>'
      );
    });
  });
});
