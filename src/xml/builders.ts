/**
 * XML builders for request bodies
 * @module s3-complete-multipart/xml/builders
 */

import type { CompletedMultipartUpload, CompletedPart, Optional } from '../types/index.js';
import { SerializationError } from '../errors/index.js';
import { buildXml, escapeXmlText, XML_DECLARATION } from './parser.js';

/**
 * Namespace of the S3 2006-03-01 API
 */
export const S3_XMLNS = 'http://s3.amazonaws.com/doc/2006-03-01/';

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Code units outside the XML 1.0 Char production
const NON_XML_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

/**
 * @throws {SerializationError} If the part cannot be written as XML
 */
function assertWritablePart(part: CompletedPart): void {
  if (!Number.isInteger(part.PartNumber)) {
    throw new SerializationError({
      message: `Part number must be an integer, got: ${String(part.PartNumber)}`,
      details: { partNumber: part.PartNumber },
    });
  }
  if (typeof part.ETag !== 'string') {
    throw new SerializationError({
      message: `Part ${part.PartNumber} has no ETag`,
      details: { partNumber: part.PartNumber },
    });
  }
  if (LONE_SURROGATE.test(part.ETag)) {
    throw new SerializationError({
      message: `Part ${part.PartNumber} has an ETag that is not well-formed UTF-16`,
      code: 'InvalidEncoding',
      details: { partNumber: part.PartNumber },
    });
  }
  if (NON_XML_CHAR.test(part.ETag)) {
    throw new SerializationError({
      message: `Part ${part.PartNumber} has an ETag with a character not allowed in XML`,
      code: 'InvalidXmlCharacter',
      details: { partNumber: part.PartNumber },
    });
  }
}

/**
 * Builds the XML document for a CompleteMultipartUpload request
 *
 * Parts keep the order in which they were given. The service checks that
 * order, so the list is never sorted here.
 *
 * @throws {SerializationError} If a part holds a value XML cannot carry
 *
 * @example
 * ```typescript
 * buildCompleteMultipartXml({
 *   Parts: [
 *     { PartNumber: 1, ETag: '"abc123"' },
 *     { PartNumber: 2, ETag: '"def456"' },
 *   ],
 * });
 * // <?xml version="1.0" encoding="UTF-8"?>
 * // <CompleteMultipartUpload xmlns="http://s3.amazonaws.com/doc/2006-03-01/"><Part><PartNumber>1</PartNumber><ETag>"abc123"</ETag></Part>...</CompleteMultipartUpload>
 * ```
 */
export function buildCompleteMultipartXml(upload: CompletedMultipartUpload): string {
  const partElements = (upload.Parts ?? []).map((part) => {
    assertWritablePart(part);
    return {
      PartNumber: String(part.PartNumber),
      ETag: escapeXmlText(part.ETag),
    };
  });

  const completeRequest = {
    CompleteMultipartUpload: {
      '@_xmlns': S3_XMLNS,
      Part: partElements,
    },
  };

  return `${XML_DECLARATION}\n${buildXml(completeRequest)}`;
}

/**
 * Serializes the request body to UTF-8 bytes.
 *
 * An absent upload produces an empty body rather than an empty root element.
 *
 * @throws {SerializationError} If the document cannot be written
 */
export function serializeCompleteMultipartBody(
  upload: Optional<CompletedMultipartUpload>
): Uint8Array {
  if (upload === undefined || upload === null) {
    return new Uint8Array(0);
  }

  return new TextEncoder().encode(buildCompleteMultipartXml(upload));
}
