/**
 * XML parsing for the CompleteMultipartUpload response body
 * @module s3-complete-multipart/xml/multipart
 */

import { SerializationError } from '../errors/categories.js';
import { cleanETag, isXmlNode, parseXml, readText } from './parser.js';

/**
 * Fields carried in the CompleteMultipartUploadResult element
 */
export interface CompleteMultipartResult {
  readonly location?: string;
  readonly bucket?: string;
  readonly key?: string;
  readonly eTag?: string;
  readonly checksumCRC32?: string;
  readonly checksumCRC32C?: string;
  readonly checksumSHA1?: string;
  readonly checksumSHA256?: string;
}

/**
 * Parses a CompleteMultipartUploadResult document
 *
 * @example
 * ```typescript
 * const result = parseCompleteMultipartResult(`
 *   <CompleteMultipartUploadResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">
 *     <Location>https://s3.us-east-1.amazonaws.com/my-bucket/large.bin</Location>
 *     <Bucket>my-bucket</Bucket>
 *     <Key>large.bin</Key>
 *     <ETag>"3858f62230ac3c915f300c664312c11f-9"</ETag>
 *   </CompleteMultipartUploadResult>
 * `);
 * result.eTag; // '3858f62230ac3c915f300c664312c11f-9'
 * ```
 *
 * @throws {SerializationError} If the document is malformed
 */
export function parseCompleteMultipartResult(xml: string): CompleteMultipartResult {
  const parsed = parseXml(xml);

  if (!isXmlNode(parsed) || !isXmlNode(parsed.CompleteMultipartUploadResult)) {
    throw new SerializationError({
      message:
        'Invalid CompleteMultipartUpload response: missing CompleteMultipartUploadResult element',
    });
  }

  const result = parsed.CompleteMultipartUploadResult;
  const eTag = readText(result, 'ETag');

  return {
    location: readText(result, 'Location'),
    bucket: readText(result, 'Bucket'),
    key: readText(result, 'Key'),
    eTag: eTag === undefined ? undefined : cleanETag(eTag),
    checksumCRC32: readText(result, 'ChecksumCRC32'),
    checksumCRC32C: readText(result, 'ChecksumCRC32C'),
    checksumSHA1: readText(result, 'ChecksumSHA1'),
    checksumSHA256: readText(result, 'ChecksumSHA256'),
  };
}
