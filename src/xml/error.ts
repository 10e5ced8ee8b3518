/**
 * XML parsing for S3 error responses
 * @module s3-complete-multipart/xml/error
 */

import { SerializationError } from '../errors/categories.js';
import { isXmlNode, parseXml, readText } from './parser.js';

/**
 * Parsed error information from an S3 response
 */
export interface ParsedError {
  /**
   * Error code (e.g., 'NoSuchUpload', 'InvalidPart')
   */
  readonly code: string;

  readonly message: string;

  readonly requestId?: string;

  /**
   * Resource that caused the error
   */
  readonly resource?: string;

  readonly hostId?: string;
}

/**
 * Checks if an XML string is an S3 error document
 *
 * CompleteMultipartUpload may answer 200 OK and still carry an `<Error>`
 * body, so callers check the body as well as the status.
 *
 * @example
 * ```typescript
 * isErrorResponse('<Error><Code>InternalError</Code><Message>x</Message></Error>'); // true
 * isErrorResponse('<CompleteMultipartUploadResult>...</CompleteMultipartUploadResult>'); // false
 * ```
 */
export function isErrorResponse(xml: string): boolean {
  if (!xml.includes('<Error>')) {
    return false;
  }

  try {
    const parsed = parseXml(xml);
    return isXmlNode(parsed) && isXmlNode(parsed.Error) && readText(parsed.Error, 'Code') !== undefined;
  } catch (error) {
    if (error instanceof SerializationError) {
      return false;
    }
    throw error;
  }
}

/**
 * Parses an S3 `<Error>` document
 *
 * @throws {SerializationError} If the XML is malformed or has no Code
 */
export function parseErrorResponse(xml: string): ParsedError {
  const parsed = parseXml(xml);

  if (!isXmlNode(parsed) || !isXmlNode(parsed.Error)) {
    throw new SerializationError({ message: 'Invalid error response: missing Error element' });
  }

  const error = parsed.Error;
  const code = readText(error, 'Code');

  if (!code) {
    throw new SerializationError({ message: 'Invalid error response: missing Code element' });
  }

  return {
    code,
    message: readText(error, 'Message') ?? code,
    requestId: readText(error, 'RequestId'),
    resource: readText(error, 'Resource'),
    hostId: readText(error, 'HostId'),
  };
}
