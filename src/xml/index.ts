/**
 * XML parsing and building utilities
 *
 * @module s3-complete-multipart/xml
 */

// Core utilities
export {
  XML_DECLARATION,
  createXmlParser,
  createXmlBuilder,
  escapeXmlText,
  parseXml,
  buildXml,
  isXmlNode,
  readText,
  normalizeArray,
  cleanETag,
} from './parser.js';

// Error parsing
export { parseErrorResponse, isErrorResponse, type ParsedError } from './error.js';

// Multipart upload parsing
export { parseCompleteMultipartResult, type CompleteMultipartResult } from './multipart.js';

// XML builders
export {
  S3_XMLNS,
  buildCompleteMultipartXml,
  serializeCompleteMultipartBody,
} from './builders.js';
