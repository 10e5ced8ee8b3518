/**
 * Core XML utilities for S3 request bodies and responses
 * @module s3-complete-multipart/xml/parser
 */

import { XMLParser, XMLBuilder } from 'fast-xml-parser';
import { SerializationError } from '../errors/index.js';

/**
 * XML declaration written ahead of every request body
 */
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

/**
 * Parser options for S3 XML responses
 */
const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  processEntities: true,
};

/**
 * Builder options for S3 XML requests.
 *
 * Entity processing is off: text is escaped by {@link escapeXmlText} before it
 * reaches the builder, so that only `&`, `<` and `>` are rewritten.
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  format: false,
  suppressEmptyNode: false,
  processEntities: false,
};

/**
 * Creates a configured XML parser instance
 */
export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Creates a configured XML builder instance
 */
export function createXmlBuilder(): XMLBuilder {
  return new XMLBuilder(BUILDER_OPTIONS);
}

/**
 * Escapes character data for use as element text.
 *
 * @example
 * ```typescript
 * escapeXmlText('a & <b>'); // 'a &amp; &lt;b&gt;'
 * ```
 */
export function escapeXmlText(str: string): string {
  return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Parses an XML string
 *
 * @param xml - XML string to parse
 * @returns Parsed document; narrow it with {@link isXmlNode} and {@link readText}
 * @throws {SerializationError} If the XML is invalid
 */
export function parseXml(xml: string): unknown {
  const parser = createXmlParser();
  try {
    return parser.parse(xml, true);
  } catch (error) {
    throw new SerializationError({
      message: `Failed to parse XML: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }
}

/**
 * Converts an object tree to a compact XML string
 *
 * Text values must already be escaped.
 *
 * @example
 * ```typescript
 * buildXml({ Root: { Value: 'example' } }); // '<Root><Value>example</Value></Root>'
 * ```
 *
 * @throws {SerializationError} If the builder fails
 */
export function buildXml(obj: Record<string, unknown>): string {
  const builder = createXmlBuilder();
  let xml: unknown;
  try {
    xml = builder.build(obj);
  } catch (error) {
    throw new SerializationError({
      message: `Failed to build XML: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }

  if (typeof xml !== 'string') {
    throw new SerializationError({ message: 'XML builder did not produce a string' });
  }
  return xml;
}

/**
 * Checks that a parsed value is an element node
 */
export function isXmlNode(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the text content of a child element
 *
 * @returns The text, or undefined when the element is absent or not a leaf
 */
export function readText(node: Record<string, unknown>, name: string): string | undefined {
  const value = node[name];
  if (typeof value === 'string') {
    return value;
  }
  if (isXmlNode(value)) {
    const text = value['#text'];
    return typeof text === 'string' ? text : undefined;
  }
  return undefined;
}

/**
 * Normalizes array-or-single-item XML parsing behavior
 *
 * @example
 * ```typescript
 * normalizeArray(undefined); // []
 * normalizeArray('single'); // ['single']
 * normalizeArray(['a', 'b']); // ['a', 'b']
 * ```
 */
export function normalizeArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Removes surrounding quotes from ETag values
 *
 * @example
 * ```typescript
 * cleanETag('"abc123"'); // 'abc123'
 * cleanETag('abc123'); // 'abc123'
 * ```
 */
export function cleanETag(eTag: string): string {
  return eTag.replace(/^"(.+)"$/, '$1');
}
