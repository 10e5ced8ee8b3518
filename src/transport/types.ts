/**
 * HTTP transport type definitions
 * @module s3-complete-multipart/transport/types
 */

/**
 * HTTP request handed to the transport
 */
export interface HttpRequest {
  /** HTTP method */
  method: string;
  /** Full URL including protocol, host, path, and query string */
  url: string;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Request body (optional) */
  body?: Uint8Array;
}

/**
 * HTTP response with buffered body
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** HTTP headers */
  headers: Record<string, string>;
  /** Response body as buffer */
  body: Uint8Array;
}

/**
 * HTTP transport interface.
 *
 * Signing, retries and connection handling belong to implementations.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Helper to get header value (case-insensitive)
 */
export function getHeader(
  headers: Record<string, string>,
  name: string
): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Helper to extract request ID from response headers
 */
export function getRequestId(headers: Record<string, string>): string | undefined {
  return getHeader(headers, 'x-amz-request-id');
}
