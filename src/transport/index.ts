/**
 * HTTP transport abstraction
 * @module s3-complete-multipart/transport
 */

export {
  getHeader,
  getRequestId,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './types.js';
