/**
 * Client
 * @module s3-complete-multipart/client
 */

export { MultipartUploadClient, type MultipartUploadClientOptions } from './client.js';
