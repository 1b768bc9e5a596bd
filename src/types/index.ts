/**
 * Request and response data model.
 * @module
 */
export {
  type Header,
  type HeaderOptions,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type MimeType,
  MimeTypes,
} from './request.js';
export { Status, type StatusRange, Statuses } from './status.js';
