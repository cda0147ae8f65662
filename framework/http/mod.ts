/**
 * HTTP/Server Layer
 *
 * Wraps node:http requests and responses in the objects handlers work with.
 *
 * Responsibilities:
 * - Give handlers one context per request
 * - Read bodies, cookies and client addresses consistently
 * - Write text, JSON, files and the result envelope
 * - Enable testability (any object shaped like a request or response works)
 */

export { Server, type ListenAddress, type ServerOptions } from './server.ts';
export { HttpContext } from './context.ts';
export { HttpRequest, MAX_FORM_BYTES, type UploadedFile } from './request.ts';
export { HttpResponse, type ResponseResult } from './response.ts';
export {
  ConfigError,
  ErrorCode,
  errorCodeName,
  InvalidRoutePatternError,
  PayloadTooLargeError,
  RecoveredFailure,
  RouteConflictError,
  RouterLockedError,
  type DispatchStage,
} from './errors.ts';
export type {
  AssetHandler,
  CookieOptions,
  Handler,
  HttpMethod,
  NotFoundHandler,
  RecoveryHandler,
  RequestListener,
  RequestSource,
  ResponseSink,
} from './types.ts';
