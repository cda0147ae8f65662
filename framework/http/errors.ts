/**
 * Framework Errors
 *
 * Registration errors are thrown synchronously while routes are declared
 * and are meant to stop startup. Request-time failures never surface as
 * these types; they are wrapped into a RecoveredFailure by the dispatcher.
 */

/**
 * Business error codes written into the JSON envelope by HttpResponse.failure()
 */
export enum ErrorCode {
  AuthError = 1000,
  ParamError = 1001,
  BizError = 1002,
  NetError = 1003,
  DBError = 1004,
  IOError = 1005,
  OtherError = 1006,
}

/**
 * Name of an error code, or 'Unknown' for values outside the enum
 */
export function errorCodeName(code: number): string {
  const name = ErrorCode[code];
  return typeof name === 'string' ? name : 'Unknown';
}

/**
 * A method+path (or route name) was registered twice
 */
export class RouteConflictError extends Error {
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string, message?: string) {
    super(message ?? `Route '${path}' with method '${method}' is already registered`);
    this.name = 'RouteConflictError';
    this.method = method;
    this.path = path;
  }
}

/**
 * A path segment or method could not be turned into a trie node
 */
export class InvalidRoutePatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid route pattern '${pattern}': ${reason}`, options);
    this.name = 'InvalidRoutePatternError';
    this.pattern = pattern;
  }
}

/**
 * Routes were added after the router started serving
 */
export class RouterLockedError extends Error {
  constructor(method: string, path: string) {
    super(`Cannot register ${method} ${path}: router is locked once serving has started`);
    this.name = 'RouterLockedError';
  }
}

/**
 * A request body exceeded the size a parser accepts
 */
export class PayloadTooLargeError extends Error {
  readonly status = 413;
  readonly limit: number;

  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
    this.limit = limit;
  }
}

/**
 * Configuration could not be read or failed validation
 */
export class ConfigError extends Error {
  readonly key?: string;

  constructor(message: string, key?: string, options?: { cause?: unknown }) {
    super(key ? `${message} (at '${key}')` : message, options);
    this.name = 'ConfigError';
    this.key = key;
  }
}

export type DispatchStage = 'before-hook' | 'handler' | 'asset' | 'not-found' | 'after-hook';

/**
 * A value thrown (or rejected) somewhere in the dispatch pipeline,
 * captured once by the top-level guard
 */
export class RecoveredFailure {
  /** The raw thrown value */
  readonly cause: unknown;
  /** The cause as an Error, wrapping non-Error values */
  readonly error: Error;
  readonly stage: DispatchStage;
  readonly method: string;
  readonly path: string;

  constructor(cause: unknown, stage: DispatchStage, method: string, path: string) {
    this.cause = cause;
    this.error = cause instanceof Error ? cause : new Error(String(cause));
    this.stage = stage;
    this.method = method;
    this.path = path;
  }
}
