/**
 * HTTP Type Definitions
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { HttpContext } from './context.ts';
import type { RecoveredFailure } from './errors.ts';

/**
 * The inbound side of a request as the dispatcher sees it.
 * node:http's IncomingMessage satisfies this shape.
 */
export interface RequestSource extends AsyncIterable<unknown> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  socket?: { remoteAddress?: string };
}

/**
 * The sink a response is written to.
 * node:http's ServerResponse satisfies this shape.
 */
export interface ResponseSink {
  statusCode: number;
  readonly headersSent: boolean;
  readonly writableEnded: boolean;
  setHeader(name: string, value: number | string | readonly string[]): unknown;
  getHeader(name: string): number | string | string[] | undefined;
  removeHeader(name: string): void;
  write(chunk: string | Uint8Array): boolean;
  end(chunk?: string | Uint8Array): unknown;
}

/**
 * Handles one request and writes one response
 */
export type RequestListener = (req: RequestSource, res: ResponseSink) => Promise<void>;

/**
 * Route handler; writes its response through the context
 */
export type Handler = (ctx: HttpContext) => void | Promise<void>;

/**
 * Handler for requests no route matched
 */
export type NotFoundHandler = (ctx: HttpContext) => void | Promise<void>;

/**
 * Receives every failure the dispatch pipeline catches
 */
export type RecoveryHandler = (ctx: HttpContext, failure: RecoveredFailure) => void | Promise<void>;

/**
 * Looks for a static asset on a failed match.
 * Returns true to continue routing (nothing served), false when it served the request.
 */
export type AssetHandler = (ctx: HttpContext) => boolean | Promise<boolean>;

/**
 * HTTP methods with registration shortcuts
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';

/**
 * Cookie options
 */
export interface CookieOptions {
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}
