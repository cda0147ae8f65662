/**
 * Response Writer
 *
 * Fluent helpers over the response sink. Unlike a builder, every terminal
 * method (json, text, send, ...) writes and ends the response immediately.
 */

import { readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { ErrorCode, errorCodeName } from './errors.ts';
import type { CookieOptions, ResponseSink } from './types.ts';

/**
 * JSON envelope written by success() and failure()
 */
export interface ResponseResult<T = unknown> {
  code: number;
  url: string;
  desc: string;
  data: T;
}

/**
 * Response writer for Switchyard
 */
export class HttpResponse {
  private _sink: ResponseSink;
  private _path: string;

  constructor(sink: ResponseSink, path = '/') {
    this._sink = sink;
    this._path = path;
  }

  /**
   * The underlying response sink
   */
  get raw(): ResponseSink {
    return this._sink;
  }

  get statusCode(): number {
    return this._sink.statusCode;
  }

  get headersSent(): boolean {
    return this._sink.headersSent;
  }

  /**
   * Whether the response has been ended
   */
  get ended(): boolean {
    return this._sink.writableEnded;
  }

  /**
   * Set the response status code
   */
  status(code: number): this {
    this._sink.statusCode = code;
    return this;
  }

  /**
   * Set a response header
   */
  header(name: string, value: string): this {
    this._sink.setHeader(name, value);
    return this;
  }

  /**
   * Set multiple headers
   */
  headers(headers: Record<string, string>): this {
    for (const [name, value] of Object.entries(headers)) {
      this._sink.setHeader(name, value);
    }
    return this;
  }

  /**
   * Set the Content-Type header
   */
  type(contentType: string): this {
    this._sink.setHeader('Content-Type', contentType);
    return this;
  }

  /**
   * Set a cookie
   */
  cookie(name: string, value: string, options: CookieOptions = {}): this {
    const parts = [`${encodeURIComponent(name)}=${encodeURIComponent(value)}`];

    if (options.maxAge !== undefined) {
      parts.push(`Max-Age=${options.maxAge}`);
    }
    if (options.expires) {
      parts.push(`Expires=${options.expires.toUTCString()}`);
    }
    if (options.path) {
      parts.push(`Path=${options.path}`);
    }
    if (options.domain) {
      parts.push(`Domain=${options.domain}`);
    }
    if (options.secure) {
      parts.push('Secure');
    }
    if (options.httpOnly) {
      parts.push('HttpOnly');
    }
    if (options.sameSite) {
      parts.push(`SameSite=${options.sameSite}`);
    }

    const existing = this._sink.getHeader('Set-Cookie');
    const cookies = existing === undefined ? [] : Array.isArray(existing) ? existing : [String(existing)];
    this._sink.setHeader('Set-Cookie', [...cookies, parts.join('; ')]);
    return this;
  }

  /**
   * Clear a cookie
   */
  clearCookie(name: string, options: CookieOptions = {}): this {
    return this.cookie(name, '', {
      ...options,
      maxAge: 0,
      expires: new Date(0),
    });
  }

  /**
   * Send a JSON response
   */
  json(data: unknown): void {
    this.send(JSON.stringify(data), 'application/json; charset=utf-8');
  }

  /**
   * Send an HTML response
   */
  html(content: string): void {
    this.send(content, 'text/html; charset=utf-8');
  }

  /**
   * Send a plain text response
   */
  text(content: string): void {
    this.send(content, 'text/plain; charset=utf-8');
  }

  /**
   * Write a body and end the response.
   * The content type is only set when none was chosen yet.
   */
  send(body: string | Uint8Array, contentType?: string): void {
    if (contentType && this._sink.getHeader('Content-Type') === undefined) {
      this._sink.setHeader('Content-Type', contentType);
    }
    this._sink.setHeader('Content-Length', Buffer.byteLength(body));
    this._sink.end(body);
  }

  /**
   * Write a string with status 200
   */
  writeString(content: string): void {
    this.status(200).send(content);
  }

  /**
   * Send a redirect response
   */
  redirect(url: string, status: 301 | 302 | 303 | 307 | 308 = 302): void {
    this.status(status).header('Location', url);
    this._sink.end();
  }

  /**
   * Send a 204 No Content response
   */
  noContent(): void {
    this.status(204);
    this._sink.end();
  }

  /**
   * Send a plain-text error with the given status.
   * Replaces any content type chosen before the failure.
   */
  error(status: number, message: string): void {
    this._sink.setHeader('Content-Type', 'text/plain; charset=utf-8');
    this._sink.setHeader('X-Content-Type-Options', 'nosniff');
    this.status(status).send(`${message}\n`);
  }

  /**
   * Write the success envelope with HTTP 200
   */
  success<T>(data: T): void {
    const result: ResponseResult<T> = {
      code: 200,
      url: this._path,
      desc: 'OK',
      data,
    };
    this.status(200).json(result);
  }

  /**
   * Write the failure envelope with HTTP 200.
   * Known error codes prefix a string message with the code's name.
   */
  failure(code: ErrorCode | number, message: unknown): void {
    const known = code in ErrorCode;
    const name = known ? errorCodeName(code) : 'Error';
    const result: ResponseResult = {
      code: Number.isInteger(code) ? code : ErrorCode.OtherError,
      url: this._path,
      desc: name,
      data: known && typeof message === 'string' ? `${name}: ${message}` : message,
    };
    this.status(200).json(result);
  }

  /**
   * Send a file from disk, typed by its extension
   */
  async file(path: string): Promise<void> {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new Error(`Not a regular file: ${path}`);
    }

    const contents = await readFile(path);
    const contentType = MIME_TYPES[extname(path).slice(1).toLowerCase()] ?? 'application/octet-stream';
    this._sink.setHeader('Last-Modified', info.mtime.toUTCString());
    this.send(contents, contentType);
  }

  /**
   * End the response if nothing has ended it yet
   */
  finish(): void {
    if (!this._sink.writableEnded) {
      this._sink.end();
    }
  }
}

/**
 * Common MIME types
 */
const MIME_TYPES: Record<string, string> = {
  html: 'text/html; charset=utf-8',
  htm: 'text/html; charset=utf-8',
  css: 'text/css; charset=utf-8',
  js: 'application/javascript; charset=utf-8',
  mjs: 'application/javascript; charset=utf-8',
  json: 'application/json; charset=utf-8',
  xml: 'application/xml; charset=utf-8',
  txt: 'text/plain; charset=utf-8',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  svg: 'image/svg+xml',
  webp: 'image/webp',
  ico: 'image/x-icon',
  woff: 'font/woff',
  woff2: 'font/woff2',
  ttf: 'font/ttf',
  otf: 'font/otf',
  pdf: 'application/pdf',
  zip: 'application/zip',
};
