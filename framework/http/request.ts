/**
 * Enhanced Request Object
 *
 * Wraps the raw request source with the accessors handlers and hooks
 * commonly need. The body is read at most once and cached.
 */

import type { IncomingHttpHeaders } from 'node:http';
import { PayloadTooLargeError } from './errors.ts';
import type { RequestSource } from './types.ts';

/** Largest body formData() will parse */
export const MAX_FORM_BYTES = 32 * 1024 * 1024;

/** A file part of a multipart body */
export type UploadedFile = Exclude<ReturnType<FormData['get']>, string | null>;

/**
 * Request wrapper for Switchyard
 */
export class HttpRequest {
  private _source: RequestSource;
  private _url: URL;
  private _params: Record<string, string>;
  private _body: Promise<Buffer> | null = null;
  private _cookies: Map<string, string> | null = null;
  private _formData: Promise<FormData> | null = null;

  constructor(source: RequestSource, params: Record<string, string> = {}) {
    this._source = source;
    this._url = parseTarget(source.url ?? '/');
    this._params = params;
  }

  /**
   * The underlying request source
   */
  get raw(): RequestSource {
    return this._source;
  }

  /**
   * HTTP method, upper-cased
   */
  get method(): string {
    return (this._source.method ?? 'GET').toUpperCase();
  }

  /**
   * Request target as received (path and query)
   */
  get url(): string {
    return this._source.url ?? '/';
  }

  /**
   * URL path (without query string), not decoded
   */
  get path(): string {
    return this._url.pathname;
  }

  /**
   * Query parameters
   */
  get query(): URLSearchParams {
    return this._url.searchParams;
  }

  /**
   * Route parameters extracted from the path
   */
  get params(): Record<string, string> {
    return this._params;
  }

  /**
   * A single route parameter
   */
  param(name: string): string | undefined {
    return Object.hasOwn(this._params, name) ? this._params[name] : undefined;
  }

  /**
   * Request headers
   */
  get headers(): IncomingHttpHeaders {
    return this._source.headers;
  }

  /**
   * Get a specific header value; repeated headers are joined with ', '
   */
  header(name: string): string | null {
    const value = this._source.headers[name.toLowerCase()];
    if (value === undefined) return null;
    return Array.isArray(value) ? value.join(', ') : value;
  }

  /**
   * Host header, as sent
   */
  get host(): string {
    return this.header('Host') ?? '';
  }

  get userAgent(): string {
    return this.header('User-Agent') ?? '';
  }

  /**
   * Declared body length, or -1 when unknown
   */
  get contentLength(): number {
    const value = this.header('Content-Length');
    if (value === null) return -1;
    const length = Number.parseInt(value, 10);
    return Number.isNaN(length) ? -1 : length;
  }

  get contentType(): string | null {
    return this.header('Content-Type');
  }

  /**
   * Client address, preferring proxy headers.
   * X-Real-IP wins; otherwise the last X-Forwarded-For hop; otherwise the socket.
   */
  get ip(): string {
    const realIp = this.header('X-Real-IP');
    if (realIp) return realIp;

    const forwardedFor = this.header('X-Forwarded-For');
    if (forwardedFor) {
      const hops = forwardedFor.split(',');
      return hops[hops.length - 1].trim();
    }

    return this._source.socket?.remoteAddress ?? '';
  }

  /**
   * Get cookies from the request
   */
  get cookies(): Map<string, string> {
    if (this._cookies) return this._cookies;

    const cookies = new Map<string, string>();
    for (const cookie of (this.header('Cookie') ?? '').split(';')) {
      const [name, ...rest] = cookie.split('=');
      if (name.trim()) {
        cookies.set(name.trim(), rest.join('=').trim());
      }
    }

    this._cookies = cookies;
    return cookies;
  }

  /**
   * Get a specific cookie value
   */
  cookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  /**
   * Read the whole body
   */
  buffer(): Promise<Buffer> {
    if (!this._body) {
      this._body = readBody(this._source);
    }
    return this._body;
  }

  /**
   * Read the body as UTF-8 text
   */
  async text(): Promise<string> {
    return (await this.buffer()).toString('utf8');
  }

  /**
   * Parse the body as JSON
   */
  async json<T = unknown>(): Promise<T> {
    const text = await this.text();
    return JSON.parse(text) as T;
  }

  /**
   * Parse an application/x-www-form-urlencoded body.
   * Any other content type yields an empty set.
   */
  async form(): Promise<URLSearchParams> {
    if (!this.hasBodyType('application/x-www-form-urlencoded')) {
      return new URLSearchParams();
    }
    return new URLSearchParams(await this.text());
  }

  /**
   * Parse a urlencoded or multipart/form-data body, files included.
   * Other content types yield an empty set; bodies over MAX_FORM_BYTES are refused.
   */
  formData(): Promise<FormData> {
    if (!this._formData) {
      this._formData = this.parseFormData();
    }
    return this._formData;
  }

  /**
   * Look a value up in route params, then the form body, then the query string
   */
  async field(name: string): Promise<string | undefined> {
    if (Object.hasOwn(this._params, name)) return this._params[name];

    const fromBody = (await this.bodyValues(name)).find((value) => value !== '');
    if (fromBody !== undefined) return fromBody;

    const fromQuery = this.query.get(name);
    return fromQuery !== null && fromQuery !== '' ? fromQuery : undefined;
  }

  /**
   * Every value sent under a name: form body values first, then the query string
   */
  async fields(name: string): Promise<string[]> {
    return [...(await this.bodyValues(name)), ...this.query.getAll(name)];
  }

  /**
   * First uploaded file under a name
   */
  async file(name: string): Promise<UploadedFile | undefined> {
    return (await this.files(name))[0];
  }

  async files(name: string): Promise<UploadedFile[]> {
    const files: UploadedFile[] = [];
    for (const value of (await this.formData()).getAll(name)) {
      if (typeof value !== 'string') files.push(value);
    }
    return files;
  }

  private async bodyValues(name: string): Promise<string[]> {
    const values: string[] = [];
    for (const value of (await this.formData()).getAll(name)) {
      if (typeof value === 'string') values.push(value);
    }
    return values;
  }

  private async parseFormData(): Promise<FormData> {
    const type = this.contentType ?? '';
    if (!this.hasBodyType('multipart/form-data') && !this.hasBodyType('application/x-www-form-urlencoded')) {
      return new FormData();
    }
    if (this.contentLength > MAX_FORM_BYTES) {
      throw new PayloadTooLargeError(MAX_FORM_BYTES);
    }

    const body = await this.buffer();
    if (body.length > MAX_FORM_BYTES) {
      throw new PayloadTooLargeError(MAX_FORM_BYTES);
    }
    // the fetch Request parses both encodings, multipart boundaries included
    return await new Request(this._url, {
      method: 'POST',
      headers: { 'content-type': type },
      body,
    }).formData();
  }

  private hasBodyType(mediaType: string): boolean {
    return (this.contentType ?? '').toLowerCase().startsWith(mediaType);
  }

  /**
   * Replace route parameters (used by the router)
   */
  setParams(params: Record<string, string>): void {
    this._params = params;
  }
}

async function readBody(source: RequestSource): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk, 'utf8'));
    } else if (chunk instanceof Uint8Array) {
      chunks.push(Buffer.from(chunk));
    }
  }
  return Buffer.concat(chunks);
}

/**
 * Parse a request target. Origin-form targets are resolved against a fixed
 * origin so a leading '//' stays part of the path.
 */
function parseTarget(target: string): URL {
  try {
    if (/^https?:\/\//i.test(target)) {
      return new URL(target);
    }
    return new URL(`http://localhost${target.startsWith('/') ? '' : '/'}${target}`);
  } catch {
    return new URL('http://localhost/');
  }
}
