/**
 * Request Context
 *
 * One per request. Route parameters live here and nowhere else, so
 * concurrent requests never observe each other's matches.
 */

import { HttpRequest } from './request.ts';
import { HttpResponse } from './response.ts';
import type { RequestSource, ResponseSink } from './types.ts';

export class HttpContext {
  readonly request: HttpRequest;
  readonly response: HttpResponse;
  /** Scratch space for hooks and handlers */
  readonly state = new Map<string, unknown>();

  constructor(req: RequestSource, res: ResponseSink) {
    this.request = new HttpRequest(req);
    this.response = new HttpResponse(res, this.request.path);
  }

  /** Raw request handle */
  get req(): RequestSource {
    return this.request.raw;
  }

  /** Raw response handle */
  get res(): ResponseSink {
    return this.response.raw;
  }

  get method(): string {
    return this.request.method;
  }

  /** Path as received, not decoded */
  get path(): string {
    return this.request.path;
  }

  get params(): Readonly<Record<string, string>> {
    return this.request.params;
  }

  param(name: string): string | undefined {
    return this.request.param(name);
  }

  setParams(params: Record<string, string>): void {
    this.request.setParams(params);
  }
}
