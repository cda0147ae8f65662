/**
 * Test Helpers
 *
 * In-process stand-ins for node:http requests and responses.
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { RequestSource, ResponseSink } from '../framework/http/types.ts';
import { Logger, type LogEntry, type LogLevel } from '../framework/telemetry/logger.ts';

export interface TestRequestInit {
  method?: string;
  url?: string;
  headers?: IncomingHttpHeaders;
  body?: string;
  remoteAddress?: string;
}

/**
 * A request source yielding the body as one chunk
 */
export function createTestRequest(init: TestRequestInit = {}): RequestSource {
  const body = init.body;
  return {
    method: init.method ?? 'GET',
    url: init.url ?? '/',
    headers: init.headers ?? {},
    socket: { remoteAddress: init.remoteAddress ?? '127.0.0.1' },
    async *[Symbol.asyncIterator]() {
      if (body !== undefined) {
        yield Buffer.from(body, 'utf8');
      }
    },
  };
}

/**
 * A response sink that records what was written
 */
export class MockResponse implements ResponseSink {
  statusCode = 200;
  readonly chunks: Buffer[] = [];
  endCalls = 0;
  private headerMap = new Map<string, number | string | string[]>();
  private ended = false;
  private started = false;

  get headersSent(): boolean {
    return this.started;
  }

  get writableEnded(): boolean {
    return this.ended;
  }

  /** Body written so far, as UTF-8 */
  get body(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  setHeader(name: string, value: number | string | readonly string[]): this {
    if (this.started) {
      throw new Error('Cannot set headers after they are sent');
    }
    this.headerMap.set(name.toLowerCase(), typeof value === 'object' ? [...value] : value);
    return this;
  }

  getHeader(name: string): number | string | string[] | undefined {
    return this.headerMap.get(name.toLowerCase());
  }

  removeHeader(name: string): void {
    this.headerMap.delete(name.toLowerCase());
  }

  /** Header value rendered as a string, for assertions */
  header(name: string): string | undefined {
    const value = this.headerMap.get(name.toLowerCase());
    if (value === undefined) return undefined;
    return Array.isArray(value) ? value.join(', ') : String(value);
  }

  write(chunk: string | Uint8Array): boolean {
    if (this.ended) {
      throw new Error('write after end');
    }
    this.started = true;
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
    return true;
  }

  end(chunk?: string | Uint8Array): this {
    this.endCalls++;
    if (this.ended) return this;
    if (chunk !== undefined) {
      this.write(chunk);
    }
    this.started = true;
    this.ended = true;
    return this;
  }
}

/**
 * A logger that keeps its entries in memory
 */
export function createTestLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}
