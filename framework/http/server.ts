/**
 * HTTP Server
 *
 * Wraps node:http around a request listener. Every request runs inside a
 * SERVER span; the listener is expected to write the response.
 */

import { createServer, type IncomingMessage, type Server as NodeServer, type ServerResponse } from 'node:http';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { annotateFailure, SpanKind, withSpan } from '../telemetry/otel.ts';
import { HttpRequest } from './request.ts';
import { HttpResponse } from './response.ts';
import type { RequestListener } from './types.ts';

export interface ServerOptions {
  port?: number;
  hostname?: string;
  /** Milliseconds to receive a whole request (0 disables) */
  requestTimeout?: number;
  /** Milliseconds to receive the request headers */
  headersTimeout?: number;
  /** Milliseconds an idle keep-alive connection stays open */
  keepAliveTimeout?: number;
  /** Milliseconds of socket inactivity before it is closed (0 disables) */
  idleTimeout?: number;
  /** Reuse connections between requests (default: true) */
  keepAlive?: boolean;
  maxHeaderSize?: number;
  onListen?: (address: ListenAddress) => void;
  logger?: Logger;
}

export interface ListenAddress {
  hostname: string;
  port: number;
}

/**
 * HTTP Server for Switchyard applications
 */
export class Server {
  private listener: RequestListener;
  private options: ServerOptions;
  private logger: Logger;
  private server: NodeServer;

  constructor(listener: RequestListener, options: ServerOptions = {}) {
    this.listener = listener;
    this.options = {
      ...options,
      port: options.port ?? 8000,
      hostname: options.hostname ?? '0.0.0.0',
      keepAlive: options.keepAlive ?? true,
    };
    this.logger = (options.logger ?? getLogger()).child({ component: 'server' });
    this.server = this.createNodeServer();
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /**
   * Bound address, once listening
   */
  get address(): ListenAddress | null {
    const address = this.server.address();
    if (address === null || typeof address === 'string') return null;
    return { hostname: address.address, port: address.port };
  }

  /**
   * Start listening; resolves once the port is bound
   */
  serve(): Promise<ListenAddress> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once('error', onError);
      this.server.listen(this.options.port, this.options.hostname, () => {
        this.server.off('error', onError);
        this.server.on('error', (error) => this.logger.error('Server error', error));

        const address = this.address ?? { hostname: this.options.hostname ?? '', port: this.options.port ?? 0 };
        this.logger.info(`Listening on http://${address.hostname}:${address.port}`);
        this.options.onListen?.(address);
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  close(): Promise<void> {
    if (!this.server.listening) return Promise.resolve();

    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        this.logger.info('Server closed');
        resolve();
      });
      this.server.closeIdleConnections();
    });
  }

  private createNodeServer(): NodeServer {
    const server = createServer(
      {
        keepAlive: this.options.keepAlive,
        maxHeaderSize: this.options.maxHeaderSize,
      },
      (req, res) => {
        this.dispatch(req, res).catch((error: unknown) => {
          this.logger.error('Response could not be completed', error);
        });
      }
    );

    if (this.options.requestTimeout !== undefined) {
      server.requestTimeout = this.options.requestTimeout;
    }
    if (this.options.headersTimeout !== undefined && this.options.headersTimeout > 0) {
      server.headersTimeout = this.options.headersTimeout;
    }
    if (this.options.keepAliveTimeout !== undefined) {
      server.keepAliveTimeout = this.options.keepAliveTimeout;
    }
    if (this.options.idleTimeout !== undefined) {
      server.timeout = this.options.idleTimeout;
    }

    return server;
  }

  /**
   * Run the listener for one request inside a span
   */
  private async dispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = (req.method ?? 'GET').toUpperCase();
    if (!this.options.keepAlive) {
      res.setHeader('Connection', 'close');
    }

    await withSpan(
      `HTTP ${method}`,
      async (span) => {
        try {
          await this.listener(req, res);
        } catch (error) {
          this.logger.error('Request listener failed', error, { method, url: req.url });
          annotateFailure(span, error instanceof Error ? error : new Error(String(error)));

          const response = new HttpResponse(res, new HttpRequest(req).path);
          if (!response.headersSent) {
            response.error(500, '500 - Internal Server Error');
          }
        } finally {
          if (!res.writableEnded) res.end();
          span.setAttribute('http.response.status_code', res.statusCode);
        }
      },
      {
        kind: SpanKind.SERVER,
        attributes: {
          'http.request.method': method,
          'url.path': new HttpRequest(req).path,
        },
      }
    );
  }
}
