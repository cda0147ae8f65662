/**
 * Logging Middleware
 *
 * One log line per request, written once the response is done.
 */

import type { Logger } from '../telemetry/logger.ts';
import { HttpRequest } from '../http/request.ts';
import type { ListenerMiddleware } from './registry.ts';

export interface LoggingOptions {
  /** Path prefixes that are not logged */
  excludePaths?: string[];
}

const DEFAULT_OPTIONS: Required<LoggingOptions> = {
  excludePaths: [],
};

/**
 * Create logging middleware
 */
export function loggingMiddleware(logger: Logger, options: LoggingOptions = {}): ListenerMiddleware {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return (next) => async (req, res) => {
    const request = new HttpRequest(req);
    if (opts.excludePaths.some((path) => request.path.startsWith(path))) {
      return await next(req, res);
    }

    const startTime = performance.now();
    try {
      await next(req, res);
    } finally {
      const duration = performance.now() - startTime;
      logger.info(`${request.method} ${request.path} ${res.statusCode}`, {
        method: request.method,
        path: request.path,
        status: res.statusCode,
        durationMs: Math.round(duration * 100) / 100,
        ip: request.ip,
      });
    }
  };
}
