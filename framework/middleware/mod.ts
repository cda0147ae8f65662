/**
 * Middleware Layer
 *
 * Listener-level concerns that wrap every request/response cycle, outside
 * the router. Each middleware wraps the next.
 */

export {
  applyMiddleware,
  compose,
  createDefaultRegistry,
  getMiddlewareRegistry,
  MiddlewareRegistry,
  registerMiddleware,
  type ListenerMiddleware,
  type MiddlewareFactory,
} from './registry.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
export { rateLimitMiddleware, RateLimitStore, type RateLimitOptions } from './ratelimit.ts';
export { allowedHostsMiddleware, stripPort } from './hosts.ts';
