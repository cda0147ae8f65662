/**
 * Listener Middleware Registry
 *
 * Server-level middleware wraps the whole request listener, outside the
 * router. Servers name the middleware they want in their config entry;
 * the registry turns those names into wrappers.
 */

import type { ServerConfig } from '../config/server_config.ts';
import type { RequestListener } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';
import { allowedHostsMiddleware } from './hosts.ts';
import { loggingMiddleware } from './logging.ts';
import { rateLimitMiddleware } from './ratelimit.ts';

/**
 * Wraps a listener in another listener
 */
export type ListenerMiddleware = (next: RequestListener) => RequestListener;

/**
 * Builds a middleware for one server
 */
export type MiddlewareFactory = (config: ServerConfig, logger: Logger) => ListenerMiddleware;

/**
 * Wrap a listener, first middleware outermost
 */
export function compose(listener: RequestListener, middleware: readonly ListenerMiddleware[]): RequestListener {
  return middleware.reduceRight<RequestListener>((next, wrap) => wrap(next), listener);
}

/**
 * Named middleware factories
 */
export class MiddlewareRegistry {
  private factories = new Map<string, MiddlewareFactory>();

  register(name: string, factory: MiddlewareFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()];
  }

  /**
   * Instantiate the named middleware, skipping unknown names with a warning
   */
  build(names: readonly string[], config: ServerConfig, logger: Logger): ListenerMiddleware[] {
    const built: ListenerMiddleware[] = [];
    for (const name of names) {
      const factory = this.factories.get(name);
      if (!factory) {
        logger.warn('Unknown middleware skipped', { middleware: name, server: `${config.domain}:${config.port}` });
        continue;
      }
      built.push(factory(config, logger));
    }
    return built;
  }
}

/**
 * A registry holding the built-in middleware
 */
export function createDefaultRegistry(): MiddlewareRegistry {
  return new MiddlewareRegistry()
    .register('logging', (_config, logger) => loggingMiddleware(logger.child({ component: 'access' })))
    .register('rateLimiting', (config) =>
      rateLimitMiddleware({ max: config.rateLimit.requestsPerSecond, windowMs: 1000 })
    );
}

const defaultRegistry = createDefaultRegistry();

/**
 * Add a named middleware to the default registry
 */
export function registerMiddleware(name: string, factory: MiddlewareFactory): void {
  defaultRegistry.register(name, factory);
}

export function getMiddlewareRegistry(): MiddlewareRegistry {
  return defaultRegistry;
}

/**
 * Wrap a listener in a server's configured middleware.
 * The allowed-hosts check, when configured, sits outside everything else.
 */
export function applyMiddleware(
  listener: RequestListener,
  config: ServerConfig,
  logger: Logger,
  registry: MiddlewareRegistry = defaultRegistry
): RequestListener {
  const middleware = registry.build(config.middleware, config, logger);
  if (config.security.allowedHosts.length > 0) {
    middleware.unshift(allowedHostsMiddleware(config.security.allowedHosts));
  }
  return compose(listener, middleware);
}
