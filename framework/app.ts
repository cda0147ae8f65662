/**
 * Application Class
 *
 * The main entry point for building Switchyard applications.
 * Ties the router to the configured servers and the process lifecycle.
 */

import { Config, type ConfigOptions } from './config/config.ts';
import { loadServerConfig, type ServerConfig } from './config/server_config.ts';
import { Server, type ListenAddress } from './http/server.ts';
import type { Handler } from './http/types.ts';
import { applyMiddleware, getMiddlewareRegistry, type MiddlewareRegistry } from './middleware/registry.ts';
import { createAssetHandler } from './router/fallback.ts';
import type { RouteGroup } from './router/group.ts';
import type { AfterHook, BeforeHook } from './router/hooks.ts';
import { Router, type RouterOptions } from './router/router.ts';
import type { RouteOptions } from './router/table.ts';
import { Lifecycle, type LifecycleOptions } from './runtime/lifecycle.ts';
import { getLogger, type Logger } from './telemetry/logger.ts';

export interface ApplicationOptions {
  config?: Config | ConfigOptions;
  router?: Omit<RouterOptions, 'logger'>;
  logger?: Logger;
  lifecycle?: Omit<LifecycleOptions, 'logger'>;
  /** Where server middleware names are looked up (default: the global registry) */
  middleware?: MiddlewareRegistry;
}

export interface ListenOptions {
  /** Serve these instead of reading the server config file */
  servers?: ServerConfig[];
  /** Server config file (default: the config's serverConfigPath) */
  serverConfigPath?: string;
}

/**
 * Main Application class
 */
export class Application {
  readonly router: Router;
  private config: Config;
  private logger: Logger;
  private lifecycle: Lifecycle;
  private registry: MiddlewareRegistry;
  private servers: Server[] = [];

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config instanceof Config ? options.config : new Config(options.config);
    this.logger = options.logger ?? getLogger();
    this.router = new Router({ ...options.router, logger: this.logger });
    this.lifecycle = new Lifecycle({ ...options.lifecycle, logger: this.logger });
    this.registry = options.middleware ?? getMiddlewareRegistry();
  }

  get(path: string, handler: Handler, options?: RouteOptions): this {
    this.router.get(path, handler, options);
    return this;
  }

  post(path: string, handler: Handler, options?: RouteOptions): this {
    this.router.post(path, handler, options);
    return this;
  }

  put(path: string, handler: Handler, options?: RouteOptions): this {
    this.router.put(path, handler, options);
    return this;
  }

  patch(path: string, handler: Handler, options?: RouteOptions): this {
    this.router.patch(path, handler, options);
    return this;
  }

  delete(path: string, handler: Handler, options?: RouteOptions): this {
    this.router.delete(path, handler, options);
    return this;
  }

  /**
   * Derive a route group from the router
   */
  group(prefix: string, callback?: (group: RouteGroup) => void): RouteGroup {
    return this.router.group(prefix, callback);
  }

  /**
   * Add a router-wide before-hook
   */
  useBefore(hook: BeforeHook): this {
    this.router.useBefore(hook);
    return this;
  }

  /**
   * Add a router-wide after-hook
   */
  useAfter(hook: AfterHook): this {
    this.router.useAfter(hook);
    return this;
  }

  getConfig(): Config {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  getLifecycle(): Lifecycle {
    return this.lifecycle;
  }

  /**
   * Start one server per configured entry. Resolves once all are listening.
   */
  async listen(options: ListenOptions = {}): Promise<ListenAddress[]> {
    const configs =
      options.servers ?? (await loadServerConfig(options.serverConfigPath ?? this.config.serverConfigPath));

    this.router.lock();
    this.installAssetHandler(configs);

    await this.lifecycle.emitStart();

    const addresses: ListenAddress[] = [];
    try {
      for (const config of configs) {
        const server = this.createServer(config);
        this.servers.push(server);
        addresses.push(await server.serve());
      }
    } catch (error) {
      await this.stop();
      throw error;
    }

    this.lifecycle.onShutdown(() => this.stop());
    await this.lifecycle.emitReady();

    this.logger.info('Application started', {
      servers: addresses.map(({ hostname, port }) => `${hostname}:${port}`),
      routes: this.router.getRoutes().length,
    });
    return addresses;
  }

  /**
   * Close every server started by listen()
   */
  async stop(): Promise<void> {
    const servers = this.servers;
    this.servers = [];
    await Promise.all(servers.map((server) => server.close()));
    this.logger.info('Application stopped');
  }

  /**
   * Shut down through the lifecycle, running every shutdown hook
   */
  shutdown(reason?: string): Promise<void> {
    return this.lifecycle.shutdown(reason);
  }

  private createServer(config: ServerConfig): Server {
    const name = `${config.domain}:${config.port}`;
    const logger = this.logger.child({ server: name });
    const listener = applyMiddleware(this.router.listener, config, logger, this.registry);

    return new Server(listener, {
      port: config.port,
      hostname: config.domain,
      requestTimeout: config.readTimeout * 1000,
      headersTimeout: config.timeouts.headerTimeout * 1000,
      keepAliveTimeout: config.keepAlive.timeout * 1000,
      idleTimeout: config.timeouts.idleTimeout * 1000,
      keepAlive: config.keepAlive.enabled,
      maxHeaderSize: config.maxHeaderBytes,
      logger,
    });
  }

  /**
   * Serve static files from the first server that names a directory,
   * unless an asset handler was installed already
   */
  private installAssetHandler(configs: readonly ServerConfig[]): void {
    if (this.router.hasAssetHandler) return;
    const withStatic = configs.find((config) => config.staticFiles.staticDir !== '');
    if (!withStatic) return;

    this.router.setAssetHandler(
      createAssetHandler({
        root: withStatic.staticFiles.staticDir,
        indexFile: withStatic.staticFiles.indexFile,
      })
    );
  }
}

/**
 * Create a new application instance
 */
export function createApp(options?: ApplicationOptions): Application {
  return new Application(options);
}
