/**
 * Application Routes
 *
 * Defines all application routes and handlers.
 */

import type { Application } from '../../framework/mod.ts';
import { registerApiRoutes, type ApiOptions } from './api.ts';
import { registerHomeRoutes } from './home.ts';

/**
 * Register all application routes
 */
export function registerRoutes(app: Application, options: ApiOptions = {}): void {
  registerHomeRoutes(app);
  registerApiRoutes(app, options);

  app.useAfter((ctx) => {
    if (ctx.response.statusCode >= 500) {
      app.getLogger().warn('Request ended with a server error', {
        method: ctx.method,
        path: ctx.path,
        status: ctx.response.statusCode,
      });
    }
  });
}
