/**
 * Route Group
 *
 * Groups routes under a shared prefix and hook scope. A group is only a
 * registration view: every group writes into the same route table.
 */

import type { Handler, HttpMethod } from '../http/types.ts';
import type { AfterHook, BeforeHook, HookScope } from './hooks.ts';
import { joinPaths } from './patterns.ts';
import type { RouteOptions, RouteRegistry } from './table.ts';

/**
 * Route group for organizing related routes
 */
export class RouteGroup {
  protected readonly registry: RouteRegistry;
  readonly prefix: string;
  readonly scope: HookScope;

  constructor(prefix: string, registry: RouteRegistry, scope: HookScope) {
    this.prefix = prefix;
    this.registry = registry;
    this.scope = scope;
  }

  /**
   * Add a before-hook to this group; returning false aborts the request
   */
  before(hook: BeforeHook): this {
    this.scope.addBefore(hook);
    return this;
  }

  /**
   * Add an after-hook to this group
   */
  after(hook: AfterHook): this {
    this.scope.addAfter(hook);
    return this;
  }

  get(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('GET', path, handler, options);
  }

  post(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('POST', path, handler, options);
  }

  put(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('PUT', path, handler, options);
  }

  patch(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('PATCH', path, handler, options);
  }

  delete(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('DELETE', path, handler, options);
  }

  head(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('HEAD', path, handler, options);
  }

  options(path: string, handler: Handler, options?: RouteOptions): this {
    return this.addRoute('OPTIONS', path, handler, options);
  }

  /**
   * Register a route with an explicit method
   */
  addRoute(method: HttpMethod | string, path: string, handler: Handler, options: RouteOptions = {}): this {
    this.registry.register(method, joinPaths(this.prefix, path), handler, this.scope, options);
    return this;
  }

  /**
   * Derive a nested group. It inherits the hooks this group has right now;
   * hooks added here later are not seen by the nested group.
   */
  group(prefix: string, callback?: (group: RouteGroup) => void): RouteGroup {
    const nested = new RouteGroup(joinPaths(this.prefix, prefix), this.registry, this.scope.derive());
    callback?.(nested);
    return nested;
  }
}
