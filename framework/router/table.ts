/**
 * Route Table
 *
 * Registration engine: turns (method, pattern, handler) triples into trie
 * entries and keeps the bookkeeping around them (named routes, lock state).
 */

import { InvalidRoutePatternError, RouteConflictError, RouterLockedError } from '../http/errors.ts';
import type { Handler } from '../http/types.ts';
import type { Logger } from '../telemetry/logger.ts';
import type { HookScope } from './hooks.ts';
import { formatSegment } from './patterns.ts';
import type { PatternParams } from './patterns.ts';
import { RouteTrie } from './trie.ts';
import type { RouteTrieOptions, TrieLookup } from './trie.ts';

export interface RouteOptions {
  /** Name for reverse routing with router.url() */
  name?: string;
  meta?: Record<string, unknown>;
}

/**
 * What a terminal trie node carries
 */
export interface RouteEntry {
  readonly method: string;
  /** Full pattern as registered, group prefix included */
  readonly path: string;
  readonly handler: Handler;
  /** Hook scope of the group the route was registered through */
  readonly scope: HookScope;
  readonly name?: string;
  readonly meta?: Record<string, unknown>;
}

export interface RouteMatch {
  route: RouteEntry;
  params: PatternParams;
  handler: Handler;
}

/**
 * Receives registrations from group views
 */
export interface RouteRegistry {
  register(method: string, path: string, handler: Handler, scope: HookScope, options?: RouteOptions): RouteEntry;
}

const METHOD_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

export class RouteTable implements RouteRegistry {
  private readonly trie: RouteTrie<RouteEntry>;
  private readonly named = new Map<string, RouteEntry>();
  private readonly logger: Logger;
  private locked = false;

  constructor(logger: Logger, options: RouteTrieOptions = {}) {
    this.trie = new RouteTrie<RouteEntry>(options);
    this.logger = logger;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /**
   * Refuse further registrations
   */
  lock(): void {
    this.locked = true;
  }

  register(
    method: string,
    path: string,
    handler: Handler,
    scope: HookScope,
    options: RouteOptions = {}
  ): RouteEntry {
    const verb = method.toUpperCase();
    if (!METHOD_TOKEN.test(verb)) {
      throw new InvalidRoutePatternError(path, `'${method}' is not a valid HTTP method`);
    }
    if (this.locked) {
      throw new RouterLockedError(verb, path);
    }
    if (options.name !== undefined && this.named.has(options.name)) {
      throw new RouteConflictError(verb, path, `Route name '${options.name}' is already registered`);
    }

    const node = this.trie.insert(verb, path, (created, parent) => {
      if (created.segment?.kind !== 'param') return;
      const earlier = parent.paramChildren(verb).find((child) => child !== created);
      if (earlier?.segment) {
        this.logger.warn('Parameter segment is shadowed by an earlier sibling', {
          method: verb,
          path,
          segment: formatSegment(created.segment),
          shadowedBy: formatSegment(earlier.segment),
        });
      }
    });

    const entry: RouteEntry = {
      method: verb,
      path,
      handler,
      scope,
      name: options.name,
      meta: options.meta,
    };

    if (!node.setValue(entry)) {
      throw new RouteConflictError(verb, path);
    }
    if (options.name !== undefined) {
      this.named.set(options.name, entry);
    }

    this.logger.debug('Route registered', { method: verb, path });
    return entry;
  }

  lookup(method: string, path: string): TrieLookup<RouteEntry> {
    return this.trie.lookup(method.toUpperCase(), path);
  }

  byName(name: string): RouteEntry | undefined {
    return this.named.get(name);
  }

  /**
   * Registered routes, depth-first in registration order
   */
  entries(): RouteEntry[] {
    return this.trie.terminals().flatMap((node) => (node.value ? [node.value] : []));
  }

  get precedence(): RouteTrie<RouteEntry>['precedence'] {
    return this.trie.precedence;
  }
}
