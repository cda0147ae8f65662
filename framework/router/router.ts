/**
 * URL Router
 *
 * Trie-backed router. The router is the root route group: it owns the
 * route table, the router-wide hooks and the fallback handlers, and it is
 * the only thing that dispatches requests.
 *
 * Per request:
 *
 *   lookup → global before → group before → handler | fallback → group after → global after
 *
 * all inside one recovery guard.
 */

import { HttpContext } from '../http/context.ts';
import { RecoveredFailure } from '../http/errors.ts';
import type { DispatchStage } from '../http/errors.ts';
import type {
  AssetHandler,
  NotFoundHandler,
  RecoveryHandler,
  RequestListener,
  RequestSource,
  ResponseSink,
} from '../http/types.ts';
import { getLogger, type Logger } from '../telemetry/logger.ts';
import { annotateFailure, annotateRoute, currentSpan } from '../telemetry/otel.ts';
import { defaultNotFoundHandler } from './fallback.ts';
import { RouteGroup } from './group.ts';
import { HookScope, runAfterHooks, runBeforeHooks } from './hooks.ts';
import type { AfterHook, BeforeHook } from './hooks.ts';
import { buildUrl } from './patterns.ts';
import { RouteTable } from './table.ts';
import type { RouteEntry, RouteMatch } from './table.ts';
import type { MatchPrecedence } from './trie.ts';

export interface RouterOptions {
  /** How sibling segments compete (default: 'specificity') */
  precedence?: MatchPrecedence;
  /** Compare static segments case-sensitively (default: false) */
  caseSensitive?: boolean;
  logger?: Logger;
}

const INTERNAL_ERROR = '500 - Internal Server Error';

/**
 * URL Router for Switchyard
 */
export class Router extends RouteGroup {
  private readonly table: RouteTable;
  private readonly logger: Logger;
  private readonly globalBefore: BeforeHook[] = [];
  private readonly globalAfter: AfterHook[] = [];
  private notFoundHandler: NotFoundHandler = defaultNotFoundHandler;
  private recoveryHandler: RecoveryHandler | null = null;
  private assetHandler: AssetHandler | null = null;

  constructor(options: RouterOptions = {}) {
    const logger = (options.logger ?? getLogger()).child({ component: 'router' });
    const table = new RouteTable(logger, {
      precedence: options.precedence,
      caseSensitive: options.caseSensitive,
    });
    super('', table, new HookScope());
    this.table = table;
    this.logger = logger;
  }

  /**
   * Add a router-wide before-hook; it runs ahead of every group hook
   */
  useBefore(hook: BeforeHook): this {
    this.globalBefore.push(hook);
    return this;
  }

  /**
   * Add a router-wide after-hook; it runs after every group hook
   */
  useAfter(hook: AfterHook): this {
    this.globalAfter.push(hook);
    return this;
  }

  setNotFoundHandler(handler: NotFoundHandler): this {
    this.notFoundHandler = handler;
    return this;
  }

  setRecoveryHandler(handler: RecoveryHandler): this {
    this.recoveryHandler = handler;
    return this;
  }

  /**
   * Install the handler tried when no route matches
   */
  setAssetHandler(handler: AssetHandler): this {
    this.assetHandler = handler;
    return this;
  }

  get hasAssetHandler(): boolean {
    return this.assetHandler !== null;
  }

  /**
   * Refuse registrations from now on
   */
  lock(): this {
    this.table.lock();
    return this;
  }

  get locked(): boolean {
    return this.table.isLocked;
  }

  get precedence(): MatchPrecedence {
    return this.table.precedence;
  }

  /**
   * Match a method and path without dispatching
   */
  match(method: string, path: string): RouteMatch | null {
    const result = this.table.lookup(method, path);
    if (result.kind !== 'matched') return null;
    return { route: result.value, params: result.params, handler: result.value.handler };
  }

  /**
   * Generate a URL for a named route
   */
  url(
    name: string,
    params: Record<string, string> = {},
    query?: Record<string, string | string[]>
  ): string | null {
    const route = this.table.byName(name);
    if (!route) return null;
    return buildUrl(route.path, params, query);
  }

  /**
   * Get all registered routes
   */
  getRoutes(): RouteEntry[] {
    return this.table.entries();
  }

  /**
   * The router as a request listener
   */
  get listener(): RequestListener {
    return (req, res) => this.handle(req, res);
  }

  /**
   * Dispatch one request. Never rejects: failures go to the recovery handler.
   */
  async handle(req: RequestSource, res: ResponseSink): Promise<void> {
    const ctx = new HttpContext(req, res);
    let stage: DispatchStage = 'before-hook';

    try {
      const result = this.table.lookup(ctx.method, ctx.path);
      ctx.setParams(result.params);

      const matched = result.kind === 'matched' ? result.value : null;
      if (matched) {
        annotateRoute(matched.method, matched.path);
      }
      const scope = matched ? matched.scope : this.scope;

      if (!(await runBeforeHooks(this.globalBefore, ctx))) return;
      if (!(await runBeforeHooks(scope.resolveBefore(), ctx))) return;

      if (matched) {
        stage = 'handler';
        await matched.handler(ctx);
      } else {
        let continueRouting = true;
        if (result.kind === 'miss' && this.assetHandler) {
          stage = 'asset';
          continueRouting = await this.assetHandler(ctx);
        }
        if (continueRouting) {
          stage = 'not-found';
          await this.notFoundHandler(ctx);
        }
      }

      stage = 'after-hook';
      await runAfterHooks(scope.resolveAfter(), ctx);
      await runAfterHooks(this.globalAfter, ctx);
    } catch (error) {
      await this.recover(ctx, new RecoveredFailure(error, stage, ctx.method, ctx.path));
    } finally {
      ctx.response.finish();
    }
  }

  private async recover(ctx: HttpContext, failure: RecoveredFailure): Promise<void> {
    this.logger.error('Request failed', failure.error, {
      method: failure.method,
      path: failure.path,
      stage: failure.stage,
    });
    annotateFailure(currentSpan(), failure.error, failure.stage);

    if (this.recoveryHandler) {
      try {
        await this.recoveryHandler(ctx, failure);
        return;
      } catch (error) {
        this.logger.error('Recovery handler failed', error, {
          method: failure.method,
          path: failure.path,
        });
      }
    }

    if (!ctx.response.headersSent) {
      ctx.response.error(500, INTERNAL_ERROR);
    }
  }
}
