/**
 * Hook Scopes
 *
 * Before/after hooks at group scope. Scopes form a tree mirroring the
 * group hierarchy; a scope inherits the hooks its parent had when the
 * scope was derived, and nothing added to the parent later.
 */

import type { HttpContext } from '../http/context.ts';

/**
 * Runs before the handler; returning false aborts the request
 */
export type BeforeHook = (ctx: HttpContext) => boolean | Promise<boolean>;

/**
 * Runs after the handler
 */
export type AfterHook = (ctx: HttpContext) => void | Promise<void>;

/**
 * Hook lists of one group, resolved against its ancestors at dispatch time
 */
export class HookScope {
  readonly parent: HookScope | undefined;

  private readonly beforeHooks: BeforeHook[] = [];
  private readonly afterHooks: AfterHook[] = [];
  // Parent list lengths when this scope was derived
  private readonly inheritedBefore: number;
  private readonly inheritedAfter: number;

  constructor(parent?: HookScope) {
    this.parent = parent;
    this.inheritedBefore = parent ? parent.beforeHooks.length : 0;
    this.inheritedAfter = parent ? parent.afterHooks.length : 0;
  }

  addBefore(hook: BeforeHook): void {
    this.beforeHooks.push(hook);
  }

  addAfter(hook: AfterHook): void {
    this.afterHooks.push(hook);
  }

  /**
   * Derive a child scope that snapshots this scope's current hooks
   */
  derive(): HookScope {
    return new HookScope(this);
  }

  /**
   * Effective before-hooks: inherited snapshot first, then this scope's own
   */
  resolveBefore(): BeforeHook[] {
    return this.collect((scope) => scope.beforeHooks, (scope) => scope.inheritedBefore);
  }

  /**
   * Effective after-hooks: inherited snapshot first, then this scope's own
   */
  resolveAfter(): AfterHook[] {
    return this.collect((scope) => scope.afterHooks, (scope) => scope.inheritedAfter);
  }

  private collect<H>(list: (scope: HookScope) => H[], inherited: (scope: HookScope) => number): H[] {
    const chain: H[][] = [];
    let limit = list(this).length;

    for (let scope: HookScope | undefined = this; scope; scope = scope.parent) {
      chain.push(list(scope).slice(0, limit));
      limit = inherited(scope);
    }

    return chain.reverse().flat();
  }
}

/**
 * Run before-hooks in order, stopping at the first that returns false
 */
export async function runBeforeHooks(hooks: readonly BeforeHook[], ctx: HttpContext): Promise<boolean> {
  for (const hook of hooks) {
    if (!(await hook(ctx))) {
      return false;
    }
  }
  return true;
}

/**
 * Run after-hooks in order
 */
export async function runAfterHooks(hooks: readonly AfterHook[], ctx: HttpContext): Promise<void> {
  for (const hook of hooks) {
    await hook(ctx);
  }
}
