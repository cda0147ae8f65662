/**
 * Routing Layer
 *
 * Maps incoming request paths to application code through a prefix tree
 * of path segments.
 *
 * Responsibilities:
 * - Register static, parameter and regex-constrained segments per method
 * - Match request paths and bind parameters
 * - Run global and group hooks around handlers
 * - Recover from failures and fall back to assets and not-found
 * - Generate URLs for named routes
 */

export { Router, type RouterOptions } from './router.ts';
export { RouteGroup } from './group.ts';
export { RouteTable, type RouteEntry, type RouteMatch, type RouteOptions, type RouteRegistry } from './table.ts';
export { RouteTrie, TrieNode, type MatchPrecedence, type RouteTrieOptions, type TrieLookup } from './trie.ts';
export { HookScope, runAfterHooks, runBeforeHooks, type AfterHook, type BeforeHook } from './hooks.ts';
export {
  createAssetHandler,
  defaultNotFoundHandler,
  resolveAssetPath,
  type AssetHandlerOptions,
} from './fallback.ts';
export {
  buildUrl,
  joinPaths,
  parsePathParams,
  parseSegment,
  splitPath,
  type PatternParams,
  type Segment,
  type SegmentKind,
} from './patterns.ts';
