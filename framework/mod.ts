/**
 * Switchyard Framework
 *
 * Trie-based HTTP routing for Node.js: path dispatch with hooks, groups,
 * recovery and fallbacks, plus the servers, configuration and telemetry
 * around it.
 *
 * @module switchyard
 */

// Application
export { Application, createApp, type ApplicationOptions, type ListenOptions } from './app.ts';

// Runtime
export { Lifecycle, type LifecycleHook, type LifecycleOptions } from './runtime/mod.ts';

// HTTP/Server
export {
  Server,
  HttpContext,
  HttpRequest,
  HttpResponse,
  ConfigError,
  ErrorCode,
  errorCodeName,
  InvalidRoutePatternError,
  RecoveredFailure,
  RouteConflictError,
  RouterLockedError,
  type AssetHandler,
  type CookieOptions,
  type DispatchStage,
  type Handler,
  type HttpMethod,
  type ListenAddress,
  type NotFoundHandler,
  type RecoveryHandler,
  type RequestListener,
  type RequestSource,
  type ResponseResult,
  type ResponseSink,
  type ServerOptions,
} from './http/mod.ts';

// Middleware
export {
  applyMiddleware,
  compose,
  createDefaultRegistry,
  getMiddlewareRegistry,
  MiddlewareRegistry,
  registerMiddleware,
  loggingMiddleware,
  rateLimitMiddleware,
  allowedHostsMiddleware,
  type ListenerMiddleware,
  type MiddlewareFactory,
  type LoggingOptions,
  type RateLimitOptions,
} from './middleware/mod.ts';

// Router
export {
  Router,
  RouteGroup,
  HookScope,
  createAssetHandler,
  defaultNotFoundHandler,
  buildUrl,
  type AfterHook,
  type AssetHandlerOptions,
  type BeforeHook,
  type MatchPrecedence,
  type PatternParams,
  type RouteEntry,
  type RouteMatch,
  type RouteOptions,
  type RouterOptions,
} from './router/mod.ts';

// Configuration
export {
  Config,
  getConfig,
  loadConfig,
  loadServerConfig,
  registerServer,
  defaultServerConfig,
  type ConfigOptions,
  type ServerConfig,
} from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  withSpan,
  type LogLevel,
  type LoggerOptions,
} from './telemetry/mod.ts';
