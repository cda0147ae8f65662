/**
 * Runtime & Process Lifecycle
 *
 * Startup and shutdown hooks, and the signals that trigger shutdown.
 */

export { Lifecycle, type LifecycleErrorHandler, type LifecycleHook, type LifecyclePhase, type LifecycleOptions } from './lifecycle.ts';
