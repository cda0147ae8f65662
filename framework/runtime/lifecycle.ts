/**
 * Process Lifecycle
 *
 * Start, ready and shutdown phases of an application. SIGINT and SIGTERM
 * trigger shutdown; a shutdown that overruns its budget exits the process.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';

export type LifecycleHook = () => Promise<void> | void;

export type LifecyclePhase = 'start' | 'ready' | 'shutdown';

export type LifecycleErrorHandler = (error: Error) => void;

export interface LifecycleOptions {
  /** Milliseconds shutdown hooks may take before exit(1) (default: 5000) */
  shutdownTimeout?: number;
  /** Install SIGINT/SIGTERM listeners (default: true) */
  handleSignals?: boolean;
  /** Exit used when shutdown overruns (default: process.exit) */
  exit?: (code: number) => void;
  logger?: Logger;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export class Lifecycle {
  private readonly hooks: Record<LifecyclePhase, LifecycleHook[]> = { start: [], ready: [], shutdown: [] };
  private readonly errorHandlers: LifecycleErrorHandler[] = [];
  private readonly controller = new AbortController();
  private readonly signalListeners = new Map<NodeJS.Signals, () => void>();
  private readonly shutdownTimeout: number;
  private readonly exit: (code: number) => void;
  private readonly logger: Logger;
  private stopping: Promise<void> | null = null;

  constructor(options: LifecycleOptions = {}) {
    this.shutdownTimeout = options.shutdownTimeout ?? 5000;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.logger = (options.logger ?? getLogger()).child({ component: 'lifecycle' });
    if (options.handleSignals ?? true) {
      this.listenForSignals();
    }
  }

  /** Aborted as soon as shutdown begins */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.stopping !== null;
  }

  on(phase: LifecyclePhase, hook: LifecycleHook): void {
    this.hooks[phase].push(hook);
  }

  onStart(hook: LifecycleHook): void {
    this.on('start', hook);
  }

  onReady(hook: LifecycleHook): void {
    this.on('ready', hook);
  }

  /**
   * Shutdown hooks run in reverse registration order, so whatever started
   * last is torn down first
   */
  onShutdown(hook: LifecycleHook): void {
    this.on('shutdown', hook);
  }

  onError(handler: LifecycleErrorHandler): void {
    this.errorHandlers.push(handler);
  }

  emitStart(): Promise<void> {
    return runInOrder(this.hooks.start);
  }

  emitReady(): Promise<void> {
    return runInOrder(this.hooks.ready);
  }

  /**
   * Begin shutdown. Every call returns the same promise, which never rejects.
   */
  shutdown(reason?: string): Promise<void> {
    if (this.stopping === null) {
      this.stopping = this.stop(reason);
    }
    return this.stopping;
  }

  /**
   * Pass an error to the registered handlers, or log it when there are none
   */
  handleError(error: Error): void {
    if (this.errorHandlers.length === 0) {
      this.logger.error('Unhandled lifecycle error', error);
      return;
    }
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }

  stopSignalHandlers(): void {
    for (const [signal, listener] of this.signalListeners) {
      process.off(signal, listener);
    }
    this.signalListeners.clear();
  }

  private async stop(reason?: string): Promise<void> {
    this.logger.info(reason ? `Shutting down: ${reason}` : 'Shutting down');
    this.controller.abort();

    const deadline = setTimeout(() => {
      this.logger.error('Shutdown timeout exceeded, forcing exit', undefined, { timeoutMs: this.shutdownTimeout });
      this.exit(1);
    }, this.shutdownTimeout);
    deadline.unref();

    try {
      await runInOrder([...this.hooks.shutdown].reverse());
      this.logger.info('Shutdown complete');
    } catch (error) {
      this.logger.error('Error during shutdown', error);
      this.handleError(error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(deadline);
      this.stopSignalHandlers();
    }
  }

  private listenForSignals(): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = (): void => {
        this.shutdown(`received ${signal}`).catch((error: unknown) => {
          this.logger.error('Shutdown failed', error);
        });
      };
      this.signalListeners.set(signal, listener);
      process.on(signal, listener);
    }
  }
}

async function runInOrder(hooks: readonly LifecycleHook[]): Promise<void> {
  for (const hook of hooks) {
    await hook();
  }
}
