/**
 * Process Lifecycle Management
 *
 * Handles shutdown and signal handling.
 * Provides hooks for graceful shutdown of resources.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';

export type LifecycleHook = () => Promise<void> | void;

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface LifecycleOptions {
  /** Milliseconds shutdown hooks may take before the process is forced out */
  shutdownTimeout?: number;
  logger?: Logger;
  /** Called with the exit code once shutdown finishes or times out */
  exit?: (code: number) => void;
}

/**
 * Lifecycle manager
 */
export class Lifecycle {
  private shutdownHooks: LifecycleHook[] = [];
  private shuttingDown: Promise<void> | null = null;
  private shutdownTimeout: number;
  private logger: Logger;
  private exit: (code: number) => void;
  private signalListeners = new Map<ShutdownSignal, () => void>();

  constructor(options: LifecycleOptions = {}) {
    this.shutdownTimeout = options.shutdownTimeout ?? 30000;
    this.logger = options.logger ?? getLogger();
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown !== null;
  }

  /**
   * Register a hook to run on graceful shutdown.
   * Hooks run in reverse registration order.
   */
  onShutdown(hook: LifecycleHook): void {
    this.shutdownHooks.push(hook);
  }

  /**
   * Shut down on SIGINT and SIGTERM, then exit
   */
  handleSignals(signals: ShutdownSignal[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      if (this.signalListeners.has(signal)) continue;

      const listener = () => {
        this.shutdown(`Received ${signal}`)
          .then(() => this.exit(0))
          .catch((error: unknown) => {
            this.logger.error('Shutdown failed', error);
            this.exit(1);
          });
      };
      this.signalListeners.set(signal, listener);
      process.on(signal, listener);
    }
  }

  /**
   * Remove signal listeners installed by handleSignals()
   */
  stopSignalHandlers(): void {
    for (const [signal, listener] of this.signalListeners) {
      process.off(signal, listener);
    }
    this.signalListeners.clear();
  }

  /**
   * Trigger graceful shutdown. Concurrent calls share one run.
   */
  shutdown(reason?: string): Promise<void> {
    this.shuttingDown ??= this.runShutdown(reason);
    return this.shuttingDown;
  }

  private async runShutdown(reason?: string): Promise<void> {
    this.logger.info('Shutting down', reason ? { reason } : undefined);

    const forceShutdown = setTimeout(() => {
      this.logger.error('Shutdown timeout exceeded, forcing exit', undefined, {
        timeoutMs: this.shutdownTimeout,
      });
      this.exit(1);
    }, this.shutdownTimeout);
    forceShutdown.unref();

    try {
      for (const hook of [...this.shutdownHooks].reverse()) {
        try {
          await hook();
        } catch (error) {
          this.logger.error('Error during shutdown', error);
        }
      }
      this.logger.info('Shutdown complete');
    } finally {
      clearTimeout(forceShutdown);
      this.stopSignalHandlers();
    }
  }
}
