/**
 * Shutdown Coordinator
 *
 * Handles application shutdown gracefully:
 * - Captures SIGTERM and SIGINT signals
 * - Moves running -> draining (readiness reports not_ready right away)
 * - Waits for in-flight token requests to drain, bounded by a grace period
 * - Closes the HTTP server
 * - Moves draining -> stopped and exits
 *
 * The state machine is one-way; a second signal is ignored.
 */

import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import type { ShutdownState } from '../types/health.types.js';

export interface ShutdownConfig {
  /** Grace period in milliseconds for in-flight requests to drain */
  timeout: number;
  /** Force shutdown timeout in milliseconds (safety net) */
  forceTimeout: number;
  /** Called right after entering draining */
  onDrainStart?: () => void | Promise<void>;
  /** Resolves once in-flight work has finished */
  onWaitForDrain?: () => Promise<void>;
  /** Closes listeners and other resources */
  onClose?: () => void | Promise<void>;
  /** Process exit, replaceable in tests */
  exit?: (code: number) => void;
  logger?: StructuredLogger;
}

export class ShutdownCoordinator {
  private state: ShutdownState = 'running';
  private shutdownConfig: ShutdownConfig;
  private forceShutdownTimeout?: NodeJS.Timeout;
  private shutdownPromise: Promise<void> | null = null;
  private exitCode = 0;
  private readonly logger: StructuredLogger;
  private readonly exit: (code: number) => void;

  constructor(config: ShutdownConfig) {
    this.shutdownConfig = config;
    this.logger = config.logger ?? defaultLogger;
    this.exit = config.exit ?? ((code) => process.exit(code));
  }

  getState(): ShutdownState {
    return this.state;
  }

  isAccepting(): boolean {
    return this.state === 'running';
  }

  /**
   * Registers signal handlers for graceful shutdown
   */
  registerHandlers(): void {
    // SIGTERM: Cloud Run / Kubernetes termination, docker stop
    process.on('SIGTERM', () => {
      void this.shutdown('SIGTERM');
    });

    // SIGINT: Ctrl+C in terminal
    process.on('SIGINT', () => {
      void this.shutdown('SIGINT');
    });

    process.on('uncaughtException', (error) => {
      this.logger.error('Uncaught exception', { error });
      void this.shutdown('UNCAUGHT_EXCEPTION', 1);
    });

    process.on('unhandledRejection', (reason) => {
      this.logger.error('Unhandled rejection', { error: reason });
      void this.shutdown('UNHANDLED_REJECTION', 1);
    });

    this.logger.info('Shutdown handlers registered');
  }

  /**
   * Runs the shutdown sequence once; later calls share the first run.
   * A later call can still raise the exit code (an error during a clean stop).
   */
  shutdown(signal: string, exitCode = 0): Promise<void> {
    this.exitCode = Math.max(this.exitCode, exitCode);

    if (this.shutdownPromise) {
      this.logger.warn(`Shutdown already in progress, ignoring ${signal}`, { exitCode: this.exitCode });
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.runShutdown(signal);
    return this.shutdownPromise;
  }

  private async runShutdown(signal: string): Promise<void> {
    this.state = 'draining';
    this.setupForceShutdownTimeout(this.shutdownConfig.forceTimeout);
    this.logger.shutdownStarted({ signal });

    const startTime = Date.now();

    try {
      if (this.shutdownConfig.onDrainStart) {
        await this.shutdownConfig.onDrainStart();
      }

      const drained = await this.waitWithTimeout(
        this.shutdownConfig.onWaitForDrain,
        this.shutdownConfig.timeout
      );
      if (!drained) {
        this.logger.warn(
          `Drain grace period (${this.formatDuration(this.shutdownConfig.timeout)}) expired, in-flight requests may be cut off`
        );
      }

      if (this.shutdownConfig.onClose) {
        await this.shutdownConfig.onClose();
      }

      this.state = 'stopped';
      this.clearForceShutdownTimeout();
      this.logger.shutdownCompleted({ duration: Date.now() - startTime, drained });
      this.exit(this.exitCode);
    } catch (error) {
      this.state = 'stopped';
      this.clearForceShutdownTimeout();
      this.logger.error('Error during graceful shutdown, forcing exit', { error });
      this.exit(1);
    }
  }

  /**
   * Waits for a callback with timeout; false on timeout or error
   */
  private async waitWithTimeout(
    callback: (() => Promise<void>) | undefined,
    timeoutMs: number
  ): Promise<boolean> {
    if (!callback) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const completion = callback().then(
      () => true,
      (error: unknown) => {
        this.logger.error('Error while waiting for requests to drain', { error });
        return false;
      }
    );

    try {
      return await Promise.race([completion, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * If graceful shutdown takes too long, force exit
   */
  private setupForceShutdownTimeout(timeoutMs: number): void {
    this.forceShutdownTimeout = setTimeout(() => {
      this.logger.error(`Force shutdown timeout (${this.formatDuration(timeoutMs)}) expired, exiting`);
      this.state = 'stopped';
      this.exit(1);
    }, timeoutMs);
    this.forceShutdownTimeout.unref();
  }

  private clearForceShutdownTimeout(): void {
    if (this.forceShutdownTimeout) {
      clearTimeout(this.forceShutdownTimeout);
      this.forceShutdownTimeout = undefined;
    }
  }

  /**
   * Formats duration in milliseconds to human-readable string
   */
  private formatDuration(ms: number): string {
    const seconds = Math.floor(ms / 1000);
    const minutes = Math.floor(seconds / 60);

    if (minutes > 0) {
      return `${minutes}m ${seconds % 60}s`;
    }
    return `${seconds}s`;
  }
}

/**
 * Creates a shutdown coordinator with default configuration
 */
export function createShutdownCoordinator(customConfig?: Partial<ShutdownConfig>): ShutdownCoordinator {
  const defaultConfig: ShutdownConfig = {
    timeout: 25000, // 25 seconds default
    forceTimeout: 30000, // 30 seconds default
    ...customConfig,
  };

  return new ShutdownCoordinator(defaultConfig);
}
