/**
 * Structured Logger Service
 *
 * Provides structured JSON logging with required fields for observability.
 *
 * Fields per event (when applicable):
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: dotted event name (token.issued, health.status_changed, ...)
 * - source: where a token came from (minted, cache, stale_cache)
 * - kind: failure kind (UpstreamRejected, UpstreamUnreachable, ...)
 * - http_status: upstream HTTP status code
 * - message: human-readable message
 */

import pino from 'pino';
import { config } from '../config/env.js';
import type { HealthStatus, ConnectivityResult } from '../types/health.types.js';
import type { CredentialSource, TokenFailureKind, TokenSource } from '../types/token.types.js';

/**
 * Log context for token events
 */
export interface TokenLogContext {
  source?: TokenSource;
  kind?: TokenFailureKind;
  duration?: number;
  [key: string]: unknown;
}

/**
 * Create base logger instance
 */
const baseLogger = pino({
  level: config.logLevel,

  formatters: {
    level: (label) => {
      return { level: label };
    },
  },

  // Base fields included in every log
  base: {
    service: 'cloud-token-server',
    environment: config.nodeEnv,
  },

  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

  // Pretty print in development
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false,
    },
  } : undefined,
});

/**
 * Masks a token for logging (first 6 and last 4 characters)
 */
export function maskToken(token: string): string {
  if (token.length <= 10) {
    return '***';
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}

/**
 * Masks a URL for logging (drops query string and credentials)
 */
export function maskUrl(url: string): string {
  try {
    const urlObj = new URL(url);
    return `${urlObj.protocol}//${urlObj.host}${urlObj.pathname}`;
  } catch {
    return url;
  }
}

/**
 * Structured Logger
 */
export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger = baseLogger) {
    this.logger = logger;
  }

  credentialLoaded(context: { clientEmail: string; source: CredentialSource; tokenUri: string }) {
    this.logger.info({
      event: 'credential.loaded',
      clientEmail: context.clientEmail,
      source: context.source,
      tokenUri: maskUrl(context.tokenUri),
      message: `Loaded service account credentials for ${context.clientEmail} (${context.source})`,
    });
  }

  tokenMinted(context: { token: string; expiresAt: number; duration: number }) {
    const expiresAt = new Date(context.expiresAt).toISOString();
    this.logger.info({
      event: 'token.minted',
      token: maskToken(context.token),
      expiresAt,
      duration: context.duration,
      message: `Access token minted (expires: ${expiresAt})`,
    });
  }

  tokenIssued(context: TokenLogContext & { expiresAt: number }) {
    this.logger.debug({
      event: 'token.issued',
      source: context.source,
      expiresAt: new Date(context.expiresAt).toISOString(),
      message: `Access token issued from ${context.source}`,
    });
  }

  tokenIssueFailed(context: TokenLogContext & { error: string }) {
    const level = context.kind === 'ServiceUnavailable' ? 'warn' : 'error';
    this.logger[level]({
      event: 'token.issue_failed',
      kind: context.kind,
      error: context.error,
      message: `Token issuance failed (${context.kind}): ${context.error}`,
    });
  }

  connectivityChecked(result: ConnectivityResult) {
    if (result.reachable) {
      this.logger.debug({
        event: 'connectivity.checked',
        reachable: true,
        latencyMs: result.latencyMs,
        http_status: result.statusCode,
        message: `Upstream reachable (${result.latencyMs}ms)`,
      });
    } else {
      this.logger.warn({
        event: 'connectivity.checked',
        reachable: false,
        reason: result.reason,
        error: result.message,
        message: `Upstream unreachable (${result.reason}): ${result.message}`,
      });
    }
  }

  healthStatusChanged(context: { from: HealthStatus; to: HealthStatus; consecutiveFailures: number }) {
    const level = context.to === 'healthy' ? 'info' : 'warn';
    this.logger[level]({
      event: 'health.status_changed',
      from: context.from,
      to: context.to,
      consecutiveFailures: context.consecutiveFailures,
      message: `Health status changed: ${context.from} -> ${context.to}`,
    });
  }

  shutdownStarted(context: { signal: string }) {
    this.logger.warn({
      event: 'shutdown.started',
      signal: context.signal,
      message: `Graceful shutdown initiated (${context.signal})`,
    });
  }

  shutdownCompleted(context: { duration: number; drained: boolean }) {
    this.logger.info({
      event: 'shutdown.completed',
      duration: context.duration,
      drained: context.drained,
      message: `Graceful shutdown completed (${context.duration}ms)`,
    });
  }

  info(message: string, context?: Record<string, unknown>) {
    this.logger.info({ ...context, message });
  }

  warn(message: string, context?: Record<string, unknown>) {
    this.logger.warn({ ...context, message });
  }

  error(message: string, context?: Record<string, unknown> & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  debug(message: string, context?: Record<string, unknown>) {
    this.logger.debug({ ...context, message });
  }
}

/**
 * Global logger instance
 */
export const logger = new StructuredLogger();
