/**
 * Health tracking types
 */

import type { TokenFailureKind } from './token.types.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'not_ready';

export type ShutdownState = 'running' | 'draining' | 'stopped';

/**
 * Upstream failure kinds that count against health.
 * ServiceUnavailable is excluded: it is recorded as a rejection.
 */
export type FailureKind = Exclude<TokenFailureKind, 'ServiceUnavailable'>;

/**
 * Outcome reported once per issue() call
 */
export type IssuanceOutcome =
  | { type: 'success'; at: number }
  | { type: 'failure'; kind: FailureKind; at: number }
  | { type: 'rejected'; at: number };

/**
 * Point-in-time copy of the process-wide counters
 */
export interface HealthStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  rejectedRequests: number;
  consecutiveFailures: number;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
  lastFailureKind: FailureKind | null;
  startedAt: number;
  /** Set while the counters alone classify the service as unhealthy */
  unhealthySince: number | null;
}

/**
 * Health classification thresholds
 */
export interface HealthThresholds {
  unhealthyConsecutiveFailures: number;
  /** Success rate is only judged for unhealthy after this many requests */
  minRequestsForRate: number;
  unhealthySuccessRate: number;
  degradedSuccessRate: number;
  /** How long the service may stay unhealthy before liveness fails */
  livenessGraceMs: number;
}

export type ConnectivityFailureReason = 'timeout' | 'dns' | 'network' | 'aborted';

export type ConnectivityResult =
  | { reachable: true; latencyMs: number; statusCode: number; checkedAt: number }
  | { reachable: false; reason: ConnectivityFailureReason; message: string; checkedAt: number };

export interface ReadinessReport {
  ready: boolean;
  status: HealthStatus;
  shutdownState: ShutdownState;
  reasons: string[];
}

export interface LivenessReport {
  alive: boolean;
  unhealthyForMs: number;
}
