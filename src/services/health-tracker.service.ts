import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';
import type {
  ConnectivityResult,
  HealthStats,
  HealthStatus,
  HealthThresholds,
  IssuanceOutcome,
  LivenessReport,
  ReadinessReport,
  ShutdownState,
} from '../types/health.types.js';

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = {
  unhealthyConsecutiveFailures: 5,
  minRequestsForRate: 10,
  unhealthySuccessRate: 0.5,
  degradedSuccessRate: 0.8,
  livenessGraceMs: 5 * 60 * 1000,
};

export interface HealthTrackerDependencies {
  getShutdownState?: () => ShutdownState;
  getConnectivity?: () => ConnectivityResult | null;
  now?: () => number;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Health Tracker
 *
 * Single owner of the process-wide issuance counters. Every update runs
 * synchronously, so no reader can observe a half-applied outcome.
 *
 * Classification (first match wins):
 * - not_ready: credential not loaded, or shutdown has begun
 * - unhealthy: too many consecutive failures, or a low success rate once
 *   enough requests have been seen
 * - degraded: any trailing failure, a middling success rate, or an
 *   unreachable upstream
 * - healthy: otherwise
 */
export class HealthTracker {
  private stats: HealthStats;
  private credentialLoaded = false;
  private lastStatus: HealthStatus;
  private readonly thresholds: HealthThresholds;
  private readonly getShutdownState: () => ShutdownState;
  private readonly getConnectivity: () => ConnectivityResult | null;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(thresholds: Partial<HealthThresholds> = {}, deps: HealthTrackerDependencies = {}) {
    this.thresholds = { ...DEFAULT_HEALTH_THRESHOLDS, ...thresholds };
    this.getShutdownState = deps.getShutdownState ?? (() => 'running');
    this.getConnectivity = deps.getConnectivity ?? (() => null);
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;

    this.stats = {
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      rejectedRequests: 0,
      consecutiveFailures: 0,
      lastSuccessAt: null,
      lastFailureAt: null,
      lastFailureKind: null,
      startedAt: this.now(),
      unhealthySince: null,
    };
    this.lastStatus = this.status();
  }

  markCredentialLoaded(): void {
    this.credentialLoaded = true;
    this.lastStatus = this.status();
  }

  isCredentialLoaded(): boolean {
    return this.credentialLoaded;
  }

  /**
   * Records the outcome of one issuance attempt
   */
  record(outcome: IssuanceOutcome): void {
    switch (outcome.type) {
      case 'rejected':
        // Refused while draining: not evidence about the upstream
        this.stats.rejectedRequests++;
        return;
      case 'success':
        this.stats.totalRequests++;
        this.stats.successfulRequests++;
        this.stats.consecutiveFailures = 0;
        this.stats.lastSuccessAt = outcome.at;
        break;
      case 'failure':
        this.stats.totalRequests++;
        this.stats.failedRequests++;
        this.stats.consecutiveFailures++;
        this.stats.lastFailureAt = outcome.at;
        this.stats.lastFailureKind = outcome.kind;
        break;
    }

    if (this.classifyStats() === 'unhealthy') {
      this.stats.unhealthySince ??= outcome.at;
    } else {
      this.stats.unhealthySince = null;
    }

    this.metrics.updateConsecutiveFailures(this.stats.consecutiveFailures);

    const status = this.status();
    if (status !== this.lastStatus) {
      this.logger.healthStatusChanged({
        from: this.lastStatus,
        to: status,
        consecutiveFailures: this.stats.consecutiveFailures,
      });
      this.lastStatus = status;
    }
  }

  /**
   * Returns a point-in-time copy of the counters
   */
  snapshot(): HealthStats {
    return { ...this.stats };
  }

  /**
   * successful / total, or 1.0 when nothing has been attempted yet
   */
  successRate(): number {
    if (this.stats.totalRequests === 0) {
      return 1;
    }
    return this.stats.successfulRequests / this.stats.totalRequests;
  }

  status(): HealthStatus {
    if (!this.credentialLoaded || this.getShutdownState() !== 'running') {
      return 'not_ready';
    }

    const fromStats = this.classifyStats();
    if (fromStats !== 'healthy') {
      return fromStats;
    }

    const connectivity = this.getConnectivity();
    if (connectivity !== null && !connectivity.reachable) {
      return 'degraded';
    }

    return 'healthy';
  }

  readiness(): ReadinessReport {
    const status = this.status();
    const shutdownState = this.getShutdownState();
    const reasons: string[] = [];

    if (!this.credentialLoaded) {
      reasons.push('credential_not_loaded');
    }
    if (shutdownState !== 'running') {
      reasons.push(`shutdown_${shutdownState}`);
    }
    if (this.stats.consecutiveFailures > 0) {
      reasons.push(`consecutive_failures:${this.stats.consecutiveFailures}`);
    }
    if (this.successRate() < this.thresholds.degradedSuccessRate) {
      reasons.push(`success_rate:${this.successRate().toFixed(2)}`);
    }
    const connectivity = this.getConnectivity();
    if (connectivity !== null && !connectivity.reachable) {
      reasons.push(`upstream_unreachable:${connectivity.reason}`);
    }

    return {
      ready: status !== 'not_ready' && status !== 'unhealthy',
      status,
      shutdownState,
      reasons,
    };
  }

  /**
   * Fails once the counters have stayed unhealthy past the grace window,
   * which is the signal for the orchestrator to restart the instance.
   */
  liveness(): LivenessReport {
    const since = this.stats.unhealthySince;
    if (since === null || this.getShutdownState() !== 'running') {
      return { alive: true, unhealthyForMs: 0 };
    }

    const unhealthyForMs = Math.max(0, this.now() - since);
    return {
      alive: unhealthyForMs < this.thresholds.livenessGraceMs,
      unhealthyForMs,
    };
  }

  getThresholds(): HealthThresholds {
    return { ...this.thresholds };
  }

  getUptimeMs(): number {
    return this.now() - this.stats.startedAt;
  }

  private classifyStats(): Exclude<HealthStatus, 'not_ready'> {
    const { consecutiveFailures, totalRequests } = this.stats;
    const rate = this.successRate();

    if (
      consecutiveFailures >= this.thresholds.unhealthyConsecutiveFailures ||
      (totalRequests >= this.thresholds.minRequestsForRate && rate < this.thresholds.unhealthySuccessRate)
    ) {
      return 'unhealthy';
    }

    if (consecutiveFailures > 0 || rate < this.thresholds.degradedSuccessRate) {
      return 'degraded';
    }

    return 'healthy';
  }
}
