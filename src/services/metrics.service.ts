/**
 * Prometheus Metrics Service
 *
 * Exposes application metrics for monitoring and alerting.
 *
 * Metrics:
 * - token_issue_total{outcome}: issue() outcomes (minted, cache, stale_cache, or a failure kind)
 * - token_mints_total{status}: upstream mint attempts
 * - token_cache_hits_total: tokens served without an upstream call
 * - token_mint_duration_seconds: upstream mint duration histogram
 * - upstream_reachable: last connectivity probe result (1/0)
 * - health_consecutive_failures: current trailing run of failures
 * - http_requests_total / http_request_duration_seconds: API traffic
 */

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export class MetricsService {
  private registry: Registry;

  // Counters
  public tokenIssueTotal: Counter<'outcome'>;
  public tokenMintsTotal: Counter<'status'>;
  public tokenCacheHitsTotal: Counter;
  public httpRequestsTotal: Counter<'status_code' | 'method' | 'route'>;

  // Histograms
  public tokenMintDuration: Histogram<'status'>;
  public httpRequestDuration: Histogram<'method' | 'route' | 'status_code'>;

  // Gauges
  public upstreamReachable: Gauge;
  public consecutiveFailures: Gauge;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'cloud-token-server',
    });

    this.tokenIssueTotal = new Counter({
      name: 'token_issue_total',
      help: 'Total number of token issuance requests by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.tokenMintsTotal = new Counter({
      name: 'token_mints_total',
      help: 'Total number of upstream token mints by status',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.tokenCacheHitsTotal = new Counter({
      name: 'token_cache_hits_total',
      help: 'Total number of tokens served from the cache',
      registers: [this.registry],
    });

    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of API requests by status code',
      labelNames: ['status_code', 'method', 'route'] as const,
      registers: [this.registry],
    });

    this.tokenMintDuration = new Histogram({
      name: 'token_mint_duration_seconds',
      help: 'Upstream token mint duration in seconds',
      labelNames: ['status'] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10], // seconds
      registers: [this.registry],
    });

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'API request duration in seconds',
      labelNames: ['method', 'route', 'status_code'] as const,
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5], // seconds
      registers: [this.registry],
    });

    this.upstreamReachable = new Gauge({
      name: 'upstream_reachable',
      help: 'Whether the last connectivity probe reached the token issuer (1) or not (0)',
      registers: [this.registry],
    });

    this.consecutiveFailures = new Gauge({
      name: 'health_consecutive_failures',
      help: 'Current number of consecutive failed issuance attempts',
      registers: [this.registry],
    });
  }

  recordIssue(outcome: string) {
    this.tokenIssueTotal.inc({ outcome });
  }

  recordCacheHit() {
    this.tokenCacheHitsTotal.inc();
  }

  recordMint(success: boolean, durationSeconds: number) {
    const status = success ? 'SUCCESS' : 'FAILED';
    this.tokenMintsTotal.inc({ status });
    this.tokenMintDuration.observe({ status }, durationSeconds);
  }

  recordApiRequest(method: string, route: string, statusCode: number, durationSeconds: number) {
    this.httpRequestsTotal.inc({
      method,
      route,
      status_code: statusCode.toString()
    });
    this.httpRequestDuration.observe({
      method,
      route,
      status_code: statusCode.toString()
    }, durationSeconds);
  }

  updateUpstreamReachable(reachable: boolean) {
    this.upstreamReachable.set(reachable ? 1 : 0);
  }

  updateConsecutiveFailures(count: number) {
    this.consecutiveFailures.set(count);
  }

  /**
   * Gets metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
