import axios, { type AxiosInstance } from 'axios';
import { getErrorMessage } from '../errors/token.errors.js';
import { classifyNetworkFailure } from '../utils/http-errors.js';
import { logger as defaultLogger, maskUrl, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';
import type { ConnectivityResult } from '../types/health.types.js';
import type { ServiceAccountCredential } from '../types/token.types.js';

export interface ConnectivityProbeConfig {
  url: string;
  timeoutMs: number;
}

export interface ConnectivityProbeDependencies {
  http?: AxiosInstance;
  now?: () => number;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * The probe checks the issuer the credential actually mints against,
 * unless an explicit URL is configured
 */
export function resolveProbeUrl(configured: string | null, credential: ServiceAccountCredential): string {
  return configured ?? credential.tokenUri;
}

/**
 * Connectivity Probe
 *
 * Checks that the token issuer answers at all, without minting a token.
 * Any HTTP response (even 404/405) counts as reachable; only network
 * failures and timeouts count as unreachable.
 */
export class ConnectivityProbe {
  private lastResult: ConnectivityResult | null = null;
  private timer: NodeJS.Timeout | null = null;
  private readonly config: ConnectivityProbeConfig;
  private readonly http: AxiosInstance;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(config: ConnectivityProbeConfig, deps: ConnectivityProbeDependencies = {}) {
    this.config = config;
    this.http = deps.http ?? axios.create();
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;
  }

  /**
   * Probes the issuer once. Resolves within the configured timeout.
   */
  async check(): Promise<ConnectivityResult> {
    const startedAt = this.now();
    const signal = AbortSignal.timeout(this.config.timeoutMs);
    let result: ConnectivityResult;

    try {
      const response = await this.http.head(this.config.url, {
        timeout: this.config.timeoutMs,
        signal,
        validateStatus: () => true,
      });
      result = {
        reachable: true,
        latencyMs: this.now() - startedAt,
        statusCode: response.status,
        checkedAt: startedAt,
      };
    } catch (error) {
      const reason = classifyNetworkFailure(error);
      result = {
        reachable: false,
        // The only abort source is our own deadline
        reason: reason === 'aborted' && signal.aborted ? 'timeout' : reason,
        message: getErrorMessage(error),
        checkedAt: startedAt,
      };
    }

    this.lastResult = result;
    this.metrics.updateUpstreamReachable(result.reachable);
    this.logger.connectivityChecked(result);
    return result;
  }

  getLastResult(): ConnectivityResult | null {
    return this.lastResult;
  }

  /**
   * Starts periodic checks (first one immediately)
   */
  start(intervalMs: number): void {
    if (this.timer) {
      return;
    }

    this.logger.info(`Starting connectivity probe for ${maskUrl(this.config.url)} every ${intervalMs}ms`);
    void this.check();
    this.timer = setInterval(() => {
      void this.check();
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }
}
