import { getErrorMessage, isTokenIssuanceError } from '../errors/token.errors.js';
import { logger as defaultLogger, type StructuredLogger } from './logger.service.js';
import { metrics as defaultMetrics, type MetricsService } from './metrics.service.js';
import type { HealthTracker } from './health-tracker.service.js';
import type { FailureKind } from '../types/health.types.js';
import type {
  MintedToken,
  TokenBrokerConfig,
  TokenCacheInfo,
  TokenMinter,
  TokenResult,
} from '../types/token.types.js';

export interface TokenBrokerDependencies {
  tracker: HealthTracker;
  /** Request-acceptance gate, closed once shutdown begins */
  isAccepting?: () => boolean;
  now?: () => number;
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

type MintOutcome =
  | { ok: true; minted: MintedToken }
  | { ok: false; error: unknown };

/**
 * Token Broker
 *
 * Hands out access tokens and reports every outcome to the HealthTracker.
 *
 * - Reuses the last minted token until `cacheMarginMs` before its expiry
 * - Single-flight minting: at most one upstream mint in flight. Callers that
 *   arrive during a mint share its outcome, success or failure, and each
 *   records that outcome for itself. A still-valid token is handed out
 *   without waiting on a refresh already in flight.
 * - A failed mint keeps the previous token; while that token has not truly
 *   expired it is served as `stale_cache` (the failure still counts)
 * - Refuses new work with ServiceUnavailable once shutdown begins, without
 *   touching the failure counters
 * - Tracks in-flight calls so shutdown can drain them
 */
export class TokenBroker {
  private pendingMint: Promise<MintOutcome> | null = null;
  private cached: MintedToken | null = null;
  private inFlight = 0;
  private idleWaiters: Array<() => void> = [];
  private totalMints = 0;
  private cacheHits = 0;
  private readonly minter: TokenMinter;
  private readonly config: TokenBrokerConfig;
  private readonly tracker: HealthTracker;
  private readonly isAccepting: () => boolean;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;

  constructor(minter: TokenMinter, config: TokenBrokerConfig, deps: TokenBrokerDependencies) {
    this.minter = minter;
    this.config = config;
    this.tracker = deps.tracker;
    this.isAccepting = deps.isAccepting ?? (() => true);
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;
  }

  /**
   * Issues an access token. Never throws: failures come back as a result.
   */
  async issue(): Promise<TokenResult> {
    if (!this.isAccepting()) {
      const message = 'Server is shutting down. Not accepting new token requests.';
      this.tracker.record({ type: 'rejected', at: this.now() });
      this.metrics.recordIssue('ServiceUnavailable');
      this.logger.tokenIssueFailed({ kind: 'ServiceUnavailable', error: message });
      return { ok: false, kind: 'ServiceUnavailable', message };
    }

    this.inFlight++;
    try {
      const result = await this.acquire();

      if (result.ok) {
        this.metrics.recordIssue(result.source);
        this.logger.tokenIssued({ source: result.source, expiresAt: result.expiresAt });
      } else {
        this.metrics.recordIssue(result.kind);
        this.logger.tokenIssueFailed({ kind: result.kind, error: result.message });
      }

      return result;
    } finally {
      this.inFlight--;
      if (this.inFlight === 0) {
        this.notifyIdle();
      }
    }
  }

  /**
   * Serves from cache, joins the mint in flight, or starts one
   */
  private async acquire(): Promise<TokenResult> {
    const cached = this.cached;
    if (cached && (this.isFresh(cached) || (this.pendingMint && this.now() < cached.expiresAt))) {
      return this.serveCached(cached);
    }

    const leader = this.pendingMint === null;
    const outcome = await (this.pendingMint ?? this.startMint());

    if (!outcome.ok) {
      return this.handleMintFailure(outcome.error);
    }

    this.tracker.record({ type: 'success', at: this.now() });
    if (!leader) {
      this.cacheHits++;
      this.metrics.recordCacheHit();
    }
    return {
      ok: true,
      token: outcome.minted.token,
      expiresAt: outcome.minted.expiresAt,
      source: leader ? 'minted' : 'cache',
    };
  }

  private serveCached(cached: MintedToken): TokenResult {
    this.cacheHits++;
    this.metrics.recordCacheHit();
    this.tracker.record({ type: 'success', at: this.now() });
    return { ok: true, token: cached.token, expiresAt: cached.expiresAt, source: 'cache' };
  }

  private startMint(): Promise<MintOutcome> {
    const pending = this.runMint().finally(() => {
      this.pendingMint = null;
    });
    this.pendingMint = pending;
    return pending;
  }

  private async runMint(): Promise<MintOutcome> {
    const startedAt = this.now();
    try {
      const minted = await this.minter.mintToken();
      const duration = this.now() - startedAt;
      this.cached = minted;
      this.totalMints++;
      this.metrics.recordMint(true, duration / 1000);
      this.logger.tokenMinted({ token: minted.token, expiresAt: minted.expiresAt, duration });
      return { ok: true, minted };
    } catch (error) {
      this.metrics.recordMint(false, (this.now() - startedAt) / 1000);
      return { ok: false, error };
    }
  }

  private handleMintFailure(error: unknown): TokenResult {
    const now = this.now();

    const kind: FailureKind = isTokenIssuanceError(error) && error.kind !== 'ServiceUnavailable'
      ? error.kind
      : 'UpstreamUnreachable';
    const message = getErrorMessage(error);
    this.tracker.record({ type: 'failure', kind, at: now });

    const cached = this.cached;
    if (cached && now < cached.expiresAt) {
      this.logger.warn('Mint failed, serving previous token until it expires', {
        kind,
        error: message,
        expiresAt: new Date(cached.expiresAt).toISOString(),
      });
      return { ok: true, token: cached.token, expiresAt: cached.expiresAt, source: 'stale_cache' };
    }

    return { ok: false, kind, message };
  }

  /**
   * A cached token is reusable until the margin before its expiry
   */
  private isFresh(token: MintedToken): boolean {
    return this.now() < token.expiresAt - this.config.cacheMarginMs;
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  /**
   * Resolves once no issue() call is in flight
   */
  waitForIdle(): Promise<void> {
    if (this.inFlight === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getInFlight(): number {
    return this.inFlight;
  }

  getCacheInfo(): TokenCacheInfo {
    return {
      hasToken: this.cached !== null && this.now() < this.cached.expiresAt,
      expiresAt: this.cached?.expiresAt ?? null,
      obtainedAt: this.cached?.obtainedAt ?? null,
      totalMints: this.totalMints,
      cacheHits: this.cacheHits,
    };
  }
}
