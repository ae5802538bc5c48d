import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { TokenBroker } from '../../src/services/token-broker.service.js';
import { HealthTracker } from '../../src/services/health-tracker.service.js';
import { StructuredLogger } from '../../src/services/logger.service.js';
import { MetricsService } from '../../src/services/metrics.service.js';
import { TokenIssuanceError } from '../../src/errors/token.errors.js';
import type { MintedToken, TokenMinter } from '../../src/types/token.types.js';

const HOUR = 60 * 60 * 1000;
const MINUTE = 60 * 1000;

/**
 * Minter whose next outcome is set by the test
 */
class FakeMinter implements TokenMinter {
  calls = 0;
  private next: () => Promise<MintedToken>;

  constructor(private readonly clock: () => number) {
    this.next = () => Promise.resolve(this.token());
  }

  token(lifetimeMs = HOUR): MintedToken {
    return {
      token: `token-${this.calls}`,
      expiresAt: this.clock() + lifetimeMs,
      obtainedAt: this.clock(),
    };
  }

  succeedWith(lifetimeMs: number): void {
    this.next = () => Promise.resolve(this.token(lifetimeMs));
  }

  failWith(error: unknown): void {
    this.next = () => Promise.reject(error);
  }

  holdUntil(gate: Promise<void>): void {
    this.next = () => gate.then(() => this.token());
  }

  failAfter(gate: Promise<void>, error: unknown): void {
    this.next = () => gate.then(() => Promise.reject(error));
  }

  failAfterMs(delayMs: number, error: unknown): void {
    this.next = () => new Promise<MintedToken>((_resolve, reject) => {
      setTimeout(() => reject(error), delayMs);
    });
  }

  mintToken(): Promise<MintedToken> {
    this.calls++;
    return this.next();
  }
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Unit Tests - Token Broker
 *
 * Caching, coalescing, stale fallback, drain gating.
 */
describe('TokenBroker', () => {
  let now: number;
  let accepting: boolean;
  let minter: FakeMinter;
  let tracker: HealthTracker;
  let metrics: MetricsService;
  let broker: TokenBroker;

  beforeEach(() => {
    now = 1_700_000_000_000;
    accepting = true;
    const clock = () => now;
    const logger = new StructuredLogger(pino({ level: 'silent' }));
    metrics = new MetricsService();
    minter = new FakeMinter(clock);
    tracker = new HealthTracker({}, { now: clock, logger, metrics });
    tracker.markCredentialLoaded();
    broker = new TokenBroker(minter, { cacheMarginMs: 5 * MINUTE }, {
      tracker,
      isAccepting: () => accepting,
      now: clock,
      logger,
      metrics,
    });
  });

  describe('caching', () => {
    it('should mint on the first request', async () => {
      const result = await broker.issue();

      expect(result).toEqual({
        ok: true,
        token: 'token-1',
        expiresAt: now + HOUR,
        source: 'minted',
      });
      expect(minter.calls).toBe(1);
      expect(tracker.snapshot().successfulRequests).toBe(1);
    });

    it('should reuse the token 10 minutes later', async () => {
      const first = await broker.issue();
      now += 10 * MINUTE;
      const second = await broker.issue();

      expect(minter.calls).toBe(1);
      expect(second).toEqual({
        ok: true,
        token: 'token-1',
        expiresAt: first.ok ? first.expiresAt : 0,
        source: 'cache',
      });
      expect(tracker.snapshot().successfulRequests).toBe(2);
    });

    it('should mint exactly once more inside the safety margin', async () => {
      await broker.issue();
      // 4 minutes before expiry, inside the 5 minute margin
      now += HOUR - 4 * MINUTE;

      const refreshed = await broker.issue();
      const reused = await broker.issue();

      expect(minter.calls).toBe(2);
      expect(refreshed).toMatchObject({ ok: true, token: 'token-2', source: 'minted' });
      expect(reused).toMatchObject({ ok: true, token: 'token-2', source: 'cache' });
    });

    it('should treat the margin boundary as stale', async () => {
      await broker.issue();
      now += HOUR - 5 * MINUTE;

      const result = await broker.issue();

      expect(result).toMatchObject({ source: 'minted' });
      expect(minter.calls).toBe(2);
    });

    it('should report cache info', async () => {
      expect(broker.getCacheInfo()).toEqual({
        hasToken: false,
        expiresAt: null,
        obtainedAt: null,
        totalMints: 0,
        cacheHits: 0,
      });

      const startedAt = now;
      await broker.issue();
      await broker.issue();

      expect(broker.getCacheInfo()).toEqual({
        hasToken: true,
        expiresAt: startedAt + HOUR,
        obtainedAt: startedAt,
        totalMints: 1,
        cacheHits: 1,
      });

      now += 2 * HOUR;
      expect(broker.getCacheInfo().hasToken).toBe(false);
    });
  });

  describe('concurrency', () => {
    it('should coalesce concurrent requests into a single mint', async () => {
      const gate = deferred();
      minter.holdUntil(gate.promise);

      const pending = Array.from({ length: 5 }, () => broker.issue());
      expect(broker.getInFlight()).toBe(5);

      gate.resolve();
      const results = await Promise.all(pending);

      expect(minter.calls).toBe(1);
      expect(results.map((result) => result.ok && result.source)).toEqual([
        'minted', 'cache', 'cache', 'cache', 'cache',
      ]);
      expect(new Set(results.map((result) => result.ok && result.token))).toEqual(new Set(['token-1']));
      expect(broker.getInFlight()).toBe(0);
    });

    it('should share a failed mint with every concurrent caller', async () => {
      const gate = deferred();
      minter.failAfter(gate.promise, new TokenIssuanceError('UpstreamUnreachable', 'Token endpoint did not respond within 10000ms'));

      const pending = Array.from({ length: 5 }, () => broker.issue());
      gate.resolve();
      const results = await Promise.all(pending);

      expect(minter.calls).toBe(1);
      for (const result of results) {
        expect(result).toEqual({
          ok: false,
          kind: 'UpstreamUnreachable',
          message: 'Token endpoint did not respond within 10000ms',
        });
      }
      const stats = tracker.snapshot();
      expect(stats.failedRequests).toBe(5);
      expect(stats.consecutiveFailures).toBe(5);
    });

    it('should keep every caller within one mint of waiting when the upstream is slow', async () => {
      minter.failAfterMs(100, new TokenIssuanceError('UpstreamUnreachable', 'timed out'));

      const startedAt = Date.now();
      const waits = await Promise.all(
        Array.from({ length: 5 }, () => broker.issue().then(() => Date.now() - startedAt))
      );

      expect(minter.calls).toBe(1);
      expect(Math.max(...waits)).toBeLessThan(190);
    });

    it('should mint again after a shared failure settles', async () => {
      minter.failWith(new TokenIssuanceError('UpstreamUnreachable', 'timed out'));
      await Promise.all([broker.issue(), broker.issue()]);

      minter.succeedWith(HOUR);
      const result = await broker.issue();

      expect(result).toMatchObject({ ok: true, source: 'minted' });
      expect(minter.calls).toBe(2);
    });

    it('should hand out a still-valid token while a refresh is in flight', async () => {
      await broker.issue();
      now += HOUR - 2 * MINUTE;
      const gate = deferred();
      minter.failAfter(gate.promise, new TokenIssuanceError('UpstreamUnreachable', 'timed out'));

      const refreshing = broker.issue();
      const others = await Promise.all([broker.issue(), broker.issue()]);

      for (const result of others) {
        expect(result).toEqual({ ok: true, token: 'token-1', expiresAt: now + 2 * MINUTE, source: 'cache' });
      }
      expect(broker.getInFlight()).toBe(1);

      gate.resolve();
      expect(await refreshing).toEqual({
        ok: true,
        token: 'token-1',
        expiresAt: now + 2 * MINUTE,
        source: 'stale_cache',
      });
      expect(minter.calls).toBe(2);
      const stats = tracker.snapshot();
      expect(stats.successfulRequests).toBe(3);
      expect(stats.failedRequests).toBe(1);
    });

    it('should resolve waitForIdle immediately when nothing is in flight', async () => {
      await expect(broker.waitForIdle()).resolves.toBeUndefined();
    });

    it('should resolve waitForIdle once in-flight requests finish', async () => {
      const gate = deferred();
      minter.holdUntil(gate.promise);
      let idle = false;

      const request = broker.issue();
      const drained = broker.waitForIdle().then(() => {
        idle = true;
      });

      await Promise.resolve();
      expect(idle).toBe(false);

      gate.resolve();
      await request;
      await drained;
      expect(idle).toBe(true);
    });
  });

  describe('failures', () => {
    it('should return the mint failure kind when nothing is cached', async () => {
      minter.failWith(new TokenIssuanceError('UpstreamRejected', 'Token endpoint returned 400: invalid_grant'));

      const result = await broker.issue();

      expect(result).toEqual({
        ok: false,
        kind: 'UpstreamRejected',
        message: 'Token endpoint returned 400: invalid_grant',
      });
      const stats = tracker.snapshot();
      expect(stats.failedRequests).toBe(1);
      expect(stats.consecutiveFailures).toBe(1);
      expect(stats.lastFailureKind).toBe('UpstreamRejected');
    });

    it('should classify unexpected errors as UpstreamUnreachable', async () => {
      minter.failWith(new Error('socket hang up'));

      const result = await broker.issue();

      expect(result).toEqual({ ok: false, kind: 'UpstreamUnreachable', message: 'socket hang up' });
    });

    it('should serve the previous token as stale_cache while it has not expired', async () => {
      await broker.issue();
      now += HOUR - 2 * MINUTE;
      minter.failWith(new TokenIssuanceError('UpstreamUnreachable', 'timed out'));

      const result = await broker.issue();

      expect(result).toEqual({
        ok: true,
        token: 'token-1',
        expiresAt: now + 2 * MINUTE,
        source: 'stale_cache',
      });
      const stats = tracker.snapshot();
      expect(stats.consecutiveFailures).toBe(1);
      expect(stats.failedRequests).toBe(1);
      expect(stats.successfulRequests).toBe(1);
    });

    it('should fail once the previous token has expired', async () => {
      await broker.issue();
      now += HOUR;
      minter.failWith(new TokenIssuanceError('UpstreamUnreachable', 'timed out'));

      const result = await broker.issue();

      expect(result).toEqual({ ok: false, kind: 'UpstreamUnreachable', message: 'timed out' });
    });

    it('should recover on the next successful mint', async () => {
      minter.failWith(new TokenIssuanceError('UpstreamUnreachable', 'timed out'));
      await broker.issue();
      await broker.issue();
      expect(tracker.snapshot().consecutiveFailures).toBe(2);

      minter.succeedWith(HOUR);
      const result = await broker.issue();

      expect(result).toMatchObject({ ok: true, source: 'minted' });
      expect(tracker.snapshot().consecutiveFailures).toBe(0);
      expect(minter.calls).toBe(3);
    });
  });

  describe('draining', () => {
    it('should refuse with ServiceUnavailable without minting', async () => {
      accepting = false;

      const result = await broker.issue();

      expect(result).toEqual({
        ok: false,
        kind: 'ServiceUnavailable',
        message: 'Server is shutting down. Not accepting new token requests.',
      });
      expect(minter.calls).toBe(0);
    });

    it('should not count refusals as failures', async () => {
      await broker.issue();
      accepting = false;
      await broker.issue();
      await broker.issue();

      const stats = tracker.snapshot();
      expect(stats.rejectedRequests).toBe(2);
      expect(stats.consecutiveFailures).toBe(0);
      expect(stats.failedRequests).toBe(0);
      expect(stats.totalRequests).toBe(1);
    });

    it('should count issue outcomes in metrics', async () => {
      await broker.issue();
      await broker.issue();
      accepting = false;
      await broker.issue();

      const output = await metrics.getMetrics();
      expect(output).toMatch(/token_issue_total\{outcome="minted"[^}]*\} 1\n/);
      expect(output).toMatch(/token_issue_total\{outcome="cache"[^}]*\} 1\n/);
      expect(output).toMatch(/token_issue_total\{outcome="ServiceUnavailable"[^}]*\} 1\n/);
    });
  });
});
