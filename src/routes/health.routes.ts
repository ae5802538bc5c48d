import type { FastifyInstance } from 'fastify';
import type { ConnectivityProbe } from '../services/connectivity-probe.service.js';
import type { HealthTracker } from '../services/health-tracker.service.js';
import type { MetricsService } from '../services/metrics.service.js';
import type { TokenBroker } from '../services/token-broker.service.js';
import type { ConnectivityResult, HealthStatus } from '../types/health.types.js';

export interface ServiceIdentity {
  getServiceAccountEmail(): string;
  getProjectId(): string | null;
}

export interface HealthRouteOptions {
  tracker: HealthTracker;
  probe: ConnectivityProbe;
  broker: TokenBroker;
  identity: ServiceIdentity;
  metrics: MetricsService;
  version: string;
}

/**
 * Statuses that should stop traffic / fail the health check
 */
export function isServingStatus(status: HealthStatus): boolean {
  return status === 'healthy' || status === 'degraded';
}

function describeConnectivity(result: ConnectivityResult | null) {
  if (result === null) {
    return { status: 'unknown' };
  }
  const checkedAt = new Date(result.checkedAt).toISOString();
  return result.reachable
    ? { status: 'up', latencyMs: result.latencyMs, checkedAt }
    : { status: 'down', reason: result.reason, checkedAt };
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRouteOptions) {
  const { tracker, probe, broker, identity, metrics } = options;

  // GET / - Basic check
  fastify.get('/', {
    schema: {
      description: 'Basic service check',
      tags: ['Health']
    }
  }, async () => {
    return {
      message: 'Cloud Token Server',
      status: tracker.status(),
      timestamp: new Date().toISOString(),
    };
  });

  // GET /health - Detailed health
  fastify.get<{ Querystring: { probe?: boolean } }>('/health', {
    schema: {
      description: 'Detailed health: status, issuance statistics, upstream connectivity. Pass probe=true to check connectivity now.',
      tags: ['Health'],
      querystring: {
        type: 'object',
        properties: {
          probe: { type: 'boolean' }
        }
      }
    }
  }, async (request, reply) => {
    if (request.query.probe === true) {
      await probe.check();
    }

    const status = tracker.status();
    const stats = tracker.snapshot();
    const cache = broker.getCacheInfo();

    reply.code(isServingStatus(status) ? 200 : 503);
    return {
      status,
      timestamp: new Date().toISOString(),
      version: options.version,
      serviceAccountEmail: identity.getServiceAccountEmail(),
      projectId: identity.getProjectId(),
      uptimeSeconds: Math.floor(tracker.getUptimeMs() / 1000),
      stats: {
        totalRequests: stats.totalRequests,
        successfulRequests: stats.successfulRequests,
        failedRequests: stats.failedRequests,
        rejectedRequests: stats.rejectedRequests,
        consecutiveFailures: stats.consecutiveFailures,
        successRate: Number(tracker.successRate().toFixed(4)),
        lastSuccessAt: stats.lastSuccessAt ? new Date(stats.lastSuccessAt).toISOString() : null,
        lastFailureAt: stats.lastFailureAt ? new Date(stats.lastFailureAt).toISOString() : null,
        lastFailureKind: stats.lastFailureKind,
      },
      tokenCache: {
        hasToken: cache.hasToken,
        expiresAt: cache.expiresAt ? new Date(cache.expiresAt).toISOString() : null,
        totalMints: cache.totalMints,
        cacheHits: cache.cacheHits,
      },
      upstream: describeConnectivity(probe.getLastResult()),
    };
  });

  // GET /readiness - Load balancer routing decision
  fastify.get('/readiness', {
    schema: {
      description: 'Readiness: 503 while not ready, unhealthy or shutting down',
      tags: ['Health']
    }
  }, async (_request, reply) => {
    const readiness = tracker.readiness();
    reply.code(readiness.ready ? 200 : 503);
    return {
      status: readiness.ready ? 'ready' : 'not_ready',
      health: readiness.status,
      shutdownState: readiness.shutdownState,
      reasons: readiness.reasons,
      timestamp: new Date().toISOString(),
    };
  });

  // GET /liveness - Restart decision
  fastify.get('/liveness', {
    schema: {
      description: 'Liveness: 503 once the service has stayed unhealthy past the grace window',
      tags: ['Health']
    }
  }, async (_request, reply) => {
    const liveness = tracker.liveness();
    reply.code(liveness.alive ? 200 : 503);
    return {
      status: liveness.alive ? 'alive' : 'restart_required',
      unhealthyForSeconds: Math.floor(liveness.unhealthyForMs / 1000),
      timestamp: new Date().toISOString(),
    };
  });

  // GET /metrics - Prometheus metrics
  fastify.get('/metrics', {
    schema: {
      description: 'Prometheus metrics endpoint - returns metrics in Prometheus text format',
      tags: ['Health']
    }
  }, async (_request, reply) => {
    const output = await metrics.getMetrics();
    reply.type(metrics.getContentType());
    return output;
  });

  // GET /docs-info - Usage information
  fastify.get('/docs-info', {
    schema: {
      description: 'Information about using this API',
      tags: ['Token']
    }
  }, async () => {
    return {
      usage: {
        endpoint: '/token',
        method: 'POST',
        authentication: 'Bearer token in Authorization header (required)',
        example: "curl -X POST 'https://your-server.com/token' -H 'Authorization: Bearer your-api-key'",
      },
      token_usage: {
        description: 'Use the returned access token to authenticate Google Cloud API requests',
        example: "curl -X POST 'https://documentai.googleapis.com/v1/projects/PROJECT/locations/LOCATION/processors/PROCESSOR:process' -H 'Authorization: Bearer ACCESS_TOKEN'",
      },
    };
  });
}
