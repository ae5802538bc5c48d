import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { tokenRoutes } from './routes/token.routes.js';
import { healthRoutes, type ServiceIdentity } from './routes/health.routes.js';
import type { ApiKeyService } from './services/api-key.service.js';
import type { ConnectivityProbe } from './services/connectivity-probe.service.js';
import type { HealthTracker } from './services/health-tracker.service.js';
import type { MetricsService } from './services/metrics.service.js';
import type { TokenBroker } from './services/token-broker.service.js';

export const APP_VERSION = '1.0.0';

export interface AppServices {
  broker: TokenBroker;
  tracker: HealthTracker;
  probe: ConnectivityProbe;
  identity: ServiceIdentity;
  apiKeys: ApiKeyService;
  metrics: MetricsService;
}

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  /** Serve OpenAPI docs at /docs */
  docs?: boolean;
}

/**
 * Builds the Fastify app around already-initialized services
 */
export async function buildApp(services: AppServices, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? request.url;
    services.metrics.recordApiRequest(
      request.method,
      route,
      reply.statusCode,
      reply.elapsedTime / 1000
    );
  });

  // Swagger collects routes as they are added, so it goes first
  if (options.docs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'Cloud Token Server',
          description: 'Generate short-lived Google Cloud access tokens from a service account',
          version: APP_VERSION,
        },
        tags: [
          { name: 'Token', description: 'Access token issuance' },
          { name: 'Health', description: 'Health and monitoring endpoints' }
        ],
        components: {
          securitySchemes: {
            bearerAuth: {
              type: 'http',
              scheme: 'bearer',
            }
          }
        }
      }
    });
  }

  await fastify.register(tokenRoutes, {
    broker: services.broker,
    apiKeys: services.apiKeys,
  });

  await fastify.register(healthRoutes, {
    tracker: services.tracker,
    probe: services.probe,
    broker: services.broker,
    identity: services.identity,
    metrics: services.metrics,
    version: APP_VERSION,
  });

  if (options.docs) {
    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
        displayRequestDuration: true,
      },
      staticCSP: true,
    });
  }

  return fastify;
}
