import { config } from './config/env.js';
import { buildApp } from './app.js';
import { ConfigError } from './errors/token.errors.js';
import { ApiKeyService } from './services/api-key.service.js';
import { ConnectivityProbe, resolveProbeUrl } from './services/connectivity-probe.service.js';
import { CredentialStore, loadCredential } from './services/credential-store.service.js';
import { HealthTracker } from './services/health-tracker.service.js';
import { logger } from './services/logger.service.js';
import { metrics } from './services/metrics.service.js';
import { createShutdownCoordinator } from './services/shutdown-coordinator.service.js';
import { TokenBroker } from './services/token-broker.service.js';

const start = async () => {
  // 1. Credentials and API key: fatal before anything listens
  if (!config.apiKey) {
    logger.error('API_KEY is not set; refusing to start');
    process.exit(1);
  }

  let credentialStore: CredentialStore;
  try {
    const credential = loadCredential(config.serviceAccountJson, config.tokenUrl);
    credentialStore = new CredentialStore(credential, {
      scopes: config.scopes,
      mintTimeoutMs: config.mintTimeoutMs,
    });
    logger.credentialLoaded({
      clientEmail: credential.clientEmail,
      source: credential.source,
      tokenUri: credential.tokenUri,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Failed to load service account credentials', { reason: error.reason });
    } else {
      logger.error('Failed to load service account credentials', { error });
    }
    process.exit(1);
  }

  // 2. Core services
  const probe = new ConnectivityProbe({
    url: resolveProbeUrl(config.probeUrl, credentialStore.getCredential()),
    timeoutMs: config.probeTimeoutMs,
  });

  let broker: TokenBroker | null = null;
  let closeServer: (() => Promise<void>) | null = null;

  const shutdown = createShutdownCoordinator({
    timeout: config.shutdownTimeoutMs,
    forceTimeout: config.forceShutdownTimeoutMs,
    onDrainStart: () => {
      probe.stop();
    },
    onWaitForDrain: async () => {
      if (broker) {
        logger.info(`Waiting for ${broker.getInFlight()} in-flight token request(s)`);
        await broker.waitForIdle();
      }
    },
    onClose: async () => {
      if (closeServer) {
        await closeServer();
      }
    },
  });

  const tracker = new HealthTracker(config.health, {
    getShutdownState: () => shutdown.getState(),
    getConnectivity: () => probe.getLastResult(),
  });
  tracker.markCredentialLoaded();

  broker = new TokenBroker(credentialStore, { cacheMarginMs: config.tokenCacheMarginMs }, {
    tracker,
    isAccepting: () => shutdown.isAccepting(),
  });

  // 3. HTTP
  const fastify = await buildApp({
    broker,
    tracker,
    probe,
    identity: credentialStore,
    apiKeys: new ApiKeyService(config.apiKey),
    metrics,
  }, {
    docs: true,
    logger: config.nodeEnv === 'development' ? {
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    } : { level: config.logLevel },
  });
  closeServer = () => fastify.close();

  shutdown.registerHandlers();
  probe.start(config.probeIntervalMs);

  await fastify.listen({ port: config.port, host: '0.0.0.0' });
  logger.info(`Server running on port ${config.port}`);
};

start().catch((error: unknown) => {
  logger.error('Server failed to start', { error });
  process.exit(1);
});
