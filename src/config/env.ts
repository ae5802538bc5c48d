import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';
import type { HealthThresholds } from '../types/health.types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Load .env from the project root
dotenv.config({ path: resolve(__dirname, '../../.env') });

export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';
export const DEFAULT_CREDENTIAL_FILE = 'service-account-key.json';

export interface Config {
  port: number;
  nodeEnv: string;
  logLevel: string;
  apiKey: string;
  /** Inline JSON or a path to the key file; empty means the default file */
  serviceAccountJson: string;
  tokenUrl: string;
  scopes: string[];
  tokenCacheMarginMs: number;
  mintTimeoutMs: number;
  /** Defaults to the credential's token endpoint when unset */
  probeUrl: string | null;
  probeTimeoutMs: number;
  probeIntervalMs: number;
  health: HealthThresholds;
  shutdownTimeoutMs: number;
  forceShutdownTimeoutMs: number;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function defaultLogLevel(nodeEnv: string): string {
  if (nodeEnv === 'test') {
    return 'silent';
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const nodeEnv = env.NODE_ENV || 'development';
  const tokenUrl = env.GOOGLE_TOKEN_URL || GOOGLE_TOKEN_URL;

  return {
    port: parseInt(env.PORT || '8000', 10),
    nodeEnv,
    logLevel: env.LOG_LEVEL || defaultLogLevel(nodeEnv),
    apiKey: env.API_KEY || '',
    serviceAccountJson: env.SERVICE_ACCOUNT_JSON || '',
    tokenUrl,
    scopes: (env.TOKEN_SCOPES || CLOUD_PLATFORM_SCOPE)
      .split(/[\s,]+/)
      .filter((scope) => scope.length > 0),
    tokenCacheMarginMs: parseNumber(env.TOKEN_CACHE_MARGIN_MS, 300000), // 5 minutes
    mintTimeoutMs: parseNumber(env.MINT_TIMEOUT_MS, 10000),
    probeUrl: env.PROBE_URL || null,
    probeTimeoutMs: parseNumber(env.PROBE_TIMEOUT_MS, 3000),
    probeIntervalMs: parseNumber(env.PROBE_INTERVAL_MS, 30000),
    health: {
      unhealthyConsecutiveFailures: parseNumber(env.HEALTH_UNHEALTHY_CONSECUTIVE_FAILURES, 5),
      minRequestsForRate: parseNumber(env.HEALTH_MIN_REQUESTS_FOR_RATE, 10),
      unhealthySuccessRate: parseNumber(env.HEALTH_UNHEALTHY_SUCCESS_RATE, 0.5),
      degradedSuccessRate: parseNumber(env.HEALTH_DEGRADED_SUCCESS_RATE, 0.8),
      livenessGraceMs: parseNumber(env.LIVENESS_GRACE_MS, 300000), // 5 minutes
    },
    shutdownTimeoutMs: parseNumber(env.SHUTDOWN_TIMEOUT_MS, 25000),
    forceShutdownTimeoutMs: parseNumber(env.FORCE_SHUTDOWN_TIMEOUT_MS, 30000),
  };
}

export const config: Config = loadConfig();
