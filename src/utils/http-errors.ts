import axios from 'axios';
import type { ConnectivityFailureReason } from '../types/health.types.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);
const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Classifies a request that never produced an HTTP response
 */
export function classifyNetworkFailure(error: unknown): ConnectivityFailureReason {
  if (axios.isCancel(error)) {
    return 'aborted';
  }
  if (axios.isAxiosError(error)) {
    const code = error.code ?? '';
    if (TIMEOUT_CODES.has(code)) {
      return 'timeout';
    }
    if (DNS_CODES.has(code)) {
      return 'dns';
    }
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return 'timeout';
  }
  return 'network';
}

/**
 * Whether an upstream status means the issuer is failing rather than refusing us
 */
export function isTransientStatus(statusCode: number): boolean {
  return statusCode === 408 || statusCode === 429 || statusCode >= 500;
}

/**
 * Extracts the OAuth2 error description from an error response body
 */
export function describeErrorBody(data: unknown): string | null {
  if (isRecord(data)) {
    const description = data.error_description ?? data.message ?? data.error;
    if (typeof description === 'string' && description.length > 0) {
      return description;
    }
  }
  if (typeof data === 'string' && data.length > 0) {
    return data.length > 200 ? `${data.substring(0, 200)}...` : data;
  }
  return null;
}
