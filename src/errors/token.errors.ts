import type { TokenFailureKind } from '../types/token.types.js';

/**
 * Raised when the service account credential cannot be loaded.
 * Fatal at startup: the server must not listen without a valid credential.
 */
export class ConfigError extends Error {
  readonly reason: string;

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Invalid service account configuration: ${reason}`);
    this.name = 'ConfigError';
    this.reason = reason;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

interface TokenIssuanceErrorOptions {
  statusCode?: number;
  cause?: unknown;
}

/**
 * Raised by the credential store when a mint fails
 */
export class TokenIssuanceError extends Error {
  readonly kind: TokenFailureKind;
  readonly statusCode: number | undefined;

  constructor(kind: TokenFailureKind, message: string, options: TokenIssuanceErrorOptions = {}) {
    super(message);
    this.name = 'TokenIssuanceError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    if (options.cause !== undefined) this.cause = options.cause;
  }
}

export function isTokenIssuanceError(error: unknown): error is TokenIssuanceError {
  return error instanceof TokenIssuanceError;
}

/**
 * Extracts error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}
