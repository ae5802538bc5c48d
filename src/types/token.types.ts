/**
 * Token issuance types
 */

/**
 * Where a credential was loaded from
 */
export type CredentialSource = 'inline' | 'file' | 'default-file';

/**
 * Validated service account credential (immutable once loaded)
 */
export interface ServiceAccountCredential {
  readonly clientEmail: string;
  readonly privateKey: string;
  readonly tokenUri: string;
  readonly privateKeyId?: string;
  readonly projectId?: string;
  readonly source: CredentialSource;
}

/**
 * Response from the OAuth2 token endpoint
 */
export interface TokenEndpointResponse {
  access_token?: unknown;
  expires_in?: unknown;
  token_type?: unknown;
}

/**
 * Access token obtained from the upstream issuer
 */
export interface MintedToken {
  token: string;
  expiresAt: number; // Unix timestamp in milliseconds
  obtainedAt: number; // Unix timestamp in milliseconds
}

export type TokenFailureKind =
  | 'CredentialInvalid'
  | 'UpstreamUnreachable'
  | 'UpstreamRejected'
  | 'UpstreamMalformedResponse'
  | 'ServiceUnavailable';

export type TokenSource = 'minted' | 'cache' | 'stale_cache';

/**
 * Outcome of a single issue() call
 */
export type TokenResult =
  | {
      ok: true;
      token: string;
      expiresAt: number;
      source: TokenSource;
    }
  | {
      ok: false;
      kind: TokenFailureKind;
      message: string;
    };

/**
 * Credential store configuration
 */
export interface CredentialStoreConfig {
  scopes: string[];
  mintTimeoutMs: number;
  /** Lifetime requested for the signed assertion, in seconds */
  assertionLifetimeSec?: number;
}

/**
 * Token broker configuration
 */
export interface TokenBrokerConfig {
  /** Reuse a cached token until this many milliseconds before its expiry */
  cacheMarginMs: number;
}

/**
 * Token broker cache info
 */
export interface TokenCacheInfo {
  hasToken: boolean;
  expiresAt: number | null;
  obtainedAt: number | null;
  totalMints: number;
  cacheHits: number;
}

/**
 * Anything that can exchange the credential for a fresh token
 */
export interface TokenMinter {
  mintToken(): Promise<MintedToken>;
}
