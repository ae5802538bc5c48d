import { createPrivateKey } from 'crypto';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import axios, { type AxiosInstance } from 'axios';
import jwt from 'jsonwebtoken';
import validator from 'validator';
import { ConfigError, TokenIssuanceError, getErrorMessage } from '../errors/token.errors.js';
import { DEFAULT_CREDENTIAL_FILE } from '../config/env.js';
import {
  classifyNetworkFailure,
  describeErrorBody,
  isRecord,
  isTransientStatus,
} from '../utils/http-errors.js';
import type {
  CredentialSource,
  CredentialStoreConfig,
  MintedToken,
  ServiceAccountCredential,
  TokenEndpointResponse,
  TokenMinter,
} from '../types/token.types.js';

const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const DEFAULT_ASSERTION_LIFETIME_SEC = 3600;
/** Lifetime assumed when the issuer omits expires_in */
const DEFAULT_EXPIRES_IN_SEC = 3600;

function optionalString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field];
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`"${field}" must be a string`);
  }
  return value;
}

function isHttpsUrl(value: string): boolean {
  return validator.isURL(value, {
    protocols: ['https'],
    require_protocol: true,
    require_tld: false,
  });
}

/**
 * Validates a parsed key file and produces an immutable credential
 */
export function parseServiceAccountKey(
  raw: unknown,
  source: CredentialSource,
  defaultTokenUrl: string
): ServiceAccountCredential {
  if (!isRecord(raw)) {
    throw new ConfigError('service account key must be a JSON object');
  }

  const type = optionalString(raw, 'type');
  if (type !== undefined && type !== 'service_account') {
    throw new ConfigError(`unsupported credential type "${type}"`);
  }

  const clientEmail = optionalString(raw, 'client_email');
  if (!clientEmail) {
    throw new ConfigError('"client_email" is missing');
  }
  if (!validator.isEmail(clientEmail)) {
    throw new ConfigError('"client_email" is not a valid email address');
  }

  const rawKey = optionalString(raw, 'private_key');
  if (!rawKey) {
    throw new ConfigError('"private_key" is missing');
  }
  // Keys pasted into env vars often keep their newlines escaped
  const privateKey = rawKey.replace(/\\n/g, '\n');
  try {
    const key = createPrivateKey(privateKey);
    if (key.asymmetricKeyType !== 'rsa') {
      throw new ConfigError(`"private_key" must be an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError('"private_key" is not a valid PEM private key', { cause: error });
  }

  const tokenUri = optionalString(raw, 'token_uri') ?? defaultTokenUrl;
  if (!isHttpsUrl(tokenUri)) {
    throw new ConfigError(`token endpoint "${tokenUri}" is not an https URL`);
  }

  const privateKeyId = optionalString(raw, 'private_key_id');
  const projectId = optionalString(raw, 'project_id');

  return Object.freeze({
    clientEmail,
    privateKey,
    tokenUri,
    source,
    ...(privateKeyId !== undefined && { privateKeyId }),
    ...(projectId !== undefined && { projectId }),
  });
}

function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${what} is not valid JSON`, { cause: error });
  }
}

function readKeyFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read key file ${path}: ${getErrorMessage(error)}`, { cause: error });
  }
}

/**
 * Loads the service account credential.
 *
 * `source` is inline JSON or a path to a key file; when empty the
 * default key file in the working directory is used.
 */
export function loadCredential(
  source: string,
  defaultTokenUrl: string,
  cwd: string = process.cwd()
): ServiceAccountCredential {
  const trimmed = source.trim();

  if (trimmed === '') {
    const path = resolve(cwd, DEFAULT_CREDENTIAL_FILE);
    return parseServiceAccountKey(parseJson(readKeyFile(path), path), 'default-file', defaultTokenUrl);
  }

  if (trimmed.startsWith('{')) {
    return parseServiceAccountKey(parseJson(trimmed, 'SERVICE_ACCOUNT_JSON'), 'inline', defaultTokenUrl);
  }

  const path = resolve(cwd, trimmed);
  return parseServiceAccountKey(parseJson(readKeyFile(path), path), 'file', defaultTokenUrl);
}

/**
 * Credential Store
 *
 * Holds the service account credential and exchanges it for access tokens:
 * - Signs an RS256 JWT assertion with the account's private key
 * - Posts it to the token endpoint (jwt-bearer grant)
 * - Classifies failures into TokenIssuanceError kinds
 *
 * Nothing is cached here; caching belongs to the TokenBroker.
 */
export class CredentialStore implements TokenMinter {
  private readonly credential: ServiceAccountCredential;
  private readonly config: Required<CredentialStoreConfig>;
  private readonly http: AxiosInstance;

  constructor(
    credential: ServiceAccountCredential,
    config: CredentialStoreConfig,
    http: AxiosInstance = axios.create()
  ) {
    this.credential = credential;
    this.config = {
      ...config,
      assertionLifetimeSec: config.assertionLifetimeSec ?? DEFAULT_ASSERTION_LIFETIME_SEC,
    };
    this.http = http;
  }

  /**
   * Mints a fresh access token from the upstream issuer
   */
  async mintToken(): Promise<MintedToken> {
    const assertion = this.createAssertion();

    let data: unknown;
    try {
      const response = await this.http.post<TokenEndpointResponse>(
        this.credential.tokenUri,
        new URLSearchParams({
          grant_type: JWT_BEARER_GRANT,
          assertion,
        }).toString(),
        {
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
          },
          timeout: this.config.mintTimeoutMs,
        }
      );
      data = response.data;
    } catch (error) {
      throw this.classifyUpstreamError(error);
    }

    return this.parseTokenResponse(data, Date.now());
  }

  /**
   * Creates the signed JWT assertion
   */
  private createAssertion(): string {
    const now = Math.floor(Date.now() / 1000);
    const payload = {
      iss: this.credential.clientEmail,
      sub: this.credential.clientEmail,
      scope: this.config.scopes.join(' '),
      aud: this.credential.tokenUri,
      iat: now,
      exp: now + this.config.assertionLifetimeSec,
    };

    try {
      return jwt.sign(payload, this.credential.privateKey, {
        algorithm: 'RS256',
        ...(this.credential.privateKeyId !== undefined && { keyid: this.credential.privateKeyId }),
      });
    } catch (error) {
      throw new TokenIssuanceError(
        'CredentialInvalid',
        `Failed to sign assertion: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private parseTokenResponse(data: unknown, obtainedAt: number): MintedToken {
    if (!isRecord(data)) {
      throw new TokenIssuanceError('UpstreamMalformedResponse', 'Token endpoint returned a non-JSON body');
    }

    const accessToken = data.access_token;
    if (typeof accessToken !== 'string' || accessToken.length === 0) {
      throw new TokenIssuanceError('UpstreamMalformedResponse', 'Token endpoint response is missing access_token');
    }

    const expiresIn = data.expires_in ?? DEFAULT_EXPIRES_IN_SEC;
    if (typeof expiresIn !== 'number' || !Number.isFinite(expiresIn) || expiresIn <= 0) {
      throw new TokenIssuanceError(
        'UpstreamMalformedResponse',
        `Token endpoint returned an invalid expires_in: ${JSON.stringify(expiresIn)}`
      );
    }

    return {
      token: accessToken,
      expiresAt: obtainedAt + expiresIn * 1000,
      obtainedAt,
    };
  }

  private classifyUpstreamError(error: unknown): TokenIssuanceError {
    if (axios.isAxiosError(error) && error.response) {
      const statusCode = error.response.status;
      const detail = describeErrorBody(error.response.data) ?? error.message;
      const kind = isTransientStatus(statusCode) ? 'UpstreamUnreachable' : 'UpstreamRejected';
      return new TokenIssuanceError(kind, `Token endpoint returned ${statusCode}: ${detail}`, {
        statusCode,
        cause: error,
      });
    }

    const reason = classifyNetworkFailure(error);
    const message = reason === 'timeout'
      ? `Token endpoint did not respond within ${this.config.mintTimeoutMs}ms`
      : `Token endpoint unreachable (${reason}): ${getErrorMessage(error)}`;
    return new TokenIssuanceError('UpstreamUnreachable', message, { cause: error });
  }

  getCredential(): ServiceAccountCredential {
    return this.credential;
  }

  getServiceAccountEmail(): string {
    return this.credential.clientEmail;
  }

  getProjectId(): string | null {
    return this.credential.projectId ?? null;
  }
}
