import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ApiKeyService } from '../services/api-key.service.js';
import type { TokenBroker } from '../services/token-broker.service.js';
import type { TokenFailureKind } from '../types/token.types.js';

export interface TokenRouteOptions {
  broker: TokenBroker;
  apiKeys: ApiKeyService;
  /** Seconds advertised in Retry-After while draining */
  retryAfterSec?: number;
}

const errorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' }
  }
} as const;

/**
 * HTTP status for each issuance failure kind
 */
export function statusCodeForFailure(kind: TokenFailureKind): 500 | 502 | 503 {
  switch (kind) {
    case 'ServiceUnavailable':
    case 'UpstreamUnreachable':
      return 503;
    case 'UpstreamRejected':
    case 'UpstreamMalformedResponse':
      return 502;
    case 'CredentialInvalid':
      return 500;
  }
}

export async function tokenRoutes(fastify: FastifyInstance, options: TokenRouteOptions) {
  const { broker, apiKeys } = options;
  const retryAfterSec = options.retryAfterSec ?? 30;

  const verifyApiKey = async (request: FastifyRequest, reply: FastifyReply) => {
    if (!apiKeys.verify(request.headers.authorization)) {
      return reply
        .code(401)
        .header('WWW-Authenticate', 'Bearer')
        .send({ error: 'Unauthorized', message: 'Invalid API key' });
    }
  };

  // POST /token - Issue a Google Cloud access token
  fastify.post('/token', {
    preHandler: verifyApiKey,
    schema: {
      description: 'Generate a Google Cloud access token. Requires the API key as a bearer value.',
      tags: ['Token'],
      security: [{ bearerAuth: [] }],
      response: {
        200: {
          description: 'Access token issued',
          type: 'object',
          properties: {
            access_token: { type: 'string' },
            token_type: { type: 'string' },
            expires_in: { type: 'integer' },
            expires_at: { type: 'string', format: 'date-time' }
          }
        },
        401: { description: 'Missing or invalid API key', ...errorSchema },
        500: { description: 'Credential could not sign the assertion', ...errorSchema },
        502: { description: 'Token issuer rejected the request or answered malformed', ...errorSchema },
        503: { description: 'Token issuer unreachable or server shutting down', ...errorSchema }
      }
    }
  }, async (_request, reply) => {
    const result = await broker.issue();

    if (!result.ok) {
      if (result.kind === 'ServiceUnavailable') {
        reply.header('Retry-After', String(retryAfterSec));
      }
      return reply.code(statusCodeForFailure(result.kind)).send({
        error: result.kind,
        message: `Failed to generate access token: ${result.message}`,
      });
    }

    const expiresIn = Math.max(0, Math.floor((result.expiresAt - Date.now()) / 1000));
    return reply.code(200).send({
      access_token: result.token,
      token_type: 'Bearer',
      expires_in: expiresIn,
      expires_at: new Date(result.expiresAt).toISOString(),
    });
  });
}
