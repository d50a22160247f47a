/**
 * OAuth 2.1 authorization server (authorization code + PKCE).
 *
 * Flow:
 * 1. GET  /.well-known/oauth-authorization-server -> endpoint metadata
 * 2. GET  /authorize -> stores the grant, 302 back to the client with code + state
 * 3. POST /token     -> validates code, client, redirect URI and PKCE, issues a bearer token
 *
 * There is no login step and no client registration: any client_id and
 * redirect_uri pair is accepted at /authorize and checked again at /token.
 */

import { randomBytes, randomUUID } from 'node:crypto';
import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AuthorizationCodeStore } from './code-store.js';
import { TokenStore } from './token-store.js';
import { PKCE_METHOD, verifyPkce } from './pkce.js';
import {
  OAuthError,
  InvalidRequestError,
  InvalidGrantError,
  ClientMismatchError,
  PkceFailureError,
  UnsupportedGrantTypeError,
  UnsupportedResponseTypeError,
} from '../lib/errors.js';
import { logger, redact } from '../lib/logger.js';

export interface AuthorizationServerMetadata {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  jwks_uri: string;
  response_types_supported: string[];
  grant_types_supported: string[];
  code_challenge_methods_supported: string[];
  token_endpoint_auth_methods_supported: string[];
}

export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
}

function requiredString(field: string) {
  return z
    .string({
      required_error: `Missing required parameter: ${field}`,
      invalid_type_error: `Parameter ${field} must be a single string`,
    })
    .min(1, `Missing required parameter: ${field}`);
}

const authorizeParamsSchema = z.object({
  response_type: requiredString('response_type'),
  client_id: requiredString('client_id'),
  redirect_uri: requiredString('redirect_uri'),
  scope: requiredString('scope'),
  state: requiredString('state'),
  code_challenge: requiredString('code_challenge'),
  code_challenge_method: requiredString('code_challenge_method'),
});

const tokenParamsSchema = z.object({
  code: requiredString('code'),
  redirect_uri: requiredString('redirect_uri'),
  client_id: requiredString('client_id'),
  code_verifier: requiredString('code_verifier'),
});

export type AuthorizeParams = z.infer<typeof authorizeParamsSchema>;
export type TokenParams = z.infer<typeof tokenParamsSchema> & { grant_type: string };

function parseParams<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new InvalidRequestError(result.error.errors[0]?.message ?? 'Invalid request');
  }
  return result.data;
}

/**
 * Holds the grant/token state transitions. Kept separate from the Express
 * wiring so the state machine can be exercised directly.
 */
export class AuthorizationServer {
  constructor(
    private readonly codeStore: AuthorizationCodeStore,
    private readonly tokenStore: TokenStore,
  ) {}

  metadata(baseUrl: string): AuthorizationServerMetadata {
    return {
      issuer: baseUrl,
      authorization_endpoint: `${baseUrl}/authorize`,
      token_endpoint: `${baseUrl}/token`,
      jwks_uri: `${baseUrl}/jwks.json`,
      response_types_supported: ['code'],
      grant_types_supported: ['authorization_code'],
      code_challenge_methods_supported: [PKCE_METHOD],
      token_endpoint_auth_methods_supported: ['none'],
    };
  }

  /**
   * NO_GRANT -> GRANT_PENDING. Returns the URL to redirect the user agent to.
   */
  authorize(input: unknown): string {
    const params = parseParams(authorizeParamsSchema, input);

    if (params.response_type !== 'code') {
      throw new UnsupportedResponseTypeError(params.response_type);
    }
    if (params.code_challenge_method !== PKCE_METHOD) {
      throw new InvalidRequestError(
        `Unsupported code_challenge_method: ${params.code_challenge_method}. Only ${PKCE_METHOD} is supported`
      );
    }

    const code = this.codeStore.create({
      clientId: params.client_id,
      redirectUri: params.redirect_uri,
      codeChallenge: params.code_challenge,
      scope: params.scope,
    });

    logger.info('OAuth authorize: code issued', { clientId: params.client_id });
    return appendToRedirect(params.redirect_uri, { code, state: params.state });
  }

  /**
   * GRANT_PENDING -> TOKEN_ISSUED. The grant is consumed on lookup, so a
   * failed exchange also invalidates the code.
   */
  async exchange(input: unknown): Promise<TokenResponse> {
    const grantType = z.object({ grant_type: requiredString('grant_type') });
    const { grant_type } = parseParams(grantType, input);
    if (grant_type !== 'authorization_code') {
      throw new UnsupportedGrantTypeError(grant_type);
    }

    const params = parseParams(tokenParamsSchema, input);

    const grant = this.codeStore.take(params.code);
    if (!grant) {
      logger.warn('Token exchange with unknown code', { code: redact(params.code) });
      throw new InvalidGrantError();
    }
    if (grant.clientId !== params.client_id || grant.redirectUri !== params.redirect_uri) {
      logger.warn('Token exchange client mismatch', {
        expectedClientId: grant.clientId,
        clientId: params.client_id,
      });
      throw new ClientMismatchError();
    }
    if (!verifyPkce(params.code_verifier, grant.codeChallenge)) {
      logger.warn('Token exchange PKCE verification failed', { clientId: params.client_id });
      throw new PkceFailureError();
    }

    const accessToken = randomBytes(32).toString('hex');
    const sessionId = randomUUID();
    await this.tokenStore.issue(accessToken, sessionId);

    logger.info('Token issued', { clientId: params.client_id, token: redact(accessToken) });

    return { access_token: accessToken, token_type: 'Bearer' };
  }
}

/**
 * Adds the response parameters to the client's redirect URI. Absolute URIs
 * keep their existing query; anything else gets the parameters appended as is.
 */
export function appendToRedirect(redirectUri: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params);

  let target: URL;
  try {
    target = new URL(redirectUri);
  } catch {
    const separator = !redirectUri.includes('?') ? '?' : /[?&]$/.test(redirectUri) ? '' : '&';
    return `${redirectUri}${separator}${query.toString()}`;
  }

  for (const [key, value] of query) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

export interface AuthRouterOptions {
  server: AuthorizationServer;
  /** Fixed external origin; when unset it is derived from each request */
  publicBaseUrl?: string;
}

function sendOAuthError(res: Response, error: OAuthError): void {
  res.status(error.status).set('Cache-Control', 'no-store').json(error.toResponseObject());
}

/**
 * Builds the Express router serving the three OAuth endpoints.
 */
export function createAuthRouter(options: AuthRouterOptions): Router {
  const { server, publicBaseUrl } = options;
  const router = Router();

  const baseUrlFor = (req: Request): string =>
    publicBaseUrl ?? `${req.protocol}://${req.get('host') ?? 'localhost'}`;

  router.get('/.well-known/oauth-authorization-server', (req: Request, res: Response) => {
    res.json(server.metadata(baseUrlFor(req)));
  });

  router.get('/authorize', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.redirect(302, server.authorize(req.query));
    } catch (error) {
      if (error instanceof OAuthError) {
        logger.warn('OAuth authorize rejected', { detail: error.message });
        sendOAuthError(res, error);
        return;
      }
      next(error);
    }
  });

  router.post('/token', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const tokens = await server.exchange(req.body ?? {});
      res.status(200).set('Cache-Control', 'no-store').json(tokens);
    } catch (error) {
      if (error instanceof OAuthError) {
        sendOAuthError(res, error);
        return;
      }
      next(error);
    }
  });

  return router;
}
