import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Container } from '../../../container';
import type { TokenPair } from '../../../domain/entities/tokens';
import {
  TokenExpiredError,
  TokenInvalidSignatureError,
  TokenTypeMismatchError
} from '../../../domain/errors';
import { login } from '../../../usecases/auth/login';
import { verifyMfaLogin } from '../../../usecases/auth/verifyMfaLogin';
import { refresh } from '../../../usecases/auth/refresh';
import { logout } from '../../../usecases/auth/logout';
import { createRateLimit } from '../meta/rateLimit';
import { readBearer } from '../meta/requireAuth';
import { credentialsBodySchema } from '../presenters';
import { LoginSchema, MfaLoginSchema } from './auth';

export const ACCESS_COOKIE = 'access_token';
export const REFRESH_COOKIE = 'refresh_token';

// The refresh cookie only travels to the cookie endpoints.
const REFRESH_COOKIE_PATH = '/v1/auth/cookie';

const sessionResponseSchema = {
  type: 'object',
  properties: {
    authenticated: { type: 'boolean' },
    expires_in: { type: 'number', description: 'Access cookie lifetime in seconds' },
  },
} as const;

const isTokenError = (error: unknown) =>
  error instanceof TokenExpiredError ||
  error instanceof TokenInvalidSignatureError ||
  error instanceof TokenTypeMismatchError;

/** Browser transport: the same sessions as the JSON endpoints, carried in HttpOnly SameSite=Strict cookies. */
export const cookieSessionRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const { config } = container;
  const rateLimit = createRateLimit(container);

  const baseCookie = {
    httpOnly: true,
    secure: config.AUTH_COOKIE_SECURE,
    sameSite: 'strict',
    domain: config.AUTH_COOKIE_DOMAIN
  } as const;

  const sendSession = (reply: FastifyReply, tokens: TokenPair) => {
    reply
      .setCookie(ACCESS_COOKIE, tokens.accessToken, { ...baseCookie, path: '/', maxAge: tokens.expiresIn })
      .setCookie(REFRESH_COOKIE, tokens.refreshToken, {
        ...baseCookie,
        path: REFRESH_COOKIE_PATH,
        maxAge: config.REFRESH_TOKEN_TTL_SECONDS
      });
    return reply.status(200).send({ authenticated: true, expires_in: tokens.expiresIn });
  };

  const clearSession = (reply: FastifyReply) =>
    reply
      .clearCookie(ACCESS_COOKIE, { ...baseCookie, path: '/' })
      .clearCookie(REFRESH_COOKIE, { ...baseCookie, path: REFRESH_COOKIE_PATH });

  const accessTokenOf = (request: FastifyRequest) => readBearer(request) ?? request.cookies[ACCESS_COOKIE];

  app.post('/v1/auth/cookie/login', {
    onRequest: rateLimit,
    schema: {
      description: 'Cookie login; MFA accounts receive a challenge and no cookies',
      tags: ['cookie'],
      body: credentialsBodySchema,
    },
  }, async (request, reply) => {
    const body = LoginSchema.parse(request.body);
    const result = await login(container, { ...body, origin: request.ip });
    if (result.status === 'mfa_required') {
      return reply.status(200).send({
        mfa_required: true,
        challenge_token: result.challengeToken,
        expires_in: result.expiresIn
      });
    }
    return sendSession(reply, result.tokens);
  });

  app.post('/v1/auth/cookie/login/mfa', {
    onRequest: rateLimit,
    schema: {
      description: 'Complete an MFA login and set the session cookies',
      tags: ['cookie'],
      body: {
        type: 'object',
        required: ['challenge_token', 'code'],
        properties: {
          challenge_token: { type: 'string' },
          code: { type: 'string' },
        },
      },
      response: { 200: sessionResponseSchema },
    },
  }, async (request, reply) => {
    const body = MfaLoginSchema.parse(request.body);
    const tokens = await verifyMfaLogin(container, {
      challengeToken: body.challenge_token,
      code: body.code,
      origin: request.ip
    });
    return sendSession(reply, tokens);
  });

  app.post('/v1/auth/cookie/refresh', {
    onRequest: rateLimit,
    schema: {
      description: 'Rotate the refresh cookie; the current access cookie is revoked',
      tags: ['cookie'],
      response: { 200: sessionResponseSchema },
    },
  }, async (request, reply) => {
    const refreshToken = request.cookies[REFRESH_COOKIE];
    if (!refreshToken) {
      throw new TokenInvalidSignatureError('refresh cookie required');
    }
    const tokens = await refresh(container, { refreshToken, previousAccessToken: accessTokenOf(request) });
    return sendSession(reply, tokens);
  });

  app.post('/v1/auth/cookie/logout', {
    schema: {
      description: 'End the cookie session and clear both cookies',
      tags: ['cookie'],
    },
  }, async (request, reply) => {
    const refreshToken = request.cookies[REFRESH_COOKIE];
    if (refreshToken) {
      try {
        await logout(container, { accessToken: accessTokenOf(request), refreshToken });
      } catch (error) {
        if (!isTokenError(error)) {
          throw error;
        }
        request.log.debug({ err: error }, 'cookie logout with an unusable refresh token');
      }
    }
    return clearSession(reply).status(204).send();
  });
};
