import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { AuthError, RateLimitedError, RefreshTokenReusedError } from '../../../domain/errors';

const STATUS_BY_CODE: Record<string, number> = {
  INVALID_CREDENTIALS: 401,
  ACCOUNT_INACTIVE: 403,
  ACCOUNT_LOCKED: 423,
  TOKEN_EXPIRED: 401,
  TOKEN_INVALID_SIGNATURE: 401,
  TOKEN_TYPE_MISMATCH: 401,
  TOKEN_REVOKED: 401,
  MFA_REQUIRED: 400,
  MFA_CODE_INVALID: 401,
  MFA_CODE_EXPIRED: 401,
  STORE_UNAVAILABLE: 503,
  ACCOUNT_EXISTS: 409,
  EMAIL_NOT_VERIFIED: 403,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  RATE_LIMITED: 429
};

export const registerErrorHandler = (app: FastifyInstance) => {
  app.setErrorHandler((error, _request, reply) => {
    // Reuse is an incident; the client only learns that the token was refused.
    if (error instanceof RefreshTokenReusedError) {
      return reply.status(401).send({ error: 'INVALID_TOKEN', message: 'invalid refresh token' });
    }
    if (error instanceof RateLimitedError) {
      reply.header('retry-after', String(error.retryAfterSeconds));
    }
    if (error instanceof AuthError) {
      if (error.code === 'STORE_UNAVAILABLE') {
        app.log.error({ err: error }, 'backing store unavailable');
      }
      return reply.status(STATUS_BY_CODE[error.code] ?? 400).send({ error: error.code, message: error.message });
    }
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'VALIDATION_FAILED', message: 'invalid request', issues: error.issues });
    }
    if (error.validation) {
      return reply.status(400).send({ error: 'VALIDATION_FAILED', message: error.message });
    }
    app.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({ error: 'INTERNAL', message: 'internal_error' });
  });
};
