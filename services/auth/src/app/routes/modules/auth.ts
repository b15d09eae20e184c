import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Container } from '../../../container';
import { ROLES } from '../../../domain/entities/account';
import { login, loginForTokens } from '../../../usecases/auth/login';
import { verifyMfaLogin } from '../../../usecases/auth/verifyMfaLogin';
import { refresh } from '../../../usecases/auth/refresh';
import { logout } from '../../../usecases/auth/logout';
import { register } from '../../../usecases/accounts/register';
import { createRequireAuth, principalOf, readBearer } from '../meta/requireAuth';
import { createRateLimit } from '../meta/rateLimit';
import { accountViewSchema, credentialsBodySchema, toAccountView, toTokenResponse, tokenResponseSchema } from '../presenters';

export const EmailSchema = z.string().trim().email().max(254);
export const PasswordSchema = z.string().min(8).max(1024);

const RegisterSchema = z.object({
  email: EmailSchema,
  password: PasswordSchema,
  role: z.enum(ROLES).optional()
});

export const LoginSchema = z.object({
  email: EmailSchema,
  password: z.string().min(1).max(1024)
});

export const MfaLoginSchema = z.object({
  challenge_token: z.string().min(1),
  code: z.string().regex(/^\d+$/)
});

const RefreshSchema = z.object({ refresh_token: z.string().min(1) });

export const authRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const requireAuth = createRequireAuth(container);
  const rateLimit = createRateLimit(container);

  app.post('/v1/auth/register', {
    onRequest: rateLimit,
    schema: {
      description: 'Create an account; opens its first session unless email verification gates login',
      tags: ['auth'],
      body: {
        type: 'object',
        required: ['email', 'password'],
        properties: {
          email: { type: 'string' },
          password: { type: 'string' },
          role: { type: 'string', enum: [...ROLES] },
        },
      },
      response: {
        201: {
          type: 'object',
          properties: {
            account: accountViewSchema,
            email_verification_required: { type: 'boolean' },
            ...tokenResponseSchema.properties,
          },
        },
      },
    },
  }, async (request, reply) => {
    const body = RegisterSchema.parse(request.body);
    const result = await register(container, body);
    if (result.status === 'verification_required') {
      return reply.status(201).send({ account: toAccountView(result.account), email_verification_required: true });
    }
    return reply.status(201).send({ account: toAccountView(result.account), ...toTokenResponse(result.tokens) });
  });

  app.post('/v1/auth/login', {
    onRequest: rateLimit,
    schema: {
      description: 'Authenticate with email and password; MFA accounts receive a challenge instead of tokens',
      tags: ['auth'],
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
    return reply.status(200).send(toTokenResponse(result.tokens));
  });

  app.post('/v1/auth/token', {
    onRequest: rateLimit,
    schema: {
      description: 'Password grant; refused for accounts with MFA enabled',
      tags: ['auth'],
      body: credentialsBodySchema,
      response: { 200: tokenResponseSchema },
    },
  }, async (request, reply) => {
    const body = LoginSchema.parse(request.body);
    const tokens = await loginForTokens(container, { ...body, origin: request.ip });
    reply.status(200).send(toTokenResponse(tokens));
  });

  app.post('/v1/auth/login/mfa', {
    onRequest: rateLimit,
    schema: {
      description: 'Complete an MFA login with the delivered code',
      tags: ['auth'],
      body: {
        type: 'object',
        required: ['challenge_token', 'code'],
        properties: {
          challenge_token: { type: 'string' },
          code: { type: 'string' },
        },
      },
      response: { 200: tokenResponseSchema },
    },
  }, async (request, reply) => {
    const body = MfaLoginSchema.parse(request.body);
    const tokens = await verifyMfaLogin(container, {
      challengeToken: body.challenge_token,
      code: body.code,
      origin: request.ip
    });
    reply.status(200).send(toTokenResponse(tokens));
  });

  app.post('/v1/auth/refresh', {
    onRequest: rateLimit,
    schema: {
      description: 'Rotate a refresh token; the bearer access token, when sent, is revoked',
      tags: ['auth'],
      body: {
        type: 'object',
        required: ['refresh_token'],
        properties: { refresh_token: { type: 'string' } },
      },
      response: { 200: tokenResponseSchema },
    },
  }, async (request, reply) => {
    const body = RefreshSchema.parse(request.body);
    const tokens = await refresh(container, {
      refreshToken: body.refresh_token,
      previousAccessToken: readBearer(request)
    });
    reply.status(200).send(toTokenResponse(tokens));
  });

  app.post('/v1/auth/logout', {
    schema: {
      description: 'End the current session',
      tags: ['auth'],
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['refresh_token'],
        properties: { refresh_token: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    const body = RefreshSchema.parse(request.body);
    await logout(container, { accessToken: readBearer(request), refreshToken: body.refresh_token });
    reply.status(204).send();
  });

  app.get('/v1/auth/me', {
    preHandler: requireAuth,
    schema: {
      description: 'Current account',
      tags: ['auth'],
      security: [{ bearerAuth: [] }],
      response: { 200: accountViewSchema },
    },
  }, async (request, reply) => {
    const account = await container.services.credentials.getById(principalOf(request).subject);
    reply.status(200).send(toAccountView(account));
  });
};
