import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Container } from '../../../container';
import { confirmEnableMfa, disableMfa, requestEnableMfa } from '../../../usecases/accounts/mfaSettings';
import { createRequireAuth, principalOf } from '../meta/requireAuth';
import { accountViewSchema, toAccountView } from '../presenters';

const PasswordBody = z.object({ password: z.string().min(1) });
const CodeBody = z.object({ code: z.string().regex(/^\d+$/) });

const passwordBodySchema = {
  type: 'object',
  required: ['password'],
  properties: { password: { type: 'string' } },
} as const;

export const mfaRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const requireAuth = createRequireAuth(container);

  app.post('/v1/auth/mfa/enable/request', {
    preHandler: requireAuth,
    schema: {
      description: 'Send a setup code to confirm enabling MFA',
      tags: ['mfa'],
      security: [{ bearerAuth: [] }],
      body: passwordBodySchema,
    },
  }, async (request, reply) => {
    const body = PasswordBody.parse(request.body);
    await requestEnableMfa(container, { accountId: principalOf(request).subject, password: body.password });
    reply.status(202).send({ status: 'accepted' });
  });

  app.post('/v1/auth/mfa/enable/confirm', {
    preHandler: requireAuth,
    schema: {
      description: 'Enable MFA with the delivered setup code',
      tags: ['mfa'],
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['code'],
        properties: { code: { type: 'string' } },
      },
      response: { 200: accountViewSchema },
    },
  }, async (request, reply) => {
    const body = CodeBody.parse(request.body);
    const account = await confirmEnableMfa(container, { accountId: principalOf(request).subject, code: body.code });
    reply.status(200).send(toAccountView(account));
  });

  app.post('/v1/auth/mfa/disable', {
    preHandler: requireAuth,
    schema: {
      description: 'Disable MFA for the current account',
      tags: ['mfa'],
      security: [{ bearerAuth: [] }],
      body: passwordBodySchema,
      response: { 200: accountViewSchema },
    },
  }, async (request, reply) => {
    const body = PasswordBody.parse(request.body);
    const account = await disableMfa(container, { accountId: principalOf(request).subject, password: body.password });
    reply.status(200).send(toAccountView(account));
  });
};
