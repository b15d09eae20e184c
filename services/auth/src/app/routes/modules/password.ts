import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Container } from '../../../container';
import { changePassword, requestPasswordReset, resetPassword } from '../../../usecases/accounts/password';
import { createRequireAuth, principalOf } from '../meta/requireAuth';
import { createRateLimit } from '../meta/rateLimit';
import { EmailSchema, PasswordSchema } from './auth';

const ForgotSchema = z.object({ email: EmailSchema });
const ResetSchema = z.object({ token: z.string().min(1), new_password: PasswordSchema });
const ChangeSchema = z.object({ current_password: z.string().min(1), new_password: PasswordSchema });

export const passwordRoutes = async (app: FastifyInstance, { container }: { container: Container }) => {
  const requireAuth = createRequireAuth(container);
  const rateLimit = createRateLimit(container);

  app.post('/v1/auth/password/forgot', {
    onRequest: rateLimit,
    schema: {
      description: 'Send a password reset link; always accepted',
      tags: ['password'],
      body: {
        type: 'object',
        required: ['email'],
        properties: { email: { type: 'string' } },
      },
    },
  }, async (request, reply) => {
    const body = ForgotSchema.parse(request.body);
    await requestPasswordReset(container, body);
    reply.status(202).send({ status: 'accepted' });
  });

  app.post('/v1/auth/password/reset', {
    onRequest: rateLimit,
    schema: {
      description: 'Set a new password with a reset token; every session of the account is revoked',
      tags: ['password'],
      body: {
        type: 'object',
        required: ['token', 'new_password'],
        properties: {
          token: { type: 'string' },
          new_password: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const body = ResetSchema.parse(request.body);
    await resetPassword(container, { token: body.token, newPassword: body.new_password });
    reply.status(204).send();
  });

  app.post('/v1/auth/password/change', {
    preHandler: requireAuth,
    schema: {
      description: 'Change the password of the current account; every session is revoked',
      tags: ['password'],
      security: [{ bearerAuth: [] }],
      body: {
        type: 'object',
        required: ['current_password', 'new_password'],
        properties: {
          current_password: { type: 'string' },
          new_password: { type: 'string' },
        },
      },
    },
  }, async (request, reply) => {
    const body = ChangeSchema.parse(request.body);
    await changePassword(container, {
      accountId: principalOf(request).subject,
      currentPassword: body.current_password,
      newPassword: body.new_password
    });
    reply.status(204).send();
  });
};
