import { AccountInactiveError, InvalidCredentialsError, TokenRevokedError } from '../../domain/errors';
import type { Container } from '../../container';

/** Silent for unknown or inactive accounts so the response does not reveal which emails exist. */
export const requestPasswordReset = async ({ services, logger }: Container, { email }: { email: string }) => {
  const account = await services.credentials.findByEmail(email);
  if (!account || !services.credentials.isUsable(account)) {
    logger.debug('password reset requested for unknown or inactive account');
    return;
  }

  const issued = await services.tokens.issueToken('password_reset', account.id);
  await services.notifier.send({ kind: 'password_reset', accountId: account.id, email: account.email, token: issued.token });
};

export const resetPassword = async (
  { services, store, now }: Container,
  input: { token: string; newPassword: string }
) => {
  const claims = await services.tokens.verify(input.token, 'password_reset');
  const remainingMs = Math.max(claims.exp * 1000 - now(), 1);
  // The first redemption sees 1; any later one sees a higher count.
  if ((await store.incrementWithTtl(`used:${claims.jti}`, remainingMs)) > 1) {
    throw new TokenRevokedError('password reset link already used');
  }

  const account = await services.credentials.getById(claims.sub);
  if (!services.credentials.isUsable(account)) {
    throw new AccountInactiveError();
  }
  await services.credentials.setPassword(account.id, input.newPassword);
  await services.sessions.revokeAllForAccount(account.id);
};

export const changePassword = async (
  { services }: Container,
  input: { accountId: string; currentPassword: string; newPassword: string }
) => {
  const account = await services.credentials.getById(input.accountId);
  if (!(await services.credentials.checkPassword(account, input.currentPassword))) {
    throw new InvalidCredentialsError('current password is incorrect');
  }
  await services.credentials.setPassword(account.id, input.newPassword);
  await services.sessions.revokeAllForAccount(account.id);
};
