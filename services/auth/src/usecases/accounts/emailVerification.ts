import type { Container } from '../../container';

export const requestEmailVerification = async ({ services }: Container, { email }: { email: string }) => {
  const account = await services.credentials.findByEmail(email);
  if (!account || account.emailVerifiedAt) {
    return;
  }
  const issued = await services.tokens.issueToken('email_verification', account.id);
  await services.notifier.send({ kind: 'email_verification', accountId: account.id, email: account.email, token: issued.token });
};

export const confirmEmailVerification = async ({ services, now }: Container, { token }: { token: string }) => {
  const claims = await services.tokens.verify(token, 'email_verification');
  const account = await services.credentials.getById(claims.sub);
  if (account.emailVerifiedAt) {
    return account;
  }
  return services.credentials.update(account.id, { emailVerifiedAt: new Date(now()) });
};
