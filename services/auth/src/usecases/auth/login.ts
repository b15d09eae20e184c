import { AccountInactiveError, AccountLockedError, InvalidCredentialsError, MfaRequiredError } from '../../domain/errors';
import type { Account } from '../../domain/entities/account';
import type { TokenPair } from '../../domain/entities/tokens';
import type { Container } from '../../container';

export interface LoginInput {
  email: string;
  password: string;
  /** Client address; part of the lockout key. */
  origin: string;
}

export type LoginResult =
  | { status: 'authenticated'; tokens: TokenPair }
  | { status: 'mfa_required'; challengeToken: string; expiresIn: number };

const checkCredentials = async ({ services }: Container, input: LoginInput) => {
  const { lockout, credentials, metrics } = services;
  const lockKey = lockout.keyFor(input.email, input.origin);
  if (await lockout.isLocked(lockKey)) {
    metrics.recordLogin('locked');
    throw new AccountLockedError();
  }

  try {
    return { account: await credentials.verify(input.email, input.password), lockKey };
  } catch (error) {
    if (error instanceof InvalidCredentialsError) {
      await lockout.recordFailure(lockKey);
      metrics.recordLogin('invalid_credentials');
    } else if (error instanceof AccountInactiveError) {
      metrics.recordLogin('inactive');
    }
    throw error;
  }
};

const completeLogin = async ({ services }: Container, account: Account, lockKey: string) => {
  await services.lockout.reset(lockKey);
  services.metrics.recordLogin('success');
  return services.sessions.issueInitial(account);
};

export const login = async (container: Container, input: LoginInput): Promise<LoginResult> => {
  const { account, lockKey } = await checkCredentials(container, input);
  const { services } = container;

  if (account.mfaEnabled) {
    const challenge = await services.mfa.createChallenge(account);
    await services.notifier.send({ kind: 'mfa_code', accountId: account.id, email: account.email, code: challenge.code });
    services.metrics.recordLogin('mfa_challenge');
    return { status: 'mfa_required', challengeToken: challenge.challengeToken, expiresIn: challenge.expiresIn };
  }

  return { status: 'authenticated', tokens: await completeLogin(container, account, lockKey) };
};

/** Password grant for clients that cannot run the MFA step. */
export const loginForTokens = async (container: Container, input: LoginInput): Promise<TokenPair> => {
  const { account, lockKey } = await checkCredentials(container, input);
  if (account.mfaEnabled) {
    throw new MfaRequiredError();
  }
  return completeLogin(container, account, lockKey);
};
