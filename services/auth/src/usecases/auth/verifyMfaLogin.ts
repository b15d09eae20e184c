import { AccountInactiveError, AccountLockedError, MfaCodeInvalidError } from '../../domain/errors';
import type { TokenPair } from '../../domain/entities/tokens';
import type { Container } from '../../container';

export interface VerifyMfaLoginInput {
  challengeToken: string;
  code: string;
  origin: string;
}

export const verifyMfaLogin = async ({ repos, services }: Container, input: VerifyMfaLoginInput): Promise<TokenPair> => {
  const { lockout, mfa, metrics } = services;
  const claims = await mfa.readChallenge(input.challengeToken);
  const account = await repos.accounts.findById(claims.sub);
  if (!account) {
    throw new AccountInactiveError();
  }

  const lockKey = lockout.keyFor(account.email, input.origin);
  if (await lockout.isLocked(lockKey)) {
    metrics.recordLogin('locked');
    throw new AccountLockedError();
  }

  let tokens: TokenPair;
  try {
    tokens = await mfa.verify(input.challengeToken, input.code);
  } catch (error) {
    if (error instanceof MfaCodeInvalidError) {
      await lockout.recordFailure(lockKey);
      metrics.recordLogin('mfa_invalid');
    }
    throw error;
  }

  await lockout.reset(lockKey);
  metrics.recordLogin('success');
  return tokens;
};
