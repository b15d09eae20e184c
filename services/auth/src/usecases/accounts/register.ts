import { ForbiddenError } from '../../domain/errors';
import type { Account, Role } from '../../domain/entities/account';
import type { TokenPair } from '../../domain/entities/tokens';
import type { Container } from '../../container';

export interface RegisterInput {
  email: string;
  password: string;
  role?: Role;
}

/** No session is opened while login still waits on email verification. */
export type RegisterResult =
  | { status: 'active'; account: Account; tokens: TokenPair }
  | { status: 'verification_required'; account: Account };

export const register = async ({ config, services }: Container, input: RegisterInput): Promise<RegisterResult> => {
  const role = input.role ?? 'student';
  if (role !== 'student' && !config.ALLOW_PUBLIC_ROLE_REGISTRATION) {
    throw new ForbiddenError(`self-registration as ${role} is not allowed`);
  }

  const account = await services.credentials.register(input.email, input.password, role);
  const verification = await services.tokens.issueToken('email_verification', account.id);
  await services.notifier.send({
    kind: 'email_verification',
    accountId: account.id,
    email: account.email,
    token: verification.token
  });

  if (config.REQUIRE_EMAIL_VERIFICATION_FOR_LOGIN) {
    return { status: 'verification_required', account };
  }
  return { status: 'active', account, tokens: await services.sessions.issueInitial(account) };
};
