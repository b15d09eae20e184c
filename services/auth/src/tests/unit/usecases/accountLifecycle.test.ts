import { describe, expect, it } from 'vitest';
import { register, type RegisterInput } from '../../../usecases/accounts/register';
import { changePassword, requestPasswordReset, resetPassword } from '../../../usecases/accounts/password';
import { confirmEmailVerification, requestEmailVerification } from '../../../usecases/accounts/emailVerification';
import { confirmEnableMfa, disableMfa, requestEnableMfa } from '../../../usecases/accounts/mfaSettings';
import { changeRole, deactivateAccount } from '../../../usecases/accounts/administration';
import { authorize } from '../../../usecases/auth/authorize';
import { loginForTokens } from '../../../usecases/auth/login';
import {
  AccountExistsError,
  AccountInactiveError,
  ForbiddenError,
  InvalidCredentialsError,
  TokenRevokedError,
  TokenTypeMismatchError
} from '../../../domain/errors';
import type { Container } from '../../../container';
import { createCapturingNotifier, createClock, createTestContainer, TEST_PASSWORD } from '../../support';

const NEW_PASSWORD = 'a-brand-new-passphrase';

const setup = async (configOverrides: Record<string, string> = {}) => {
  const clock = createClock();
  const capture = createCapturingNotifier();
  const container = await createTestContainer(configOverrides, { now: clock.now, notifier: capture.notifier });
  return { container, clock, capture };
};

const registerActive = async (container: Container, input: RegisterInput) => {
  const result = await register(container, input);
  if (result.status !== 'active') {
    throw new Error('expected registration to open a session');
  }
  return result;
};

describe('registration', () => {
  it('creates a student, opens a session and sends a verification link', async () => {
    const { container, capture } = await setup();
    const { account, tokens } = await registerActive(container, { email: 'Ada@Example.com', password: TEST_PASSWORD });

    expect(account).toMatchObject({ email: 'ada@example.com', role: 'student', active: true, mfaEnabled: false });
    await expect(authorize(container, tokens.accessToken)).resolves.toEqual({ subject: account.id, role: 'student' });
    expect(capture.last('email_verification')).toMatchObject({ accountId: account.id, email: 'ada@example.com' });
  });

  it('refuses privileged roles unless public role registration is allowed', async () => {
    const closed = await setup();
    await expect(register(closed.container, { email: 'ada@example.com', password: TEST_PASSWORD, role: 'admin' })).rejects.toBeInstanceOf(
      ForbiddenError
    );

    const open = await setup({ ALLOW_PUBLIC_ROLE_REGISTRATION: 'true' });
    const { account } = await register(open.container, { email: 'ada@example.com', password: TEST_PASSWORD, role: 'instructor' });
    expect(account.role).toBe('instructor');
  });

  it('refuses a taken email', async () => {
    const { container } = await setup();
    await register(container, { email: 'ada@example.com', password: TEST_PASSWORD });
    await expect(register(container, { email: 'ada@example.com', password: TEST_PASSWORD })).rejects.toBeInstanceOf(AccountExistsError);
  });
});

describe('password reset', () => {
  it('resets once and revokes every session', async () => {
    const { container, capture } = await setup();
    const { tokens } = await registerActive(container, { email: 'ada@example.com', password: TEST_PASSWORD });

    await requestPasswordReset(container, { email: 'ada@example.com' });
    const { token } = capture.last('password_reset');

    await resetPassword(container, { token, newPassword: NEW_PASSWORD });
    await expect(authorize(container, tokens.accessToken)).rejects.toBeInstanceOf(TokenRevokedError);
    await expect(loginForTokens(container, { email: 'ada@example.com', password: NEW_PASSWORD, origin: 'test' })).resolves.toHaveProperty(
      'accessToken'
    );

    await expect(resetPassword(container, { token, newPassword: 'yet-another-passphrase' })).rejects.toBeInstanceOf(TokenRevokedError);
  });

  it('stays silent for unknown emails', async () => {
    const { container, capture } = await setup();
    await expect(requestPasswordReset(container, { email: 'ghost@example.com' })).resolves.toBeUndefined();
    expect(capture.sent).toHaveLength(0);
  });

  it('does not accept other token types', async () => {
    const { container, capture } = await setup();
    await register(container, { email: 'ada@example.com', password: TEST_PASSWORD });
    const { token } = capture.last('email_verification');
    await expect(resetPassword(container, { token, newPassword: NEW_PASSWORD })).rejects.toBeInstanceOf(TokenTypeMismatchError);
  });
});

describe('password change', () => {
  it('checks the current password and revokes sessions', async () => {
    const { container } = await setup();
    const { account, tokens } = await registerActive(container, { email: 'ada@example.com', password: TEST_PASSWORD });

    await expect(
      changePassword(container, { accountId: account.id, currentPassword: 'wrong-password', newPassword: NEW_PASSWORD })
    ).rejects.toBeInstanceOf(InvalidCredentialsError);

    await changePassword(container, { accountId: account.id, currentPassword: TEST_PASSWORD, newPassword: NEW_PASSWORD });
    await expect(authorize(container, tokens.accessToken)).rejects.toBeInstanceOf(TokenRevokedError);
  });
});

describe('email verification', () => {
  it('marks the email verified', async () => {
    const { container, capture, clock } = await setup();
    const { account } = await register(container, { email: 'ada@example.com', password: TEST_PASSWORD });
    const { token } = capture.last('email_verification');

    const verified = await confirmEmailVerification(container, { token });
    expect(verified.emailVerifiedAt).toEqual(new Date(clock.now()));
    expect(verified.id).toBe(account.id);

    await requestEmailVerification(container, { email: 'ada@example.com' });
    expect(capture.sent.filter((notification) => notification.kind === 'email_verification')).toHaveLength(1);
  });

  it('lets verified accounts in when verification is required', async () => {
    const { container, capture } = await setup({ REQUIRE_EMAIL_VERIFICATION_FOR_LOGIN: 'true' });
    const result = await register(container, { email: 'ada@example.com', password: TEST_PASSWORD });
    expect(result).toEqual({ status: 'verification_required', account: expect.objectContaining({ email: 'ada@example.com' }) });
    expect(await container.repos.tokens.findByAccount(result.account.id)).toEqual([]);
    await expect(loginForTokens(container, { email: 'ada@example.com', password: TEST_PASSWORD, origin: 'test' })).rejects.toMatchObject({
      code: 'EMAIL_NOT_VERIFIED'
    });

    await confirmEmailVerification(container, { token: capture.last('email_verification').token });
    await expect(loginForTokens(container, { email: 'ada@example.com', password: TEST_PASSWORD, origin: 'test' })).resolves.toHaveProperty(
      'refreshToken'
    );
  });
});

describe('mfa settings', () => {
  it('enables MFA after confirming the setup code and disables it with the password', async () => {
    const { container, capture } = await setup();
    const { account } = await register(container, { email: 'ada@example.com', password: TEST_PASSWORD });

    await expect(requestEnableMfa(container, { accountId: account.id, password: 'wrong-password' })).rejects.toBeInstanceOf(
      InvalidCredentialsError
    );
    await requestEnableMfa(container, { accountId: account.id, password: TEST_PASSWORD });
    const enabled = await confirmEnableMfa(container, { accountId: account.id, code: capture.last('mfa_setup').code });
    expect(enabled.mfaEnabled).toBe(true);

    const disabled = await disableMfa(container, { accountId: account.id, password: TEST_PASSWORD });
    expect(disabled.mfaEnabled).toBe(false);
  });
});

describe('administration', () => {
  it('changes roles for admins only and revokes the target sessions', async () => {
    const { container } = await setup();
    const { account, tokens } = await registerActive(container, { email: 'ada@example.com', password: TEST_PASSWORD });

    await expect(
      changeRole(container, { actor: { subject: account.id, role: 'student' }, accountId: account.id, role: 'admin' })
    ).rejects.toBeInstanceOf(ForbiddenError);

    const updated = await changeRole(container, { actor: { subject: 'root', role: 'admin' }, accountId: account.id, role: 'instructor' });
    expect(updated.role).toBe('instructor');
    await expect(authorize(container, tokens.accessToken)).rejects.toBeInstanceOf(TokenRevokedError);
  });

  it('deactivates accounts so they can no longer log in', async () => {
    const { container } = await setup();
    const { account } = await register(container, { email: 'ada@example.com', password: TEST_PASSWORD });
    await deactivateAccount(container, { actor: { subject: 'root', role: 'admin' }, accountId: account.id });
    await expect(loginForTokens(container, { email: 'ada@example.com', password: TEST_PASSWORD, origin: 'test' })).rejects.toBeInstanceOf(
      AccountInactiveError
    );
  });
});
