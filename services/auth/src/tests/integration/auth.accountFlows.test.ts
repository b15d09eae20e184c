import { afterEach, describe, expect, it } from 'vitest';
import { startTestServer, TEST_PASSWORD } from '../support';

type Started = Awaited<ReturnType<typeof startTestServer>>;

const bearer = (token: string) => ({ authorization: `Bearer ${token}` });

const otherCode = (code: string) => (code === '000000' ? '111111' : '000000');

const signUp = async (app: Started['app'], email: string) => {
  const response = await app.inject({ method: 'POST', url: '/v1/auth/register', payload: { email, password: TEST_PASSWORD } });
  expect(response.statusCode).toBe(201);
  return response.json();
};

describe('account flows over http', () => {
  let started: Started | undefined;

  afterEach(async () => {
    await started?.server.close();
    started = undefined;
  });

  it('enrols MFA and completes a challenged login exactly once', async () => {
    started = await startTestServer();
    const { app, last } = started;
    const { access_token } = await signUp(app, 'grace@example.com');

    const request = await app.inject({
      method: 'POST',
      url: '/v1/auth/mfa/enable/request',
      headers: bearer(access_token),
      payload: { password: TEST_PASSWORD }
    });
    expect(request.statusCode).toBe(202);

    const confirm = await app.inject({
      method: 'POST',
      url: '/v1/auth/mfa/enable/confirm',
      headers: bearer(access_token),
      payload: { code: last('mfa_setup').code }
    });
    expect(confirm.statusCode).toBe(200);
    expect(confirm.json().mfa_enabled).toBe(true);

    const login = await app.inject({ method: 'POST', url: '/v1/auth/login', payload: { email: 'grace@example.com', password: TEST_PASSWORD } });
    expect(login.statusCode).toBe(200);
    const challenge = login.json();
    expect(challenge).toMatchObject({ mfa_required: true, expires_in: 300 });
    expect(challenge.access_token).toBeUndefined();

    const code = last('mfa_code').code;
    const wrong = await app.inject({
      method: 'POST',
      url: '/v1/auth/login/mfa',
      payload: { challenge_token: challenge.challenge_token, code: otherCode(code) }
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json().error).toBe('MFA_CODE_INVALID');

    const verified = await app.inject({
      method: 'POST',
      url: '/v1/auth/login/mfa',
      payload: { challenge_token: challenge.challenge_token, code }
    });
    expect(verified.statusCode).toBe(200);
    expect(verified.json().token_type).toBe('Bearer');

    const replay = await app.inject({
      method: 'POST',
      url: '/v1/auth/login/mfa',
      payload: { challenge_token: challenge.challenge_token, code }
    });
    expect(replay.statusCode).toBe(401);
    expect(replay.json().error).toBe('MFA_CODE_EXPIRED');

    const grant = await app.inject({ method: 'POST', url: '/v1/auth/token', payload: { email: 'grace@example.com', password: TEST_PASSWORD } });
    expect(grant.statusCode).toBe(400);
    expect(grant.json().error).toBe('MFA_REQUIRED');
  });

  it('resets a password once and ends existing sessions', async () => {
    started = await startTestServer();
    const { app, last } = started;
    const tokens = await signUp(app, 'alan@example.com');

    const forgot = await app.inject({ method: 'POST', url: '/v1/auth/password/forgot', payload: { email: 'alan@example.com' } });
    expect(forgot.statusCode).toBe(202);
    const unknown = await app.inject({ method: 'POST', url: '/v1/auth/password/forgot', payload: { email: 'nobody@example.com' } });
    expect(unknown.statusCode).toBe(202);
    expect(unknown.json()).toEqual(forgot.json());

    const token = last('password_reset').token;
    const reset = await app.inject({ method: 'POST', url: '/v1/auth/password/reset', payload: { token, new_password: 'another-long-password' } });
    expect(reset.statusCode).toBe(204);

    const again = await app.inject({ method: 'POST', url: '/v1/auth/password/reset', payload: { token, new_password: 'yet-another-password' } });
    expect(again.statusCode).toBe(401);
    expect(again.json().error).toBe('TOKEN_REVOKED');

    const oldRefresh = await app.inject({ method: 'POST', url: '/v1/auth/refresh', payload: { refresh_token: tokens.refresh_token } });
    expect(oldRefresh.statusCode).toBe(401);

    const oldPassword = await app.inject({ method: 'POST', url: '/v1/auth/login', payload: { email: 'alan@example.com', password: TEST_PASSWORD } });
    expect(oldPassword.statusCode).toBe(401);
    const newPassword = await app.inject({ method: 'POST', url: '/v1/auth/login', payload: { email: 'alan@example.com', password: 'another-long-password' } });
    expect(newPassword.statusCode).toBe(200);
  });

  it('verifies an email address', async () => {
    started = await startTestServer();
    const { app, last } = started;
    await signUp(app, 'edsger@example.com');

    const confirm = await app.inject({
      method: 'POST',
      url: '/v1/auth/email/verify/confirm',
      payload: { token: last('email_verification').token }
    });
    expect(confirm.statusCode).toBe(200);
    expect(confirm.json().email_verified_at).toEqual(expect.any(String));
  });

  it('opens no session at registration while email verification is required', async () => {
    started = await startTestServer({ REQUIRE_EMAIL_VERIFICATION_FOR_LOGIN: 'true' });
    const { app, last } = started;
    const registered = await signUp(app, 'barbara@example.com');
    expect(registered.email_verification_required).toBe(true);
    expect(registered.access_token).toBeUndefined();
    expect(registered.refresh_token).toBeUndefined();

    await app.inject({ method: 'POST', url: '/v1/auth/email/verify/confirm', payload: { token: last('email_verification').token } });
    const login = await app.inject({ method: 'POST', url: '/v1/auth/login', payload: { email: 'barbara@example.com', password: TEST_PASSWORD } });
    expect(login.statusCode).toBe(200);
    expect(login.json().refresh_token).toEqual(expect.any(String));
  });

  it('lets only admins change roles and deactivate accounts', async () => {
    started = await startTestServer();
    const { app, container } = started;
    await container.services.credentials.register('admin@example.com', TEST_PASSWORD, 'admin');
    const adminLogin = await app.inject({ method: 'POST', url: '/v1/auth/login', payload: { email: 'admin@example.com', password: TEST_PASSWORD } });
    const admin = adminLogin.json();
    const student = await signUp(app, 'barbara@example.com');

    const refused = await app.inject({
      method: 'POST',
      url: `/v1/accounts/${student.account.id}/deactivate`,
      headers: bearer(student.access_token)
    });
    expect(refused.statusCode).toBe(403);
    expect(refused.json()).toEqual({ error: 'FORBIDDEN', message: 'admin role required' });

    const promoted = await app.inject({
      method: 'PATCH',
      url: `/v1/accounts/${student.account.id}/role`,
      headers: bearer(admin.access_token),
      payload: { role: 'instructor' }
    });
    expect(promoted.statusCode).toBe(200);
    expect(promoted.json().role).toBe('instructor');

    const stale = await app.inject({ method: 'GET', url: '/v1/auth/me', headers: bearer(student.access_token) });
    expect(stale.statusCode).toBe(401);
    expect(stale.json().error).toBe('TOKEN_REVOKED');

    const deactivated = await app.inject({
      method: 'POST',
      url: `/v1/accounts/${student.account.id}/deactivate`,
      headers: bearer(admin.access_token)
    });
    expect(deactivated.statusCode).toBe(200);
    expect(deactivated.json().active).toBe(false);

    const login = await app.inject({ method: 'POST', url: '/v1/auth/login', payload: { email: 'barbara@example.com', password: TEST_PASSWORD } });
    expect(login.statusCode).toBe(403);
    expect(login.json().error).toBe('ACCOUNT_INACTIVE');
  });

  it('refuses self-registration with a privileged role', async () => {
    started = await startTestServer();
    const response = await started.app.inject({
      method: 'POST',
      url: '/v1/auth/register',
      payload: { email: 'mallory@example.com', password: TEST_PASSWORD, role: 'admin' }
    });
    expect(response.statusCode).toBe(403);
    expect(response.json().error).toBe('FORBIDDEN');
  });
});
