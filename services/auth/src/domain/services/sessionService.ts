import type { Logger } from '../../logging';
import type { AccountsRepository } from '../../repositories/accountsRepo';
import type { TokensRepository } from '../../repositories/tokensRepo';
import { type Account, isUsable } from '../entities/account';
import type { ClaimsFor, TokenPair, TokenType } from '../entities/tokens';
import {
  AccountInactiveError,
  EmailNotVerifiedError,
  RefreshTokenReusedError,
  TokenExpiredError,
  TokenInvalidSignatureError,
  TokenTypeMismatchError
} from '../errors';
import type { AuthMetrics } from '../metrics';
import type { RevocationRegistry } from './revocationRegistry';
import type { TokenService } from './tokenService';

export interface SessionServiceDeps {
  tokens: TokenService;
  refreshTokens: TokensRepository;
  accounts: AccountsRepository;
  revocations: RevocationRegistry;
  logger: Logger;
  metrics?: AuthMetrics;
  /** Refuse to rotate sessions of accounts whose email is unverified. */
  requireVerifiedEmail?: boolean;
  now?: () => number;
}

const isTokenError = (error: unknown) =>
  error instanceof TokenExpiredError ||
  error instanceof TokenInvalidSignatureError ||
  error instanceof TokenTypeMismatchError;

export const createSessionService = ({
  tokens,
  refreshTokens,
  accounts,
  revocations,
  logger,
  metrics,
  requireVerifiedEmail = false,
  now = () => Date.now()
}: SessionServiceDeps) => {
  const expiresIn = () => tokens.lifetimeFor('access');

  const issuePair = async (account: Account) => {
    const access = await tokens.issueAccessToken(account.id, account.role);
    const refresh = await tokens.issueToken('refresh', account.id);
    const record = {
      id: refresh.jti,
      accountId: account.id,
      createdAt: new Date(now()),
      expiresAt: refresh.expiresAt,
      accessJti: access.jti,
      accessExpiresAt: access.expiresAt
    };
    const pair: TokenPair = { accessToken: access.token, refreshToken: refresh.token, expiresIn: expiresIn() };
    return { pair, record };
  };

  /** Verifies a token, resolving undefined instead of throwing when the token itself is bad. */
  const verifyQuietly = async <T extends TokenType>(token: string, type: T): Promise<ClaimsFor<T> | undefined> => {
    try {
      return await tokens.verify(token, type);
    } catch (error) {
      if (isTokenError(error)) {
        return undefined;
      }
      throw error;
    }
  };

  const revokeAllForAccount = async (accountId: string) => {
    const records = await refreshTokens.findByAccount(accountId);
    await refreshTokens.revokeAllForAccount(accountId);
    const current = now();
    await Promise.all(
      records
        .filter((record) => record.accessExpiresAt.getTime() > current)
        .map((record) => revocations.revoke(record.accessJti, record.accessExpiresAt))
    );
  };

  /** The caller only ever sees RefreshTokenReusedError, even when the revocation itself fails. */
  const handleReuse = async (accountId: string, jti: string): Promise<never> => {
    logger.warn({ accountId, jti }, 'refresh token reuse detected, revoking all sessions');
    metrics?.recordRefreshReuse();
    try {
      await revokeAllForAccount(accountId);
    } catch (error) {
      logger.error({ err: error, accountId }, 'failed to revoke sessions after refresh token reuse');
    }
    throw new RefreshTokenReusedError();
  };

  const issueInitial = async (account: Account): Promise<TokenPair> => {
    const { pair, record } = await issuePair(account);
    await refreshTokens.create(record);
    return pair;
  };

  const rotate = async (refreshToken: string, previousAccessToken?: string): Promise<TokenPair> => {
    const claims = await tokens.verify(refreshToken, 'refresh');
    const record = await refreshTokens.findById(claims.jti);
    if (!record || record.revokedAt || record.expiresAt.getTime() <= now() || record.accountId !== claims.sub) {
      return handleReuse(claims.sub, claims.jti);
    }

    const account = await accounts.findById(record.accountId);
    if (!account || !isUsable(account)) {
      throw new AccountInactiveError();
    }
    if (requireVerifiedEmail && !account.emailVerifiedAt) {
      throw new EmailNotVerifiedError();
    }

    if (previousAccessToken) {
      const previous = await verifyQuietly(previousAccessToken, 'access');
      if (previous && previous.sub === account.id) {
        await revocations.revoke(previous.jti, new Date(previous.exp * 1000));
      }
    }

    const { pair, record: next } = await issuePair(account);
    const rotated = await refreshTokens.rotate(record.id, next);
    if (!rotated) {
      return handleReuse(account.id, record.id);
    }
    return pair;
  };

  /**
   * Ends one session. The access token is revoked before the refresh token is
   * checked, so a bad refresh token never leaves it usable. A stale access
   * token is skipped so repeated calls succeed.
   */
  const logout = async (accessToken: string | undefined, refreshToken: string) => {
    const access = accessToken ? await verifyQuietly(accessToken, 'access') : undefined;
    if (access) {
      await revocations.revoke(access.jti, new Date(access.exp * 1000));
    }

    const refresh = await tokens.verify(refreshToken, 'refresh');
    const record = await refreshTokens.findById(refresh.jti);
    if (record && record.accountId === refresh.sub) {
      await refreshTokens.revoke(record.id);
    }
  };

  const purgeExpired = () => refreshTokens.purgeExpired(new Date(now()));

  return { issueInitial, rotate, logout, revokeAllForAccount, purgeExpired };
};

export type SessionService = ReturnType<typeof createSessionService>;
