import { createHash, randomInt, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import type { AccountsRepository } from '../../repositories/accountsRepo';
import type { EphemeralStore } from '../../repositories/ephemeralStore';
import { type Account, isUsable } from '../entities/account';
import type { MfaChallengeClaims, TokenPair } from '../entities/tokens';
import { AccountInactiveError, MfaCodeExpiredError, MfaCodeInvalidError, TokenExpiredError } from '../errors';
import type { SessionService } from './sessionService';
import type { TokenService } from './tokenService';

export interface MfaServiceDeps {
  store: EphemeralStore;
  tokens: TokenService;
  sessions: SessionService;
  accounts: AccountsRepository;
  codeLength: number;
  now?: () => number;
}

export interface MfaChallenge {
  challengeToken: string;
  code: string;
  expiresIn: number;
}

const StoredChallengeSchema = z.object({
  accountId: z.string(),
  codeHash: z.string()
});

const challengeKey = (jti: string) => `mfa:challenge:${jti}`;
const setupKey = (accountId: string) => `mfa:setup:${accountId}`;

const hashCode = (code: string) => createHash('sha256').update(code).digest('hex');

const codeMatches = (codeHash: string, code: string) => {
  const expected = Buffer.from(codeHash, 'hex');
  const actual = Buffer.from(hashCode(code), 'hex');
  return expected.length === actual.length && timingSafeEqual(expected, actual);
};

const parseStored = (raw: string | null) => {
  if (raw === null) {
    return undefined;
  }
  try {
    const parsed = StoredChallengeSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
};

export const createMfaService = ({ store, tokens, sessions, accounts, codeLength, now = () => Date.now() }: MfaServiceDeps) => {
  const generateCode = () => randomInt(0, 10 ** codeLength).toString().padStart(codeLength, '0');

  const ttlUntil = (expiresAt: Date) => Math.max(expiresAt.getTime() - now(), 1);

  const createChallenge = async (account: Account): Promise<MfaChallenge> => {
    const issued = await tokens.issueToken('mfa_challenge', account.id);
    const code = generateCode();
    await store.set(
      challengeKey(issued.jti),
      JSON.stringify({ accountId: account.id, codeHash: hashCode(code) }),
      ttlUntil(issued.expiresAt)
    );
    return { challengeToken: issued.token, code, expiresIn: tokens.lifetimeFor('mfa_challenge') };
  };

  /** Verifies the challenge token itself; an expired challenge reads as an expired code. */
  const readChallenge = async (challengeToken: string): Promise<MfaChallengeClaims> => {
    try {
      return await tokens.verify(challengeToken, 'mfa_challenge');
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        throw new MfaCodeExpiredError();
      }
      throw error;
    }
  };

  const verify = async (challengeToken: string, code: string): Promise<TokenPair> => {
    const claims = await readChallenge(challengeToken);
    const key = challengeKey(claims.jti);
    const stored = parseStored(await store.get(key));
    if (!stored || stored.accountId !== claims.sub) {
      throw new MfaCodeExpiredError();
    }
    if (!codeMatches(stored.codeHash, code)) {
      throw new MfaCodeInvalidError();
    }
    // Only the caller whose delete removed the record may continue.
    if (!(await store.delete(key))) {
      throw new MfaCodeExpiredError();
    }

    const account = await accounts.findById(stored.accountId);
    if (!account || !isUsable(account)) {
      throw new AccountInactiveError();
    }
    return sessions.issueInitial(account);
  };

  const requestSetup = async (account: Account) => {
    const code = generateCode();
    await store.set(setupKey(account.id), hashCode(code), tokens.lifetimeFor('mfa_challenge') * 1000);
    return code;
  };

  const confirmSetup = async (account: Account, code: string) => {
    const key = setupKey(account.id);
    const codeHash = await store.get(key);
    if (codeHash === null) {
      throw new MfaCodeExpiredError();
    }
    if (!codeMatches(codeHash, code)) {
      throw new MfaCodeInvalidError();
    }
    if (!(await store.delete(key))) {
      throw new MfaCodeExpiredError();
    }
  };

  return { createChallenge, readChallenge, verify, requestSetup, confirmSetup };
};

export type MfaService = ReturnType<typeof createMfaService>;
