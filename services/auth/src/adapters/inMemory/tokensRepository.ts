import type { RefreshToken } from '../../domain/entities/tokens';
import type { TokensRepository } from '../../repositories/tokensRepo';

export const createInMemoryTokensRepository = ({ now = () => Date.now() }: { now?: () => number } = {}): TokensRepository => {
  const tokens = new Map<string, RefreshToken>();

  const markRevoked = (token: RefreshToken) => {
    if (!token.revokedAt) {
      tokens.set(token.id, { ...token, revokedAt: new Date(now()) });
    }
  };

  return {
    async create(token) {
      if (tokens.has(token.id)) {
        throw new Error(`refresh token ${token.id} already exists`);
      }
      tokens.set(token.id, token);
      return token;
    },
    async findById(id) {
      return tokens.get(id) ?? null;
    },
    async findByAccount(accountId) {
      return [...tokens.values()].filter((token) => token.accountId === accountId);
    },
    async revoke(id) {
      const token = tokens.get(id);
      if (token) {
        markRevoked(token);
      }
    },
    async revokeAllForAccount(accountId) {
      for (const token of tokens.values()) {
        if (token.accountId === accountId) {
          markRevoked(token);
        }
      }
    },
    // No await between the check and the writes, so two callers cannot both pass.
    async rotate(currentId, next) {
      const current = tokens.get(currentId);
      if (!current || current.revokedAt || current.expiresAt.getTime() <= now() || tokens.has(next.id)) {
        return false;
      }
      tokens.set(currentId, { ...current, revokedAt: new Date(now()) });
      tokens.set(next.id, next);
      return true;
    },
    async purgeExpired(before) {
      let purged = 0;
      for (const token of [...tokens.values()]) {
        if (token.expiresAt.getTime() <= before.getTime()) {
          tokens.delete(token.id);
          purged += 1;
        }
      }
      return purged;
    }
  };
};
