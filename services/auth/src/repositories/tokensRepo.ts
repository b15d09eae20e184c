import type { RefreshToken } from '../domain/entities/tokens';

export type CreateRefreshTokenInput = Omit<RefreshToken, 'revokedAt'>;

export interface TokensRepository {
  create(token: CreateRefreshTokenInput): Promise<RefreshToken>;
  findById(id: string): Promise<RefreshToken | null>;
  findByAccount(accountId: string): Promise<RefreshToken[]>;
  /** Sets revokedAt once; later calls leave the first timestamp in place. */
  revoke(id: string): Promise<void>;
  revokeAllForAccount(accountId: string): Promise<void>;
  /**
   * Revokes `currentId` and inserts `next` as one atomic unit. Resolves false,
   * without inserting, when `currentId` is missing, expired or already revoked.
   */
  rotate(currentId: string, next: CreateRefreshTokenInput): Promise<boolean>;
  purgeExpired(before: Date): Promise<number>;
}
