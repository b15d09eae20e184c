import type { Pool } from 'pg';
import type { RefreshToken } from '../../domain/entities/tokens';
import type { CreateRefreshTokenInput, TokensRepository } from '../../repositories/tokensRepo';

type RefreshTokenRow = {
  id: string;
  account_id: string;
  created_at: Date;
  expires_at: Date;
  revoked_at: Date | null;
  access_jti: string;
  access_expires_at: Date;
};

const COLUMNS = 'id, account_id, created_at, expires_at, revoked_at, access_jti, access_expires_at';

const INSERT = `INSERT INTO auth.refresh_tokens (id, account_id, created_at, expires_at, access_jti, access_expires_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${COLUMNS}`;

const insertValues = (input: CreateRefreshTokenInput) => [
  input.id,
  input.accountId,
  input.createdAt,
  input.expiresAt,
  input.accessJti,
  input.accessExpiresAt
];

const toToken = (row: RefreshTokenRow): RefreshToken => ({
  id: row.id,
  accountId: row.account_id,
  createdAt: row.created_at,
  expiresAt: row.expires_at,
  revokedAt: row.revoked_at ?? undefined,
  accessJti: row.access_jti,
  accessExpiresAt: row.access_expires_at
});

export const createPostgresTokensRepository = (pool: Pool): TokensRepository => ({
  async create(input) {
    const result = await pool.query<RefreshTokenRow>(INSERT, insertValues(input));
    return toToken(result.rows[0]);
  },

  async findById(id) {
    const result = await pool.query<RefreshTokenRow>(`SELECT ${COLUMNS} FROM auth.refresh_tokens WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toToken(row) : null;
  },

  async findByAccount(accountId) {
    const result = await pool.query<RefreshTokenRow>(
      `SELECT ${COLUMNS} FROM auth.refresh_tokens WHERE account_id = $1 ORDER BY created_at`,
      [accountId]
    );
    return result.rows.map(toToken);
  },

  async revoke(id) {
    await pool.query('UPDATE auth.refresh_tokens SET revoked_at = now() WHERE id = $1 AND revoked_at IS NULL', [id]);
  },

  async revokeAllForAccount(accountId) {
    await pool.query('UPDATE auth.refresh_tokens SET revoked_at = now() WHERE account_id = $1 AND revoked_at IS NULL', [accountId]);
  },

  async rotate(currentId, next) {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      const claimed = await client.query(
        'UPDATE auth.refresh_tokens SET revoked_at = now() WHERE id = $1 AND revoked_at IS NULL AND expires_at > now()',
        [currentId]
      );
      if (claimed.rowCount !== 1) {
        await client.query('ROLLBACK');
        return false;
      }
      await client.query(INSERT, insertValues(next));
      await client.query('COMMIT');
      return true;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  },

  async purgeExpired(before) {
    const result = await pool.query('DELETE FROM auth.refresh_tokens WHERE expires_at <= $1', [before]);
    return result.rowCount ?? 0;
  }
});
