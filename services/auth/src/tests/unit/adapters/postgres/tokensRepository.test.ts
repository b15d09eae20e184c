import { describe, expect, it, vi } from 'vitest';
import type { Pool } from 'pg';
import { createPostgresTokensRepository } from '../../../../adapters/postgres/tokensRepository';
import type { CreateRefreshTokenInput } from '../../../../repositories/tokensRepo';

const next: CreateRefreshTokenInput = {
  id: 'next',
  accountId: 'acc-1',
  createdAt: new Date('2025-01-01T00:00:00Z'),
  expiresAt: new Date('2025-01-31T00:00:00Z'),
  accessJti: 'access-next',
  accessExpiresAt: new Date('2025-01-01T00:15:00Z')
};

const createPool = (claimedRows: number) => {
  const client = {
    query: vi.fn(async (sql: string) => (sql.startsWith('UPDATE') ? { rows: [], rowCount: claimedRows } : { rows: [], rowCount: 0 })),
    release: vi.fn()
  };
  const query = vi.fn().mockResolvedValue({ rows: [], rowCount: 2 });
  const pool = { query, connect: vi.fn().mockResolvedValue(client) } as unknown as Pool;
  return { pool, client, query };
};

const statements = (client: { query: { mock: { calls: unknown[][] } } }) => client.query.mock.calls.map((call) => call[0]);

describe('PostgresTokensRepository', () => {
  it('revokes a token only when not already revoked', async () => {
    const { pool, query } = createPool(1);
    await createPostgresTokensRepository(pool).revoke('tok');
    expect(query).toHaveBeenCalledWith('UPDATE auth.refresh_tokens SET revoked_at = now() WHERE id = $1 AND revoked_at IS NULL', ['tok']);
  });

  it('revokes every live token of an account', async () => {
    const { pool, query } = createPool(1);
    await createPostgresTokensRepository(pool).revokeAllForAccount('acc-1');
    expect(query).toHaveBeenCalledWith(
      'UPDATE auth.refresh_tokens SET revoked_at = now() WHERE account_id = $1 AND revoked_at IS NULL',
      ['acc-1']
    );
  });

  it('commits a rotation when the current token is claimed', async () => {
    const { pool, client } = createPool(1);
    expect(await createPostgresTokensRepository(pool).rotate('current', next)).toBe(true);
    const sql = statements(client);
    expect(sql[0]).toBe('BEGIN');
    expect(sql[1]).toContain('WHERE id = $1 AND revoked_at IS NULL AND expires_at > now()');
    expect(sql[2]).toContain('INSERT INTO auth.refresh_tokens');
    expect(sql[3]).toBe('COMMIT');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back without inserting when another caller already claimed the token', async () => {
    const { pool, client } = createPool(0);
    expect(await createPostgresTokensRepository(pool).rotate('current', next)).toBe(false);
    expect(statements(client)).toEqual(['BEGIN', expect.stringContaining('UPDATE'), 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows on failure', async () => {
    const { pool, client } = createPool(1);
    client.query.mockImplementation(async (sql: string) => {
      if (sql.startsWith('INSERT')) {
        throw new Error('duplicate key');
      }
      return { rows: [], rowCount: 1 };
    });
    await expect(createPostgresTokensRepository(pool).rotate('current', next)).rejects.toThrow('duplicate key');
    expect(statements(client).at(-1)).toBe('ROLLBACK');
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('reports how many expired tokens were purged', async () => {
    const { pool, query } = createPool(1);
    const before = new Date('2025-02-01T00:00:00Z');
    expect(await createPostgresTokensRepository(pool).purgeExpired(before)).toBe(2);
    expect(query).toHaveBeenCalledWith('DELETE FROM auth.refresh_tokens WHERE expires_at <= $1', [before]);
  });
});
