import type { Pool } from 'pg';
import { isRole, type Account } from '../../domain/entities/account';
import type { AccountPatch, AccountsRepository } from '../../repositories/accountsRepo';

type AccountRow = {
  id: string;
  email: string;
  password_hash: string;
  role: string;
  is_active: boolean;
  mfa_enabled: boolean;
  email_verified_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = 'id, email, password_hash, role, is_active, mfa_enabled, email_verified_at, created_at, updated_at';

const PATCH_COLUMNS: ReadonlyArray<[keyof AccountPatch, string]> = [
  ['passwordHash', 'password_hash'],
  ['role', 'role'],
  ['active', 'is_active'],
  ['mfaEnabled', 'mfa_enabled'],
  ['emailVerifiedAt', 'email_verified_at']
];

const toAccount = (row: AccountRow): Account => {
  if (!isRole(row.role)) {
    throw new Error(`account ${row.id} has unknown role ${row.role}`);
  }
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    role: row.role,
    active: row.is_active,
    mfaEnabled: row.mfa_enabled,
    emailVerifiedAt: row.email_verified_at ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
};

export const createPostgresAccountsRepository = (pool: Pool): AccountsRepository => ({
  async create({ email, passwordHash, role }) {
    const result = await pool.query<AccountRow>(
      `INSERT INTO auth.accounts (email, password_hash, role)
       VALUES ($1, $2, $3)
       ON CONFLICT (email) DO NOTHING
       RETURNING ${COLUMNS}`,
      [email, passwordHash, role]
    );
    const row = result.rows[0];
    return row ? toAccount(row) : null;
  },

  async findById(id) {
    const result = await pool.query<AccountRow>(`SELECT ${COLUMNS} FROM auth.accounts WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? toAccount(row) : null;
  },

  async findByEmail(email) {
    const result = await pool.query<AccountRow>(`SELECT ${COLUMNS} FROM auth.accounts WHERE email = $1`, [email]);
    const row = result.rows[0];
    return row ? toAccount(row) : null;
  },

  async update(id, patch) {
    const assignments: string[] = [];
    const values: unknown[] = [id];
    for (const [key, column] of PATCH_COLUMNS) {
      if (patch[key] === undefined) continue;
      values.push(patch[key]);
      assignments.push(`${column} = $${values.length}`);
    }
    assignments.push('updated_at = now()');
    const result = await pool.query<AccountRow>(
      `UPDATE auth.accounts SET ${assignments.join(', ')} WHERE id = $1 RETURNING ${COLUMNS}`,
      values
    );
    const row = result.rows[0];
    return row ? toAccount(row) : null;
  }
});
