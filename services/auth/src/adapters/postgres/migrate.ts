import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';

const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), './migrations');

export const listMigrations = async (dir = migrationsDir) => {
  const entries = await readdir(dir);
  return entries.filter((file) => file.endsWith('.sql')).sort();
};

export const runMigrations = async (pool: Pool, dir = migrationsDir) => {
  const client = await pool.connect();
  try {
    for (const file of await listMigrations(dir)) {
      const sql = await readFile(path.join(dir, file), 'utf8');
      await client.query(sql);
    }
  } finally {
    client.release();
  }
};
