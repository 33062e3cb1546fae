import pg from 'pg';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const { Pool } = pg;

const SQL_DIR = fileURLToPath(new URL('../../sql/', import.meta.url));

function withLibpqCompat(url: string): string {
  // pg-connection-string treats sslmode=require as verify-full unless libpq
  // compatibility is requested explicitly.
  if (!/sslmode=/i.test(url)) return url;
  if (/uselibpqcompat=/i.test(url)) return url;
  const joiner = url.includes('?') ? '&' : '?';
  return `${url}${joiner}uselibpqcompat=true`;
}

export function createPool(databaseUrl: string): pg.Pool {
  return new Pool({
    connectionString: withLibpqCompat(databaseUrl),
    max: 5,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 10_000
  });
}

/**
 * Applies every `sql/*.sql` file in name order inside one transaction. The
 * statements are idempotent so this runs on every boot.
 */
export async function migrate(pool: pg.Pool, dir: string = SQL_DIR) {
  const client = await pool.connect();
  try {
    await client.query('begin');
    const files = (await fs.readdir(dir))
      .filter((f) => f.endsWith('.sql'))
      .sort((a, b) => a.localeCompare(b));

    for (const file of files) {
      const sql = await fs.readFile(path.join(dir, file), 'utf8');
      if (sql.trim()) await client.query(sql);
    }
    await client.query('commit');
  } catch (e) {
    await client.query('rollback');
    throw e;
  } finally {
    client.release();
  }
}
