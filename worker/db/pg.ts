import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';

let pool: Pool | null = null;
let db: ReturnType<typeof drizzle<typeof schema>> | null = null;

export type PgOptions = {
  connectionString: string;
  sslMode?: string;
};

const wantsSsl = (sslMode: string | undefined) =>
  sslMode !== undefined && sslMode !== 'disable' && sslMode !== 'allow';

export const getPgDb = (options: PgOptions) => {
  if (!db) {
    pool = new Pool({
      connectionString: options.connectionString,
      ssl: wantsSsl(options.sslMode) ? { rejectUnauthorized: false } : undefined,
    });
    db = drizzle(pool, { schema });
  }
  return db;
};

export const closePgDb = async () => {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
};
