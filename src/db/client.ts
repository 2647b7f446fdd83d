import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from './schema';
import { logger } from '../utils/logger';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({ connectionString });
  pool.on('error', (error) => {
    logger.error('Idle PostgreSQL client error', { error: error.message });
  });

  return { pool, db: drizzle(pool, { schema }) };
}

const SQL_DIR = path.resolve(process.cwd(), 'sql');

/** Applies every bootstrap script under sql/ in file name order. */
export async function ensureSchema(pool: Pool): Promise<void> {
  const files = fs
    .readdirSync(SQL_DIR)
    .filter((file) => file.endsWith('.sql'))
    .sort();

  for (const file of files) {
    const statement = fs.readFileSync(path.join(SQL_DIR, file), 'utf8');
    await pool.query(statement);
    logger.info('Applied schema script', { file });
  }
}
