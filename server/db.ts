import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import * as schema from "@shared/schema";
import { logger } from './utils/logger';

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

function errorCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return '';
}

export async function ensureDatabaseExists(connectionString: string): Promise<void> {
  const url = new URL(connectionString);
  const dbName = url.pathname.replace(/^\//, "");
  if (!dbName) return;

  // Try connecting to the target database first
  try {
    const testPool = new Pool({ connectionString });
    const client = await testPool.connect();
    client.release();
    await testPool.end();
    return;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const isDbMissing = errorCode(err) === '3D000' || (message.includes('database') && message.includes('does not exist'));
    if (!isDbMissing) throw err;
  }

  // Database names are interpolated below, so only a strict charset is accepted
  if (!/^[a-zA-Z0-9_-]+$/.test(dbName)) {
    throw new Error(`Invalid database name: ${dbName}. Only alphanumeric characters, underscores, and hyphens are allowed.`);
  }

  const adminUrl = new URL(connectionString);
  adminUrl.pathname = '/postgres';
  const adminPool = new Pool({ connectionString: adminUrl.toString() });
  const adminClient = await adminPool.connect();
  try {
    await adminClient.query(`CREATE DATABASE "${dbName}"`);
    logger.info('Created database', { database: dbName });
  } catch (err) {
    // Another process may have created it first
    const message = err instanceof Error ? err.message : String(err);
    if (!message.toLowerCase().includes('already exists')) {
      throw err;
    }
  } finally {
    adminClient.release();
    await adminPool.end();
  }
}

export function createDatabase(connectionString: string): { pool: pg.Pool; db: Database } {
  const pool = new Pool({ connectionString });

  pool.on('error', (err) => {
    logger.error('PostgreSQL pool error', err);
  });

  return { pool, db: drizzle(pool, { schema }) };
}
