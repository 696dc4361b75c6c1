import { Pool } from 'pg';
import { config } from './env';
import { logger } from '../utils/logger';
import type { Database, DatabaseClient, Queryable } from '../db/queryable';

let pool: Pool | null = null;
let isConnected = false;

/** Expose a pg Pool through the Database interface. */
export function fromPool(source: Pool): Database {
  return {
    query: (text, params) => source.query(text, params),
    connect: async () => {
      const client = await source.connect();
      return {
        query: (text, params) => client.query(text, params),
        release: () => client.release(),
      };
    },
  };
}

/**
 * Run fn on one checked-out connection inside BEGIN/COMMIT.
 * Any error rolls the transaction back and is rethrown.
 */
export async function withTransaction<T>(
  db: Database,
  fn: (client: Queryable) => Promise<T>
): Promise<T> {
  const client: DatabaseClient = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function connectDatabase(): Promise<Database> {
  try {
    pool = new Pool(config.database);

    const client = await pool.connect();
    await client.query('SELECT NOW()');
    client.release();

    isConnected = true;
    logger.info('database connected', {
      host: config.database.host ?? null,
      database: config.database.database ?? null,
      url: config.database.connectionString ?? null,
    });
    return fromPool(pool);
  } catch (error) {
    isConnected = false;
    logger.error('database connection failed', { error });
    if (pool) {
      await pool.end();
      pool = null;
    }
    throw error;
  }
}

export function getDatabase(): Database | null {
  return pool ? fromPool(pool) : null;
}

export function isDatabaseConnected(): boolean {
  return isConnected;
}

export async function disconnectDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    isConnected = false;
    logger.info('database disconnected');
  }
}
