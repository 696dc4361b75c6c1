import * as fs from 'fs';
import * as path from 'path';
import { connectDatabase, disconnectDatabase, withTransaction } from '../config/database';
import { validateEnv } from '../config/env-validator';
import { logger } from '../utils/logger';
import type { Database } from './queryable';

export const SCHEMA_DIR = path.join(__dirname, '../../migrations');

export interface SchemaFile {
  name: string;
  content: string;
}

/** .sql files of dir, in name order. */
export function readSchemaFiles(dir: string = SCHEMA_DIR): SchemaFile[] {
  if (!fs.existsSync(dir)) {
    throw new Error(`Schema directory not found: ${dir}`);
  }

  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort()
    .map((file) => ({
      name: file,
      content: fs.readFileSync(path.join(dir, file), 'utf-8'),
    }));
}

/**
 * Create the contracts table and its indexes if absent. Safe to run repeatedly:
 * every statement is IF NOT EXISTS. All files run in one transaction.
 * @returns names of the files executed
 */
export async function applySchema(db: Database, dir: string = SCHEMA_DIR): Promise<string[]> {
  const files = readSchemaFiles(dir);

  try {
    await withTransaction(db, async (client) => {
      for (const file of files) {
        await client.query(file.content);
      }
    });
  } catch (error) {
    logger.error('schema apply failed', { error, files: files.map((f) => f.name) });
    throw error;
  }

  logger.info('schema applied', { files: files.map((f) => f.name) });
  return files.map((f) => f.name);
}

async function main(): Promise<void> {
  validateEnv();
  const db = await connectDatabase();
  try {
    await applySchema(db);
  } finally {
    await disconnectDatabase();
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('schema apply aborted', { error });
    process.exitCode = 1;
  });
}
