import dotenv from 'dotenv';
import path from 'path';
import type { LogLevel } from '../utils/logger';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

export type EnvLike = NodeJS.ProcessEnv | Record<string, string | undefined>;

export const LOG_LEVELS: readonly LogLevel[] = ['info', 'warn', 'error'];

export interface DatabaseConfig {
  connectionString?: string;
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
}

export interface AppConfig {
  node_env: string;
  logLevel: LogLevel;
  database: DatabaseConfig;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** DATABASE_URL wins over the individual POSTGRES_* variables. */
function getDatabaseConfig(env: EnvLike): DatabaseConfig {
  const url = env.DATABASE_URL?.trim();
  if (url) {
    return { connectionString: url };
  }
  return {
    host: env.POSTGRES_HOST || 'localhost',
    port: parseInt(env.POSTGRES_PORT || '5432', 10),
    database: env.POSTGRES_DB || 'contracts',
    user: env.POSTGRES_USER || 'postgres',
    password: env.POSTGRES_PASSWORD || 'postgres',
  };
}

export function loadConfig(env: EnvLike = process.env): AppConfig {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return {
    node_env: env.NODE_ENV || 'development',
    logLevel: isLogLevel(level) ? level : 'info',
    database: getDatabaseConfig(env),
  };
}

export const config = loadConfig();
