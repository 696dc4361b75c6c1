/**
 * Required env validation. In production, missing database config causes throw (crash).
 * Accepts optional env for testing; defaults to process.env.
 */
import { isLogLevel, type EnvLike } from './env';

function getEnv(env: EnvLike, key: string): string | undefined {
  return env[key];
}

function isProduction(env: EnvLike): boolean {
  return getEnv(env, 'NODE_ENV') === 'production';
}

function isSet(value: string | undefined): boolean {
  return value != null && value.trim() !== '';
}

/**
 * Validates environment variables.
 * - LOG_LEVEL, when set, must be info, warn or error (any environment).
 * - In production the database must be configured: either DATABASE_URL or
 *   (POSTGRES_HOST, POSTGRES_DB, POSTGRES_USER, POSTGRES_PASSWORD).
 * @throws Error with message describing the first failed requirement.
 */
export function validateEnv(env: EnvLike = process.env): void {
  const logLevel = getEnv(env, 'LOG_LEVEL');
  if (isSet(logLevel) && !isLogLevel(logLevel?.trim().toLowerCase())) {
    throw new Error(`LOG_LEVEL must be one of info, warn, error (got "${logLevel}")`);
  }

  if (!isProduction(env)) return;

  const hasDatabaseUrl = isSet(getEnv(env, 'DATABASE_URL'));
  const hasPostgresVars =
    isSet(getEnv(env, 'POSTGRES_HOST')) &&
    isSet(getEnv(env, 'POSTGRES_DB')) &&
    isSet(getEnv(env, 'POSTGRES_USER')) &&
    getEnv(env, 'POSTGRES_PASSWORD') != null;

  if (!hasDatabaseUrl && !hasPostgresVars) {
    throw new Error(
      'In production set DATABASE_URL or all of POSTGRES_HOST, POSTGRES_DB, POSTGRES_USER, POSTGRES_PASSWORD'
    );
  }
}
