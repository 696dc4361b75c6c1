/**
 * JSON structured logs, one entry per line, scrubbed before they are written.
 */
import { config } from '../config/env';
import { scrubObject } from './scrubber';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = { info: 10, warn: 20, error: 30 };

function writeStdout(line: string): void {
  process.stdout.write(line);
}

function serializeError(error: Error): Record<string, unknown> {
  const out: Record<string, unknown> = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') out.code = error.code;
  return out;
}

function toLoggable(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(fields)) {
    out[k] = v instanceof Error ? serializeError(v) : v;
  }
  return out;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const write = options.write ?? writeStdout;

  const log = (level: LogLevel, message: string, fields: Record<string, unknown> = {}): void => {
    if (LEVEL_RANK[level] < threshold) return;
    const scrubbed = scrubObject(toLoggable(fields));
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...(scrubbed !== null && typeof scrubbed === 'object' ? scrubbed : {}),
    };
    try {
      write(JSON.stringify(entry) + '\n');
    } catch {
      write(JSON.stringify({ level: 'error', message: 'log serialize failed', timestamp: new Date().toISOString() }) + '\n');
    }
  };

  return {
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields),
  };
}

export const logger = createLogger({ level: config.logLevel });
