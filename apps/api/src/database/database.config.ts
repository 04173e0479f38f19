// apps/api/src/database/database.config.ts
import { mkdirSync } from 'fs';
import * as path from 'path';
import { DataSourceOptions } from 'typeorm';
import { Message } from '../messages/message.entity';

export const DEFAULT_DATABASE_PATH = path.join('data', 'messages.sqlite');

export const ENTITIES = [Message];

/** Reads one configuration value; `ConfigService#get` or `process.env` both fit. */
export type ConfigReader = (key: string) => string | undefined;

export function parseBoolean(
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function loggingFrom(read: ConfigReader): DataSourceOptions['logging'] {
  return parseBoolean(read('DATABASE_LOGGING'), false)
    ? ['error', 'warn', 'query']
    : ['error', 'warn'];
}

/**
 * Postgres when `DATABASE_URL` is set, otherwise a SQLite file at
 * `DATABASE_PATH`. Schema sync is on by default only for SQLite; Postgres
 * gets its table from `database/schema.sql`.
 */
export function buildTypeOrmOptions(read: ConfigReader): DataSourceOptions {
  const dbUrl = read('DATABASE_URL');

  if (dbUrl) {
    return {
      type: 'postgres',
      url: dbUrl,
      ssl: dbUrl.includes('sslmode=require')
        ? { rejectUnauthorized: false }
        : undefined,
      entities: ENTITIES,
      synchronize: parseBoolean(read('DATABASE_SYNCHRONIZE'), false),
      logging: loggingFrom(read),
    };
  }

  return {
    type: 'better-sqlite3',
    database: path.resolve(read('DATABASE_PATH') || DEFAULT_DATABASE_PATH),
    entities: ENTITIES,
    synchronize: parseBoolean(read('DATABASE_SYNCHRONIZE'), true),
    logging: loggingFrom(read),
    // A commit is on disk before the write resolves.
    prepareDatabase: (db) => {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
    },
  };
}

/** Creates the directory a SQLite file will live in. No-op for Postgres. */
export function ensureDatabaseDirectory(options: DataSourceOptions): void {
  if (options.type !== 'better-sqlite3') {
    return;
  }
  mkdirSync(path.dirname(options.database), { recursive: true });
}

/** Human-readable target for startup logs, without credentials. */
export function describeDatabase(options: DataSourceOptions): string {
  if (options.type === 'better-sqlite3') {
    return `SQLite at ${options.database}`;
  }
  if (options.type === 'postgres' && options.url) {
    const atIndex = options.url.indexOf('@');
    const host =
      atIndex !== -1 ? options.url.substring(atIndex + 1) : options.url;
    return `Postgres at ${host.split('?')[0]}`;
  }
  return options.type;
}
