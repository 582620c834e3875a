// Database connection and initialization
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { join } from 'path';
import { statSync } from 'fs';
import { runMigrations } from './migrations';
import { CatalogError, describeError } from './errors';
import { getSettings } from '@/lib/config/settings';
import { getLogger } from '@/lib/log/logger';

const log = getLogger({ module: 'DBConnection' });

export const MAIN_DATABASE_FILE_NAME = 'main.db';

/**
 * Where the database lives.
 *
 * - `path`: a database file named `name` (default `main.db`) inside the
 *   existing directory `dir`
 * - `url`: handed to SQLite as-is, e.g. `:memory:`
 */
export type DatabaseLocation =
  | { type: 'path'; dir: string; name?: string }
  | { type: 'url'; url: string };

export type ConnectionErrorCode = 'InvalidPath' | 'NotADirectory' | 'InvalidName' | 'ConnectionFailed';

const CONNECTION_MESSAGES: Record<ConnectionErrorCode, string> = {
  InvalidPath: 'invalid path provided',
  NotADirectory: 'provided path is not a directory',
  InvalidName: 'provided database name is not valid',
  ConnectionFailed: 'cannot connect to database',
};

export class ConnectionError extends CatalogError<ConnectionErrorCode> {
  constructor(code: ConnectionErrorCode, options?: { cause?: unknown }) {
    super(code, CONNECTION_MESSAGES[code], options);
    this.name = 'ConnectionError';
  }
}

function isDirectory(dir: string): boolean {
  return statSync(dir, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Resolve a location to the filename passed to SQLite
 */
export function resolveDatabaseLocation(location: DatabaseLocation): string {
  if (location.type === 'url') {
    return location.url;
  }

  if (location.dir.length === 0) {
    throw new ConnectionError('InvalidPath');
  }
  if (!isDirectory(location.dir)) {
    throw new ConnectionError('NotADirectory');
  }
  if (location.name !== undefined && location.name.length === 0) {
    throw new ConnectionError('InvalidName');
  }

  return join(location.dir, location.name ?? MAIN_DATABASE_FILE_NAME);
}

/**
 * Open a connection, apply pragmas and run pending migrations
 */
export function openDatabase(location: DatabaseLocation): BetterSqlite3.Database {
  const filename = resolveDatabaseLocation(location);

  let db: BetterSqlite3.Database;
  try {
    db = new Database(filename);
  } catch (error) {
    log.error({ filename, err: describeError(error) }, 'open database failed');
    throw new ConnectionError('ConnectionFailed', { cause: error });
  }

  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  // Enable WAL mode for better concurrency
  db.pragma('journal_mode = WAL');

  // Optimize page cache (64MB)
  db.pragma('cache_size = -64000');

  runMigrations(db);
  return db;
}

/**
 * Location configured through MEDIA_CATALOG_DATA_DIR / MEDIA_CATALOG_DB_NAME
 */
export function getConfiguredLocation(): DatabaseLocation {
  const { dataDir, databaseName } = getSettings();
  return { type: 'path', dir: dataDir, name: databaseName };
}

let db: BetterSqlite3.Database | null = null;

/**
 * Get or create the process-wide connection
 */
export function getDatabase(): BetterSqlite3.Database {
  if (!db) {
    db = openDatabase(getConfiguredLocation());
  }
  return db;
}

/**
 * Close the process-wide connection (useful for cleanup)
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
