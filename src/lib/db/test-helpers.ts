// Shared fixtures for the registry suites
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type BetterSqlite3 from 'better-sqlite3';
import { DbClient } from './client';
import type { QueryParams } from './client';
import { openDatabase } from './connection';
import { createCatalog } from './catalog';
import type { Catalog } from './catalog';

export interface TestCatalog extends Catalog {
  db: BetterSqlite3.Database;
  close: () => void;
}

/**
 * Catalog over a fresh, migrated in-memory database
 */
export function createTestCatalog(): TestCatalog {
  const db = openDatabase({ type: 'url', url: ':memory:' });
  return { ...createCatalog(db, { logQueries: false }), db, close: () => db.close() };
}

/**
 * Client that reports no row for the listed statements, so writes reach the
 * table constraints without the registries' own checks in front of them
 */
export class UncheckedClient extends DbClient {
  constructor(
    db: BetterSqlite3.Database,
    private readonly skipped: readonly string[]
  ) {
    super(db, { logQueries: false });
  }

  selectOne<T = Record<string, unknown>>(sql: string, params: QueryParams = []): T | null {
    if (this.skipped.includes(sql)) return null;
    return super.selectOne<T>(sql, params);
  }
}

export interface TempTree {
  root: string;
  /** Create a directory below the root and return its absolute path */
  dir: (relative: string) => string;
  /** Create a file below the root and return its absolute path */
  file: (relative: string) => string;
  cleanup: () => void;
}

export function createTempTree(prefix = 'media-catalog-test-'): TempTree {
  const root = mkdtempSync(join(tmpdir(), prefix));
  return {
    root,
    dir: (relative) => {
      const path = join(root, relative);
      mkdirSync(path, { recursive: true });
      return path;
    },
    file: (relative) => {
      const path = join(root, relative);
      writeFileSync(path, 'test');
      return path;
    },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}
