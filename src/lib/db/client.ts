import type BetterSqlite3 from 'better-sqlite3';
import { getSettings } from '@/lib/config/settings';
import { getLogger } from '@/lib/log/logger';

type QueryParam = unknown;
export type QueryParams = QueryParam[] | readonly QueryParam[];

const log = getLogger({ module: 'DBClient' });

export interface DbClientOptions {
  /** Log each statement at debug level (defaults to DB_LOG_QUERIES) */
  logQueries?: boolean;
}

/**
 * Statement helpers over a single SQLite connection.
 *
 * Registries receive a client at construction instead of reaching for a
 * process-wide handle, so tests can hand them an in-memory database.
 */
export class DbClient {
  private readonly logQueries: boolean;

  constructor(
    public readonly db: BetterSqlite3.Database,
    options: DbClientOptions = {}
  ) {
    this.logQueries = options.logQueries ?? getSettings().logQueries;
  }

  private logQuery(kind: 'select' | 'get' | 'run' | 'tx', sql: string, params: QueryParams): void {
    if (!this.logQueries) return;
    log.debug({ kind, sql, params }, 'db query');
  }

  /**
   * Run a SELECT returning multiple rows
   */
  select<T = Record<string, unknown>>(sql: string, params: QueryParams = []): T[] {
    this.logQuery('select', sql, params);
    return this.db.prepare(sql).all(...params) as T[];
  }

  /**
   * Run a SELECT returning a single row (or null)
   */
  selectOne<T = Record<string, unknown>>(sql: string, params: QueryParams = []): T | null {
    this.logQuery('get', sql, params);
    const row = this.db.prepare(sql).get(...params) as T | undefined;
    return row ?? null;
  }

  /**
   * Run INSERT/UPDATE/DELETE
   */
  run(sql: string, params: QueryParams = []): BetterSqlite3.RunResult {
    this.logQuery('run', sql, params);
    return this.db.prepare(sql).run(...params);
  }

  /**
   * Execute a function inside an IMMEDIATE transaction.
   *
   * The write lock is taken before `fn` reads anything, so a check followed by
   * a write cannot interleave with another writer. Nested calls become
   * savepoints of the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    this.logQuery('tx', 'BEGIN IMMEDIATE', []);
    return this.db.transaction(fn).immediate();
  }
}
