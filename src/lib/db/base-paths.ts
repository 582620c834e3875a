/**
 * Base path registry
 *
 * Owns the filesystem roots under which media files are tracked. A root must
 * be an existing absolute directory, and no registered root may contain
 * another one.
 */

import { statSync } from 'fs';
import { isAbsolute } from 'path';
import type { DbClient } from './client';
import { CatalogError, describeError, isConstraintViolation, translateStorageErrors } from './errors';
import { getLogger } from '@/lib/log/logger';
import { graphemeLength, MAX_DESCRIPTION_LENGTH } from '@/lib/utils/text';
import { isValidId } from '@/lib/utils/ids';
import type { BasePath, BasePathRow } from '@/types/models';
import { rowToBasePath } from '@/types/models';

const log = getLogger({ module: 'BasePaths' });

export type BasePathErrorCode =
  | 'InvalidPath'
  | 'DescriptionTooLong'
  | 'NotExists'
  | 'NotADirectory'
  | 'NotAbsolute'
  | 'AlreadyExists'
  | 'IsSubPath'
  | 'InvalidID'
  | 'NotFound'
  | 'InUse'
  | 'StorageError';

const MESSAGES: Record<BasePathErrorCode, string> = {
  InvalidPath: 'invalid path',
  DescriptionTooLong: `description longer than ${MAX_DESCRIPTION_LENGTH} characters`,
  NotExists: 'path does not exist',
  NotADirectory: 'path is not a directory',
  NotAbsolute: 'path is not absolute',
  AlreadyExists: 'base path already registered',
  IsSubPath: 'path overlaps a registered base path',
  InvalidID: 'invalid id',
  NotFound: 'base path not found',
  InUse: 'base path is referenced by media',
  StorageError: 'storage error',
};

export class BasePathError extends CatalogError<BasePathErrorCode> {
  constructor(code: BasePathErrorCode, options?: { cause?: unknown; detail?: string }) {
    super(code, options?.detail ? `${MESSAGES[code]}: ${options.detail}` : MESSAGES[code], options);
    this.name = 'BasePathError';
  }
}

/**
 * What other registries need from this one
 */
export interface BasePathLookup {
  get(id: number): BasePath;
}

/**
 * Trim whitespace and trailing slashes; the root itself stays '/'
 */
export function normalizeBasePath(path: string): string {
  const trimmed = path.trim();
  const stripped = trimmed.replace(/\/+$/, '');
  return stripped.length === 0 && trimmed.length > 0 ? '/' : stripped;
}

/**
 * Whether `inner` lies inside `outer`, compared by path segment
 */
export function isInside(inner: string, outer: string): boolean {
  if (outer === '/') return inner !== '/';
  return inner.startsWith(`${outer}/`);
}

function storageError(error: unknown): BasePathError {
  log.error({ err: describeError(error) }, 'base path storage failure');
  return new BasePathError('StorageError', { cause: error, detail: describeError(error) });
}

export class BasePathRegistry implements BasePathLookup {
  constructor(private readonly client: DbClient) {}

  /**
   * Register a new base path.
   *
   * The overlap scan and the insert share one immediate transaction, and the
   * UNIQUE constraint on base_path backs up the exact-match check.
   */
  create(path: string, description = ''): BasePath {
    const basePath = normalizeBasePath(path);
    const cleanDescription = description.trim();

    if (basePath.length === 0) {
      throw new BasePathError('InvalidPath');
    }
    if (graphemeLength(cleanDescription) > MAX_DESCRIPTION_LENGTH) {
      throw new BasePathError('DescriptionTooLong');
    }

    const stats = statSync(basePath, { throwIfNoEntry: false });
    if (!stats) {
      throw new BasePathError('NotExists', { detail: basePath });
    }
    if (!stats.isDirectory()) {
      throw new BasePathError('NotADirectory', { detail: basePath });
    }
    if (!isAbsolute(basePath)) {
      throw new BasePathError('NotAbsolute', { detail: basePath });
    }

    const created = translateStorageErrors(
      () =>
        this.client.transaction(() => {
          const existing = this.client.select<BasePathRow>('SELECT * FROM base_paths ORDER BY id ASC');
          for (const row of existing) {
            if (row.base_path === basePath) {
              throw new BasePathError('AlreadyExists', { detail: basePath });
            }
            if (isInside(basePath, row.base_path) || isInside(row.base_path, basePath)) {
              throw new BasePathError('IsSubPath', { detail: `${basePath} and ${row.base_path}` });
            }
          }

          const row = this.client.selectOne<BasePathRow>(
            'INSERT INTO base_paths (base_path, description) VALUES (?, ?) RETURNING *',
            [basePath, cleanDescription]
          );
          if (!row) throw new BasePathError('StorageError', { detail: 'insert returned no row' });
          return rowToBasePath(row);
        }),
      (error) =>
        isConstraintViolation(error, 'unique')
          ? new BasePathError('AlreadyExists', { cause: error, detail: basePath })
          : storageError(error)
    );

    log.info({ id: created.id, path: created.path }, 'created base path');
    return created;
  }

  /**
   * Get base path by ID
   */
  get(id: number): BasePath {
    if (!isValidId(id)) {
      throw new BasePathError('InvalidID');
    }

    const row = translateStorageErrors(
      () => this.client.selectOne<BasePathRow>('SELECT * FROM base_paths WHERE id = ?', [id]),
      storageError
    );
    if (!row) {
      throw new BasePathError('NotFound');
    }
    return rowToBasePath(row);
  }

  /**
   * List base paths ordered by id. An empty or absent `ids` lists all of them.
   */
  list(ids?: Iterable<number>): BasePath[] {
    const wanted = ids ? Array.from(new Set(ids)) : [];
    const where = wanted.length > 0 ? `WHERE id IN (${wanted.map(() => '?').join(', ')})` : '';

    const rows = translateStorageErrors(
      () => this.client.select<BasePathRow>(`SELECT * FROM base_paths ${where} ORDER BY id ASC`, wanted),
      storageError
    );
    return rows.map(rowToBasePath);
  }

  updateDescription(id: number, description: string): void {
    const cleanDescription = description.trim();

    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(id);
          if (graphemeLength(cleanDescription) > MAX_DESCRIPTION_LENGTH) {
            throw new BasePathError('DescriptionTooLong');
          }
          this.client.run('UPDATE base_paths SET description = ? WHERE id = ?', [cleanDescription, id]);
        }),
      storageError
    );

    log.info({ id }, 'updated base path description');
  }

  /**
   * Delete a base path that no media references
   */
  delete(id: number): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(id);

          const usage = this.client.selectOne<{ count: number }>(
            'SELECT COUNT(*) as count FROM media WHERE base_path_id = ?',
            [id]
          );
          if ((usage?.count ?? 0) > 0) {
            log.debug({ id, media: usage?.count }, 'refused to delete base path in use');
            throw new BasePathError('InUse');
          }

          this.client.run('DELETE FROM base_paths WHERE id = ?', [id]);
        }),
      (error) =>
        isConstraintViolation(error, 'foreignkey')
          ? new BasePathError('InUse', { cause: error })
          : storageError(error)
    );

    log.info({ id }, 'deleted base path');
  }
}
