/**
 * Tag category registry
 *
 * Categories are the top level of the tag taxonomy: every tag belongs to one.
 */

import { z } from 'zod';
import type { DbClient } from './client';
import { CatalogError, describeError, isConstraintViolation, translateStorageErrors } from './errors';
import { getLogger } from '@/lib/log/logger';
import {
  graphemeLength,
  MAX_DESCRIPTION_LENGTH,
  MAX_NAME_LENGTH,
  MIN_SEARCH_LENGTH,
  startsWithIgnoringCase,
} from '@/lib/utils/text';
import { isValidId } from '@/lib/utils/ids';
import type { Category, CategoryInput, CategoryRow, CategoryUpdate } from '@/types/models';
import { rowToCategory } from '@/types/models';

const log = getLogger({ module: 'TagCategories' });

export type CategoryErrorCode =
  | 'InvalidID'
  | 'NotFound'
  | 'InvalidColor'
  | 'InvalidName'
  | 'NameTooLong'
  | 'DescriptionTooLong'
  | 'NameToSearchTooShort'
  | 'InUse'
  | 'StorageError';

const MESSAGES: Record<CategoryErrorCode, string> = {
  InvalidID: 'invalid id provided',
  NotFound: 'category not found',
  InvalidColor: 'invalid color',
  InvalidName: 'invalid name',
  NameTooLong: `name longer than ${MAX_NAME_LENGTH} characters`,
  DescriptionTooLong: `description longer than ${MAX_DESCRIPTION_LENGTH} characters`,
  NameToSearchTooShort: `name to search shorter than ${MIN_SEARCH_LENGTH} characters`,
  InUse: 'category still has tags',
  StorageError: 'storage error',
};

export class CategoryError extends CatalogError<CategoryErrorCode> {
  constructor(code: CategoryErrorCode, options?: { cause?: unknown }) {
    super(code, MESSAGES[code], options);
    this.name = 'CategoryError';
  }
}

/**
 * What the tag registry needs from this one
 */
export interface CategoryLookup {
  get(id: number): Category;
}

// '#' is optional on input; 8 digits carry an alpha channel
const HexColorSchema = z.string().regex(/^#?(?:[0-9a-f]{6}|[0-9a-f]{8})$/i);

/**
 * Lowercase hex color with a leading '#', or null when `color` is not one
 */
export function normalizeColor(color: string): string | null {
  const trimmed = color.trim();
  if (!HexColorSchema.safeParse(trimmed).success) return null;
  const digits = trimmed.startsWith('#') ? trimmed.slice(1) : trimmed;
  return `#${digits.toLowerCase()}`;
}

interface CleanCategory {
  name: string;
  color: string;
  description: string;
}

/**
 * Trim, normalize and validate a complete (merged) category
 */
function cleanAndValidate(data: Required<CategoryInput>): CleanCategory {
  const name = data.name.trim();
  const description = data.description.trim();

  if (name.length === 0) {
    throw new CategoryError('InvalidName');
  }
  if (graphemeLength(name) > MAX_NAME_LENGTH) {
    throw new CategoryError('NameTooLong');
  }
  if (graphemeLength(description) > MAX_DESCRIPTION_LENGTH) {
    throw new CategoryError('DescriptionTooLong');
  }

  const color = normalizeColor(data.color);
  if (color === null) {
    throw new CategoryError('InvalidColor');
  }

  return { name, color, description };
}

function storageError(error: unknown): CategoryError {
  log.error({ err: describeError(error) }, 'category storage failure');
  return new CategoryError('StorageError', { cause: error });
}

export class CategoryRegistry implements CategoryLookup {
  constructor(private readonly client: DbClient) {}

  create(input: CategoryInput): Category {
    const data = cleanAndValidate({
      name: input.name,
      color: input.color,
      description: input.description ?? '',
    });

    const row = translateStorageErrors(
      () =>
        this.client.selectOne<CategoryRow>(
          'INSERT INTO tag_categories (name, color, description) VALUES (?, ?, ?) RETURNING *',
          [data.name, data.color, data.description]
        ),
      storageError
    );
    if (!row) {
      throw new CategoryError('StorageError');
    }

    log.info({ id: row.id, name: row.name }, 'created category');
    return rowToCategory(row);
  }

  /**
   * Get a single category by ID
   */
  get(id: number): Category {
    if (!isValidId(id)) {
      throw new CategoryError('InvalidID');
    }

    const row = translateStorageErrors(
      () => this.client.selectOne<CategoryRow>('SELECT * FROM tag_categories WHERE id = ?', [id]),
      storageError
    );
    if (!row) {
      throw new CategoryError('NotFound');
    }
    return rowToCategory(row);
  }

  /**
   * Update a category. Fields left undefined keep their current value; the
   * merged record is validated as a whole.
   */
  update(id: number, changes: CategoryUpdate): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          const current = this.get(id);
          const data = cleanAndValidate({
            name: changes.name ?? current.name,
            color: changes.color ?? current.color,
            description: changes.description ?? current.description,
          });

          this.client.run(
            'UPDATE tag_categories SET name = ?, color = ?, description = ? WHERE id = ?',
            [data.name, data.color, data.description, id]
          );
        }),
      storageError
    );

    log.info({ id, updates: Object.keys(changes) }, 'updated category');
  }

  /**
   * Categories whose name starts with `name`, ignoring case
   */
  searchByName(name: string): Category[] {
    const prefix = name.trim();
    if (graphemeLength(prefix) < MIN_SEARCH_LENGTH) {
      throw new CategoryError('NameToSearchTooShort');
    }

    return this.list().filter((category) => startsWithIgnoringCase(category.name, prefix));
  }

  /**
   * List categories ordered by id. An empty or absent `ids` lists all of them.
   */
  list(ids?: Iterable<number>): Category[] {
    const wanted = ids ? Array.from(new Set(ids)) : [];
    const where = wanted.length > 0 ? `WHERE id IN (${wanted.map(() => '?').join(', ')})` : '';

    const rows = translateStorageErrors(
      () => this.client.select<CategoryRow>(`SELECT * FROM tag_categories ${where} ORDER BY id ASC`, wanted),
      storageError
    );
    return rows.map(rowToCategory);
  }

  /**
   * Delete a category that no tag belongs to
   */
  delete(id: number): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(id);

          const usage = this.client.selectOne<{ count: number }>(
            'SELECT COUNT(*) as count FROM tags WHERE category_id = ?',
            [id]
          );
          if ((usage?.count ?? 0) > 0) {
            log.debug({ id, tags: usage?.count }, 'refused to delete category in use');
            throw new CategoryError('InUse');
          }

          this.client.run('DELETE FROM tag_categories WHERE id = ?', [id]);
        }),
      (error) =>
        isConstraintViolation(error, 'foreignkey')
          ? new CategoryError('InUse', { cause: error })
          : storageError(error)
    );

    log.info({ id }, 'deleted category');
  }
}
