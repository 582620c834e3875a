/**
 * Tag registry
 *
 * Tags are scoped to a category: the same name may exist once per category.
 */

import type { DbClient } from './client';
import type { CategoryLookup } from './categories';
import { CategoryError } from './categories';
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
import type { Tag, TagInput, TagRow, TagUpdate } from '@/types/models';
import { rowToTag } from '@/types/models';

const log = getLogger({ module: 'Tags' });

export type TagErrorCode =
  | 'InvalidID'
  | 'NotFound'
  | 'InvalidCategoryID'
  | 'CategoryNotFound'
  | 'InvalidName'
  | 'NameTooLong'
  | 'DescriptionTooLong'
  | 'AlreadyExists'
  | 'InUse'
  | 'StorageError';

const MESSAGES: Record<TagErrorCode, string> = {
  InvalidID: 'invalid id',
  NotFound: 'tag not found',
  InvalidCategoryID: 'invalid category id',
  CategoryNotFound: 'category not found',
  InvalidName: 'invalid name',
  NameTooLong: `name longer than ${MAX_NAME_LENGTH} characters`,
  DescriptionTooLong: `description longer than ${MAX_DESCRIPTION_LENGTH} characters`,
  AlreadyExists: 'tag already exists in this category',
  InUse: 'tag is still attached to media',
  StorageError: 'storage error',
};

export class TagError extends CatalogError<TagErrorCode> {
  constructor(code: TagErrorCode, options?: { cause?: unknown }) {
    super(code, MESSAGES[code], options);
    this.name = 'TagError';
  }
}

/**
 * What the media catalog needs from this one
 */
export interface TagLookup {
  get(id: number): Tag;
}

function storageError(error: unknown): TagError {
  log.error({ err: describeError(error) }, 'tag storage failure');
  return new TagError('StorageError', { cause: error });
}

function conflictOrStorageError(error: unknown): TagError {
  return isConstraintViolation(error, 'unique')
    ? new TagError('AlreadyExists', { cause: error })
    : storageError(error);
}

export class TagRegistry implements TagLookup {
  constructor(
    private readonly client: DbClient,
    private readonly categories: CategoryLookup
  ) {}

  /**
   * Resolve the category, translating its registry's errors
   */
  private requireCategory(categoryId: number): void {
    if (!isValidId(categoryId)) {
      throw new TagError('InvalidCategoryID');
    }

    try {
      this.categories.get(categoryId);
    } catch (error) {
      if (error instanceof CategoryError) {
        if (error.code === 'NotFound') throw new TagError('CategoryNotFound', { cause: error });
        if (error.code === 'InvalidID') throw new TagError('InvalidCategoryID', { cause: error });
        throw new TagError('StorageError', { cause: error });
      }
      throw error;
    }
  }

  /**
   * Trim, check the category exists, and validate name/description
   */
  private cleanAndValidate(data: Required<TagInput>): Required<TagInput> {
    const name = data.name.trim();
    const description = data.description.trim();

    this.requireCategory(data.categoryId);

    if (name.length === 0) {
      throw new TagError('InvalidName');
    }
    if (graphemeLength(name) > MAX_NAME_LENGTH) {
      throw new TagError('NameTooLong');
    }
    if (graphemeLength(description) > MAX_DESCRIPTION_LENGTH) {
      throw new TagError('DescriptionTooLong');
    }

    return { name, categoryId: data.categoryId, description };
  }

  /**
   * Id of the tag named `name` in `categoryId`, if any
   */
  private findExisting(name: string, categoryId: number): number | null {
    const row = this.client.selectOne<{ id: number }>(
      'SELECT id FROM tags WHERE name = ? AND category_id = ?',
      [name, categoryId]
    );
    return row ? row.id : null;
  }

  create(input: TagInput): Tag {
    const created = translateStorageErrors(
      () =>
        this.client.transaction(() => {
          const data = this.cleanAndValidate({
            name: input.name,
            categoryId: input.categoryId,
            description: input.description ?? '',
          });

          if (this.findExisting(data.name, data.categoryId) !== null) {
            log.debug({ name: data.name, categoryId: data.categoryId }, 'tag already exists');
            throw new TagError('AlreadyExists');
          }

          const row = this.client.selectOne<TagRow>(
            'INSERT INTO tags (name, category_id, description) VALUES (?, ?, ?) RETURNING *',
            [data.name, data.categoryId, data.description]
          );
          if (!row) throw new TagError('StorageError');
          return rowToTag(row);
        }),
      conflictOrStorageError
    );

    log.info({ id: created.id, name: created.name, categoryId: created.categoryId }, 'created tag');
    return created;
  }

  /**
   * Get tag by ID
   */
  get(id: number): Tag {
    if (!isValidId(id)) {
      throw new TagError('InvalidID');
    }

    const row = translateStorageErrors(
      () => this.client.selectOne<TagRow>('SELECT * FROM tags WHERE id = ?', [id]),
      storageError
    );
    if (!row) {
      throw new TagError('NotFound');
    }
    return rowToTag(row);
  }

  /**
   * Update a tag. Fields left undefined keep their current value; the merged
   * tag must still be unique within its category.
   */
  update(id: number, changes: TagUpdate): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          const current = this.get(id);
          const data = this.cleanAndValidate({
            name: changes.name ?? current.name,
            categoryId: changes.categoryId ?? current.categoryId,
            description: changes.description ?? current.description,
          });

          const existing = this.findExisting(data.name, data.categoryId);
          if (existing !== null && existing !== id) {
            log.debug({ id, name: data.name, categoryId: data.categoryId }, 'tag already exists');
            throw new TagError('AlreadyExists');
          }

          this.client.run(
            'UPDATE tags SET name = ?, category_id = ?, description = ? WHERE id = ?',
            [data.name, data.categoryId, data.description, id]
          );
        }),
      conflictOrStorageError
    );

    log.info({ id, updates: Object.keys(changes) }, 'updated tag');
  }

  /**
   * List tags ordered by name, optionally only those of one category
   */
  list(categoryId?: number): Tag[] {
    if (categoryId !== undefined) {
      this.requireCategory(categoryId);
    }

    const rows = translateStorageErrors(
      () =>
        categoryId === undefined
          ? this.client.select<TagRow>('SELECT * FROM tags ORDER BY name ASC, id ASC')
          : this.client.select<TagRow>(
              'SELECT * FROM tags WHERE category_id = ? ORDER BY name ASC, id ASC',
              [categoryId]
            ),
      storageError
    );
    return rows.map(rowToTag);
  }

  /**
   * Tags whose name starts with `name`, ignoring case. A trimmed prefix
   * shorter than MIN_SEARCH_LENGTH is an InvalidName.
   */
  searchByName(name: string): Tag[] {
    const prefix = name.trim();
    if (graphemeLength(prefix) < MIN_SEARCH_LENGTH) {
      throw new TagError('InvalidName');
    }

    return this.list().filter((tag) => startsWithIgnoringCase(tag.name, prefix));
  }

  /**
   * Delete a tag that no media carries
   */
  delete(id: number): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(id);

          const usage = this.client.selectOne<{ count: number }>(
            'SELECT COUNT(*) as count FROM media_tags WHERE tag_id = ?',
            [id]
          );
          if ((usage?.count ?? 0) > 0) {
            log.debug({ id, media: usage?.count }, 'refused to delete tag in use');
            throw new TagError('InUse');
          }

          this.client.run('DELETE FROM tags WHERE id = ?', [id]);
        }),
      (error) =>
        isConstraintViolation(error, 'foreignkey')
          ? new TagError('InUse', { cause: error })
          : storageError(error)
    );

    log.info({ id }, 'deleted tag');
  }
}
