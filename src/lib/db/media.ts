/**
 * Media catalog
 *
 * Owns media file records and their tag associations. Media are tracked by
 * (base path, relative path); tags attach through the media_tags table.
 */

import type { DbClient } from './client';
import type { BasePathLookup } from './base-paths';
import { BasePathError } from './base-paths';
import type { TagLookup } from './tags';
import { TagError } from './tags';
import { CatalogError, describeError, isConstraintViolation, translateStorageErrors } from './errors';
import { getLogger } from '@/lib/log/logger';
import { graphemeLength, MAX_DESCRIPTION_LENGTH, trimSlashes } from '@/lib/utils/text';
import { isValidId } from '@/lib/utils/ids';
import type {
  MediaFile,
  MediaFileInput,
  MediaFileRow,
  MediaFileUpdate,
  MediaTag,
  MediaTagRow,
  Tag,
  TagRow,
} from '@/types/models';
import { rowToMediaFile, rowToMediaTag, rowToTag, serializeMediaType } from '@/types/models';

const log = getLogger({ module: 'Media' });

export const MIN_MARK = 1;
export const MAX_MARK = 10;

export type MediaErrorCode =
  | 'BasePathError'
  | 'TagError'
  | 'InvalidID'
  | 'InvalidRelativePath'
  | 'InvalidBasePathID'
  | 'InvalidWidth'
  | 'InvalidHeight'
  | 'InvalidSize'
  | 'InvalidMark'
  | 'DescriptionTooLong'
  | 'AlreadyExists'
  | 'NotFound'
  | 'InUse'
  | 'AlreadyTagged'
  | 'TagNotFound'
  | 'NoTagsProvided'
  | 'StorageError';

const MESSAGES: Record<MediaErrorCode, string> = {
  BasePathError: 'base path error',
  TagError: 'tag error',
  InvalidID: 'invalid id',
  InvalidRelativePath: 'invalid relative path',
  InvalidBasePathID: 'invalid base path id',
  InvalidWidth: 'width must be a positive integer',
  InvalidHeight: 'height must be a positive integer',
  InvalidSize: 'size must be a positive number',
  InvalidMark: `mark must be an integer from ${MIN_MARK} to ${MAX_MARK}`,
  DescriptionTooLong: `description longer than ${MAX_DESCRIPTION_LENGTH} characters`,
  AlreadyExists: 'media already registered for this base path',
  NotFound: 'media not found',
  InUse: 'media still has tags',
  AlreadyTagged: 'media already has this tag',
  TagNotFound: 'media does not have this tag',
  NoTagsProvided: 'no tags provided',
  StorageError: 'storage error',
};

export class MediaError extends CatalogError<MediaErrorCode> {
  constructor(code: MediaErrorCode, options?: { cause?: unknown }) {
    const cause = options?.cause;
    // Wrapped registry errors carry the dependency's own code in the message
    const message = cause instanceof CatalogError ? `${MESSAGES[code]}: ${cause.message}` : MESSAGES[code];
    super(code, message, options);
    this.name = 'MediaError';
  }
}

interface MediaAttributes {
  width: number | null;
  height: number | null;
  size: number;
  mark: number | null;
  description: string;
}

const isPositiveInteger = (value: number) => Number.isSafeInteger(value) && value > 0;

/**
 * Validate the mutable attributes of a (merged) media record
 */
function validateAttributes(data: MediaAttributes): void {
  if (data.width !== null && !isPositiveInteger(data.width)) {
    throw new MediaError('InvalidWidth');
  }
  if (data.height !== null && !isPositiveInteger(data.height)) {
    throw new MediaError('InvalidHeight');
  }
  if (!Number.isFinite(data.size) || data.size <= 0) {
    throw new MediaError('InvalidSize');
  }
  if (data.mark !== null && (!Number.isInteger(data.mark) || data.mark < MIN_MARK || data.mark > MAX_MARK)) {
    throw new MediaError('InvalidMark');
  }
  if (graphemeLength(data.description) > MAX_DESCRIPTION_LENGTH) {
    throw new MediaError('DescriptionTooLong');
  }
}

function storageError(error: unknown): MediaError {
  log.error({ err: describeError(error) }, 'media storage failure');
  return new MediaError('StorageError', { cause: error });
}

export class MediaCatalog {
  constructor(
    private readonly client: DbClient,
    private readonly basePaths: BasePathLookup,
    private readonly tags: TagLookup
  ) {}

  private requireBasePath(basePathId: number): void {
    try {
      this.basePaths.get(basePathId);
    } catch (error) {
      if (error instanceof BasePathError) throw new MediaError('BasePathError', { cause: error });
      throw error;
    }
  }

  private requireTag(tagId: number): Tag {
    try {
      return this.tags.get(tagId);
    } catch (error) {
      if (error instanceof TagError) throw new MediaError('TagError', { cause: error });
      throw error;
    }
  }

  private findAssociation(mediaId: number, tagId: number): MediaTag | null {
    const row = this.client.selectOne<MediaTagRow>(
      'SELECT * FROM media_tags WHERE media_id = ? AND tag_id = ?',
      [mediaId, tagId]
    );
    return row ? rowToMediaTag(row) : null;
  }

  /**
   * Register a media file under a base path.
   *
   * Validation, the uniqueness check and the insert share one immediate
   * transaction; UNIQUE(base_path_id, relative_path) backs up the check.
   */
  create(input: MediaFileInput): MediaFile {
    const created = translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.requireBasePath(input.basePathId);

          const relativePath = trimSlashes(input.relativePath);
          const attributes: MediaAttributes = {
            width: input.width ?? null,
            height: input.height ?? null,
            size: input.size,
            mark: input.mark ?? null,
            description: (input.description ?? '').trim(),
          };

          if (relativePath.length === 0) {
            throw new MediaError('InvalidRelativePath');
          }
          if (!isValidId(input.basePathId)) {
            throw new MediaError('InvalidBasePathID');
          }
          validateAttributes(attributes);

          const existing = this.client.selectOne<{ id: number }>(
            'SELECT id FROM media WHERE base_path_id = ? AND relative_path = ?',
            [input.basePathId, relativePath]
          );
          if (existing) {
            log.debug({ basePathId: input.basePathId, relativePath }, 'media already exists');
            throw new MediaError('AlreadyExists');
          }

          const row = this.client.selectOne<MediaFileRow>(
            `INSERT INTO media (relative_path, base_path_id, width, height, size, mark, description, media_type)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
             RETURNING *`,
            [
              relativePath,
              input.basePathId,
              attributes.width,
              attributes.height,
              attributes.size,
              attributes.mark,
              attributes.description,
              serializeMediaType(input.mediaType ?? 'unknown'),
            ]
          );
          if (!row) throw new MediaError('StorageError');
          return rowToMediaFile(row);
        }),
      (error) =>
        isConstraintViolation(error, 'unique')
          ? new MediaError('AlreadyExists', { cause: error })
          : storageError(error)
    );

    log.info({ id: created.id, basePathId: created.basePathId, relativePath: created.relativePath }, 'created media');
    return created;
  }

  /**
   * Get media by ID
   */
  get(id: number): MediaFile {
    if (!isValidId(id)) {
      throw new MediaError('InvalidID');
    }

    const row = translateStorageErrors(
      () => this.client.selectOne<MediaFileRow>('SELECT * FROM media WHERE id = ?', [id]),
      storageError
    );
    if (!row) {
      throw new MediaError('NotFound');
    }
    return rowToMediaFile(row);
  }

  /**
   * Get media by its location; `relativePath` is normalized as on create
   */
  getByRelativePath(basePathId: number, relativePath: string): MediaFile {
    const path = trimSlashes(relativePath);
    if (path.length === 0) {
      throw new MediaError('InvalidRelativePath');
    }
    if (!isValidId(basePathId)) {
      throw new MediaError('InvalidBasePathID');
    }

    const row = translateStorageErrors(
      () =>
        this.client.selectOne<MediaFileRow>(
          'SELECT * FROM media WHERE base_path_id = ? AND relative_path = ?',
          [basePathId, path]
        ),
      storageError
    );
    if (!row) {
      throw new MediaError('NotFound');
    }
    return rowToMediaFile(row);
  }

  /**
   * Update the mutable attributes of a media file.
   *
   * undefined keeps a field, null clears width/height/mark; the merged record
   * is validated before it is written.
   */
  update(id: number, changes: MediaFileUpdate): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          const current = this.get(id);
          const merged: MediaAttributes = {
            width: changes.width === undefined ? current.width : changes.width,
            height: changes.height === undefined ? current.height : changes.height,
            size: changes.size ?? current.size,
            mark: changes.mark === undefined ? current.mark : changes.mark,
            description: (changes.description ?? current.description).trim(),
          };
          validateAttributes(merged);

          this.client.run(
            'UPDATE media SET width = ?, height = ?, size = ?, mark = ?, description = ? WHERE id = ?',
            [merged.width, merged.height, merged.size, merged.mark, merged.description, id]
          );
        }),
      storageError
    );

    log.info({ id, updates: Object.keys(changes) }, 'updated media');
  }

  /**
   * List the media of a base path, ordered by id
   */
  list(basePathId: number): MediaFile[] {
    this.requireBasePath(basePathId);

    const rows = translateStorageErrors(
      () =>
        this.client.select<MediaFileRow>(
          'SELECT * FROM media WHERE base_path_id = ? ORDER BY id ASC',
          [basePathId]
        ),
      storageError
    );
    return rows.map(rowToMediaFile);
  }

  /**
   * Delete a media file that carries no tags
   */
  delete(id: number): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(id);

          const usage = this.client.selectOne<{ count: number }>(
            'SELECT COUNT(*) as count FROM media_tags WHERE media_id = ?',
            [id]
          );
          if ((usage?.count ?? 0) > 0) {
            log.debug({ id, tags: usage?.count }, 'refused to delete tagged media');
            throw new MediaError('InUse');
          }

          this.client.run('DELETE FROM media WHERE id = ?', [id]);
        }),
      (error) =>
        isConstraintViolation(error, 'foreignkey')
          ? new MediaError('InUse', { cause: error })
          : storageError(error)
    );

    log.info({ id }, 'deleted media');
  }

  tagMedia(mediaId: number, tagId: number): void {
    translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(mediaId);
          this.requireTag(tagId);

          if (this.findAssociation(mediaId, tagId)) {
            throw new MediaError('AlreadyTagged');
          }

          this.client.run('INSERT INTO media_tags (media_id, tag_id) VALUES (?, ?)', [mediaId, tagId]);
        }),
      (error) =>
        isConstraintViolation(error, 'unique')
          ? new MediaError('AlreadyTagged', { cause: error })
          : storageError(error)
    );

    log.info({ mediaId, tagId }, 'tagged media');
  }

  untagMedia(mediaId: number, tagId: number): void {
    const removed = translateStorageErrors(
      () =>
        this.client.transaction(() => {
          this.get(mediaId);
          this.requireTag(tagId);

          const association = this.findAssociation(mediaId, tagId);
          if (!association) {
            throw new MediaError('TagNotFound');
          }

          this.client.run('DELETE FROM media_tags WHERE id = ?', [association.id]);
          return association;
        }),
      storageError
    );

    log.info({ id: removed.id, mediaId, tagId }, 'untagged media');
  }

  /**
   * Tags attached to a media file, ordered by name
   */
  listTagsForMedia(mediaId: number): Tag[] {
    this.get(mediaId);

    const rows = translateStorageErrors(
      () =>
        this.client.select<TagRow>(
          `SELECT t.* FROM tags t
           INNER JOIN media_tags mt ON mt.tag_id = t.id
           WHERE mt.media_id = ?
           ORDER BY t.name ASC, t.id ASC`,
          [mediaId]
        ),
      storageError
    );
    return rows.map(rowToTag);
  }

  /**
   * Media tagged with every one of `tagIds` (AND semantics), ordered by id.
   *
   * Associations matching the set are grouped per media; a media qualifies
   * when its count of distinct matching tags equals the set's size.
   */
  listMediaByTags(tagIds: Iterable<number>): MediaFile[] {
    const wanted = Array.from(new Set(tagIds));
    if (wanted.length === 0) {
      throw new MediaError('NoTagsProvided');
    }

    const placeholders = wanted.map(() => '?').join(', ');
    const rows = translateStorageErrors(
      () =>
        this.client.select<MediaFileRow>(
          `SELECT m.* FROM media m
           WHERE m.id IN (
             SELECT media_id FROM media_tags
             WHERE tag_id IN (${placeholders})
             GROUP BY media_id
             HAVING COUNT(DISTINCT tag_id) = ?
           )
           ORDER BY m.id ASC`,
          [...wanted, wanted.length]
        ),
      storageError
    );
    return rows.map(rowToMediaFile);
  }
}
