import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type BetterSqlite3 from 'better-sqlite3';
import { openDatabase } from './connection';
import { createCatalog } from './catalog';
import type { Catalog } from './catalog';
import { BasePathError } from './base-paths';
import { CategoryError } from './categories';
import { TagError } from './tags';
import { MediaError } from './media';
import { UncheckedClient, createTempTree } from './test-helpers';
import type { TempTree } from './test-helpers';

const MEDIA_BY_PATH = 'SELECT id FROM media WHERE base_path_id = ? AND relative_path = ?';
const TAG_BY_NAME = 'SELECT id FROM tags WHERE name = ? AND category_id = ?';
const ASSOCIATION = 'SELECT * FROM media_tags WHERE media_id = ? AND tag_id = ?';
const MEDIA_OF_BASE_PATH = 'SELECT COUNT(*) as count FROM media WHERE base_path_id = ?';
const TAGS_OF_CATEGORY = 'SELECT COUNT(*) as count FROM tags WHERE category_id = ?';
const ASSOCIATIONS_OF_TAG = 'SELECT COUNT(*) as count FROM media_tags WHERE tag_id = ?';
const ASSOCIATIONS_OF_MEDIA = 'SELECT COUNT(*) as count FROM media_tags WHERE media_id = ?';

function captured(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

// Writes go through a client that never finds the conflicting row, so only
// the UNIQUE and RESTRICT constraints stand in the way.
describe('constraint violations at write time', () => {
  let db: BetterSqlite3.Database;
  let tree: TempTree;
  let catalog: Catalog;
  let unchecked: Catalog;
  let basePathId: number;
  let categoryId: number;

  beforeEach(() => {
    db = openDatabase({ type: 'url', url: ':memory:' });
    tree = createTempTree();
    catalog = createCatalog(db, { logQueries: false });
    unchecked = createCatalog(
      new UncheckedClient(db, [
        MEDIA_BY_PATH,
        TAG_BY_NAME,
        ASSOCIATION,
        MEDIA_OF_BASE_PATH,
        TAGS_OF_CATEGORY,
        ASSOCIATIONS_OF_TAG,
        ASSOCIATIONS_OF_MEDIA,
      ])
    );
    basePathId = catalog.basePaths.create(tree.dir('photos'), '').id;
    categoryId = catalog.categories.create({ name: 'People', color: '#000000' }).id;
  });

  afterEach(() => {
    db.close();
    tree.cleanup();
  });

  it('reports a duplicate media as AlreadyExists', () => {
    catalog.media.create({ relativePath: 'a.jpg', basePathId, size: 3 });

    const error = captured(() => unchecked.media.create({ relativePath: '/a.jpg/', basePathId, size: 5 }));

    expect(error).toBeInstanceOf(MediaError);
    expect(error).toHaveProperty('code', 'AlreadyExists');
    expect(error).toHaveProperty('cause.code', 'SQLITE_CONSTRAINT_UNIQUE');
    expect(catalog.media.list(basePathId).map((m) => m.size)).toEqual([3]);
  });

  it('reports a duplicate tag as AlreadyExists on create', () => {
    catalog.tags.create({ name: 'Alice', categoryId });

    const error = captured(() => unchecked.tags.create({ name: 'Alice', categoryId }));

    expect(error).toBeInstanceOf(TagError);
    expect(error).toHaveProperty('code', 'AlreadyExists');
    expect(error).toHaveProperty('cause.code', 'SQLITE_CONSTRAINT_UNIQUE');
    expect(catalog.tags.list()).toHaveLength(1);
  });

  it('reports a rename onto an existing tag as AlreadyExists', () => {
    catalog.tags.create({ name: 'Alice', categoryId });
    const bob = catalog.tags.create({ name: 'Bob', categoryId });

    const error = captured(() => unchecked.tags.update(bob.id, { name: 'Alice' }));

    expect(error).toBeInstanceOf(TagError);
    expect(error).toHaveProperty('code', 'AlreadyExists');
    expect(catalog.tags.get(bob.id).name).toBe('Bob');
  });

  it('reports a repeated association as AlreadyTagged', () => {
    const media = catalog.media.create({ relativePath: 'a.jpg', basePathId, size: 3 });
    const tag = catalog.tags.create({ name: 'Alice', categoryId });
    catalog.media.tagMedia(media.id, tag.id);

    const error = captured(() => unchecked.media.tagMedia(media.id, tag.id));

    expect(error).toBeInstanceOf(MediaError);
    expect(error).toHaveProperty('code', 'AlreadyTagged');
    expect(error).toHaveProperty('cause.code', 'SQLITE_CONSTRAINT_UNIQUE');
    expect(catalog.media.listTagsForMedia(media.id)).toEqual([tag]);
  });

  describe('deleting a referenced row', () => {
    let mediaId: number;
    let tagId: number;

    beforeEach(() => {
      mediaId = catalog.media.create({ relativePath: 'a.jpg', basePathId, size: 3 }).id;
      tagId = catalog.tags.create({ name: 'Alice', categoryId }).id;
      catalog.media.tagMedia(mediaId, tagId);
    });

    it('reports a tag carried by media as InUse', () => {
      const error = captured(() => unchecked.tags.delete(tagId));

      expect(error).toBeInstanceOf(TagError);
      expect(error).toHaveProperty('code', 'InUse');
      expect(error).toHaveProperty('cause.code', 'SQLITE_CONSTRAINT_FOREIGNKEY');
      expect(catalog.tags.get(tagId).id).toBe(tagId);
    });

    it('reports a tagged media as InUse', () => {
      const error = captured(() => unchecked.media.delete(mediaId));

      expect(error).toBeInstanceOf(MediaError);
      expect(error).toHaveProperty('code', 'InUse');
      expect(catalog.media.get(mediaId).id).toBe(mediaId);
    });

    it('reports a category with tags as InUse', () => {
      const error = captured(() => unchecked.categories.delete(categoryId));

      expect(error).toBeInstanceOf(CategoryError);
      expect(error).toHaveProperty('code', 'InUse');
    });

    it('reports a base path with media as InUse', () => {
      const error = captured(() => unchecked.basePaths.delete(basePathId));

      expect(error).toBeInstanceOf(BasePathError);
      expect(error).toHaveProperty('code', 'InUse');
      expect(catalog.basePaths.list().map((bp) => bp.id)).toEqual([basePathId]);
    });
  });
});
