import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { BasePathError, isInside, normalizeBasePath } from './base-paths';
import { createTempTree, createTestCatalog } from './test-helpers';
import type { TempTree, TestCatalog } from './test-helpers';

function expectCode(fn: () => unknown, code: string) {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(BasePathError);
  expect(caught).toHaveProperty('code', code);
}

describe('normalizeBasePath', () => {
  it('trims whitespace and trailing slashes', () => {
    expect(normalizeBasePath('  /media/photos//  ')).toBe('/media/photos');
  });

  it('keeps the filesystem root', () => {
    expect(normalizeBasePath('/')).toBe('/');
    expect(normalizeBasePath('///')).toBe('/');
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeBasePath('   ')).toBe('');
  });
});

describe('isInside', () => {
  it('compares by path segment', () => {
    expect(isInside('/a/b/c', '/a/b')).toBe(true);
    expect(isInside('/a/bc', '/a/b')).toBe(false);
    expect(isInside('/a/b', '/a/b')).toBe(false);
  });

  it('treats every other path as inside the root', () => {
    expect(isInside('/a', '/')).toBe(true);
    expect(isInside('/', '/')).toBe(false);
  });
});

describe('BasePathRegistry', () => {
  let catalog: TestCatalog;
  let tree: TempTree;

  beforeEach(() => {
    catalog = createTestCatalog();
    tree = createTempTree();
  });

  afterEach(() => {
    catalog.close();
    tree.cleanup();
  });

  describe('create', () => {
    it('stores the normalized path and description', () => {
      const dir = tree.dir('photos');
      const created = catalog.basePaths.create(`  ${dir}/  `, '  holiday pictures ');

      expect(created.id).toBeGreaterThan(0);
      expect(created).toEqual({ id: created.id, path: dir, description: 'holiday pictures' });
      expect(catalog.basePaths.get(created.id)).toEqual(created);
    });

    it('rejects an empty path', () => {
      expectCode(() => catalog.basePaths.create('   ', ''), 'InvalidPath');
    });

    it('checks the description before touching the filesystem', () => {
      expectCode(() => catalog.basePaths.create('/does/not/exist', 'x'.repeat(301)), 'DescriptionTooLong');
    });

    it('accepts a description of exactly 300 graphemes', () => {
      const dir = tree.dir('long');
      expect(catalog.basePaths.create(dir, 'x'.repeat(300)).description).toHaveLength(300);
    });

    it('rejects a missing directory', () => {
      expectCode(() => catalog.basePaths.create(`${tree.root}/missing`, ''), 'NotExists');
    });

    it('rejects a file', () => {
      const file = tree.file('image.jpg');
      expectCode(() => catalog.basePaths.create(file, ''), 'NotADirectory');
    });

    it('rejects a relative path to an existing directory', () => {
      expectCode(() => catalog.basePaths.create('.', ''), 'NotAbsolute');
    });

    it('rejects the same path twice without storing a second row', () => {
      const dir = tree.dir('photos');
      catalog.basePaths.create(dir, 'first');

      expectCode(() => catalog.basePaths.create(`${dir}/`, 'second'), 'AlreadyExists');
      expect(catalog.basePaths.list()).toHaveLength(1);
      expect(catalog.basePaths.list()[0].description).toBe('first');
    });

    it('rejects a path inside a registered one', () => {
      const parent = tree.dir('a/b');
      const child = tree.dir('a/b/c');
      catalog.basePaths.create(parent, '');

      expectCode(() => catalog.basePaths.create(child, ''), 'IsSubPath');
    });

    it('rejects a path containing a registered one', () => {
      const parent = tree.dir('a/b');
      const child = tree.dir('a/b/c');
      catalog.basePaths.create(child, '');

      expectCode(() => catalog.basePaths.create(parent, ''), 'IsSubPath');
      expect(catalog.basePaths.list().map((bp) => bp.path)).toEqual([child]);
    });

    it('allows siblings sharing a name prefix', () => {
      const first = tree.dir('a/b');
      const second = tree.dir('a/bc');
      catalog.basePaths.create(first, '');

      expect(catalog.basePaths.create(second, '').path).toBe(second);
    });
  });

  describe('get', () => {
    it('rejects ids that are not positive integers', () => {
      expectCode(() => catalog.basePaths.get(0), 'InvalidID');
      expectCode(() => catalog.basePaths.get(-3), 'InvalidID');
      expectCode(() => catalog.basePaths.get(1.5), 'InvalidID');
    });

    it('reports a missing id', () => {
      expectCode(() => catalog.basePaths.get(42), 'NotFound');
    });
  });

  describe('list', () => {
    it('returns all base paths by id when ids are absent or empty', () => {
      const a = catalog.basePaths.create(tree.dir('one'), '');
      const b = catalog.basePaths.create(tree.dir('two'), '');

      expect(catalog.basePaths.list().map((bp) => bp.id)).toEqual([a.id, b.id]);
      expect(catalog.basePaths.list([]).map((bp) => bp.id)).toEqual([a.id, b.id]);
    });

    it('filters to the requested ids that exist', () => {
      catalog.basePaths.create(tree.dir('one'), '');
      const b = catalog.basePaths.create(tree.dir('two'), '');
      const c = catalog.basePaths.create(tree.dir('three'), '');

      expect(catalog.basePaths.list(new Set([c.id, b.id, 99])).map((bp) => bp.id)).toEqual([b.id, c.id]);
    });
  });

  describe('updateDescription', () => {
    it('stores the trimmed description', () => {
      const bp = catalog.basePaths.create(tree.dir('one'), 'old');
      catalog.basePaths.updateDescription(bp.id, '  new  ');
      expect(catalog.basePaths.get(bp.id).description).toBe('new');
    });

    it('counts graphemes, not code units', () => {
      const bp = catalog.basePaths.create(tree.dir('one'), '');
      const accented = 'e\u0301'.repeat(300);

      catalog.basePaths.updateDescription(bp.id, accented);
      expect(catalog.basePaths.get(bp.id).description).toBe(accented);
    });

    it('rejects a description over the limit', () => {
      const bp = catalog.basePaths.create(tree.dir('one'), 'kept');
      expectCode(() => catalog.basePaths.updateDescription(bp.id, 'y'.repeat(301)), 'DescriptionTooLong');
      expect(catalog.basePaths.get(bp.id).description).toBe('kept');
    });

    it('reports invalid and missing ids', () => {
      expectCode(() => catalog.basePaths.updateDescription(0, ''), 'InvalidID');
      expectCode(() => catalog.basePaths.updateDescription(7, ''), 'NotFound');
    });
  });

  describe('delete', () => {
    it('removes an unused base path', () => {
      const bp = catalog.basePaths.create(tree.dir('one'), '');
      catalog.basePaths.delete(bp.id);
      expectCode(() => catalog.basePaths.get(bp.id), 'NotFound');
    });

    it('refuses while media reference it, and succeeds once they are gone', () => {
      const bp = catalog.basePaths.create(tree.dir('one'), '');
      const file = catalog.media.create({ relativePath: 'a.jpg', basePathId: bp.id, size: 12 });

      expectCode(() => catalog.basePaths.delete(bp.id), 'InUse');
      expect(catalog.basePaths.get(bp.id).id).toBe(bp.id);

      catalog.media.delete(file.id);
      catalog.basePaths.delete(bp.id);
      expect(catalog.basePaths.list()).toEqual([]);
    });

    it('reports invalid and missing ids', () => {
      expectCode(() => catalog.basePaths.delete(-1), 'InvalidID');
      expectCode(() => catalog.basePaths.delete(5), 'NotFound');
    });
  });
});
