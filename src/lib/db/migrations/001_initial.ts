// Initial migration: catalog tables
import type BetterSqlite3 from 'better-sqlite3';
import type { Migration } from './index';

const migration: Migration = {
  version: 1,
  description: 'Initial schema with base paths, tag categories, tags, media and media tags',

  up(db: BetterSqlite3.Database) {
    // Registered filesystem roots
    db.exec(`
      CREATE TABLE IF NOT EXISTS base_paths (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        base_path TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT ''
      );
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS tag_categories (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        color TEXT NOT NULL,
        description TEXT NOT NULL DEFAULT ''
      );
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        category_id INTEGER NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        UNIQUE (name, category_id),
        FOREIGN KEY (category_id) REFERENCES tag_categories(id) ON DELETE RESTRICT
      );

      CREATE INDEX IF NOT EXISTS idx_tags_category_id ON tags(category_id);
    `);

    // Sizes are in kB; width/height/mark are optional
    db.exec(`
      CREATE TABLE IF NOT EXISTS media (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        relative_path TEXT NOT NULL,
        base_path_id INTEGER NOT NULL,
        width INTEGER,
        height INTEGER,
        size REAL NOT NULL,
        mark INTEGER,
        description TEXT NOT NULL DEFAULT '',
        media_type TEXT NOT NULL DEFAULT 'unknown',
        UNIQUE (base_path_id, relative_path),
        FOREIGN KEY (base_path_id) REFERENCES base_paths(id) ON DELETE RESTRICT
      );

      CREATE INDEX IF NOT EXISTS idx_media_base_path_id ON media(base_path_id);
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS media_tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        media_id INTEGER NOT NULL,
        tag_id INTEGER NOT NULL,
        UNIQUE (media_id, tag_id),
        FOREIGN KEY (media_id) REFERENCES media(id) ON DELETE RESTRICT,
        FOREIGN KEY (tag_id) REFERENCES tags(id) ON DELETE RESTRICT
      );

      CREATE INDEX IF NOT EXISTS idx_media_tags_tag_id ON media_tags(tag_id);
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`
      DROP TABLE IF EXISTS media_tags;
      DROP TABLE IF EXISTS media;
      DROP TABLE IF EXISTS tags;
      DROP TABLE IF EXISTS tag_categories;
      DROP TABLE IF EXISTS base_paths;
    `);
  },
};

export default migration;
