/**
 * Wires the four registries over one storage client.
 *
 * Dependencies only point down: tags use categories, media uses base paths
 * and tags.
 */

import type BetterSqlite3 from 'better-sqlite3';
import { DbClient } from './client';
import type { DbClientOptions } from './client';
import { openDatabase, getConfiguredLocation } from './connection';
import type { DatabaseLocation } from './connection';
import { BasePathRegistry } from './base-paths';
import { CategoryRegistry } from './categories';
import { TagRegistry } from './tags';
import { MediaCatalog } from './media';

export interface Catalog {
  basePaths: BasePathRegistry;
  categories: CategoryRegistry;
  tags: TagRegistry;
  media: MediaCatalog;
}

export function createCatalog(source: BetterSqlite3.Database | DbClient, options?: DbClientOptions): Catalog {
  const client = source instanceof DbClient ? source : new DbClient(source, options);

  const basePaths = new BasePathRegistry(client);
  const categories = new CategoryRegistry(client);
  const tags = new TagRegistry(client, categories);
  const media = new MediaCatalog(client, basePaths, tags);

  return { basePaths, categories, tags, media };
}

/**
 * Open a database (the configured one by default) and build a catalog on it
 */
export function openCatalog(location: DatabaseLocation = getConfiguredLocation()): Catalog & { close: () => void } {
  const db = openDatabase(location);
  return {
    ...createCatalog(db),
    close: () => db.close(),
  };
}
