// Public API of the media catalog data layer

export { createCatalog, openCatalog } from './lib/db/catalog';
export type { Catalog } from './lib/db/catalog';

export { DbClient } from './lib/db/client';
export type { DbClientOptions } from './lib/db/client';
export {
  openDatabase,
  getDatabase,
  closeDatabase,
  resolveDatabaseLocation,
  ConnectionError,
  MAIN_DATABASE_FILE_NAME,
} from './lib/db/connection';
export type { DatabaseLocation, ConnectionErrorCode } from './lib/db/connection';
export { runMigrations, rollbackLastMigration, getCurrentSchemaVersion } from './lib/db/migrations';

export { CatalogError } from './lib/db/errors';
export { BasePathRegistry, BasePathError } from './lib/db/base-paths';
export type { BasePathErrorCode, BasePathLookup } from './lib/db/base-paths';
export { CategoryRegistry, CategoryError } from './lib/db/categories';
export type { CategoryErrorCode, CategoryLookup } from './lib/db/categories';
export { TagRegistry, TagError } from './lib/db/tags';
export type { TagErrorCode, TagLookup } from './lib/db/tags';
export { MediaCatalog, MediaError } from './lib/db/media';
export type { MediaErrorCode } from './lib/db/media';

export { loadSettings, getSettings, SettingsError } from './lib/config/settings';
export type { CatalogSettings, LogLevel } from './lib/config/settings';
export { getLogger } from './lib/log/logger';
export type { Logger } from './lib/log/logger';

export * from './types/models';
