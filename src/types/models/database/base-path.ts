/**
 * Base Path - base_paths table models
 *
 * A registered filesystem root. Media files are tracked relative to it.
 */

/**
 * Base path row (snake_case - matches SQLite schema exactly)
 */
export interface BasePathRow {
  id: number;

  /** Absolute directory, no trailing slash */
  base_path: string;

  description: string;
}

/**
 * Base path (camelCase - for TypeScript usage)
 */
export interface BasePath {
  id: number;

  /** Absolute directory, no trailing slash */
  path: string;

  description: string;
}

/**
 * Conversion helper: BasePathRow → BasePath
 */
export function rowToBasePath(row: BasePathRow): BasePath {
  return {
    id: row.id,
    path: row.base_path,
    description: row.description,
  };
}
