/**
 * Category - tag_categories table models
 */

/**
 * Tag category row (snake_case - matches SQLite schema exactly)
 */
export interface CategoryRow {
  id: number;
  name: string;
  /** Lowercase hex color, e.g. '#3b82f6' */
  color: string;
  description: string;
}

/**
 * Tag category (camelCase - for TypeScript usage)
 *
 * Columns are already single words, so this mirrors the row.
 */
export type Category = CategoryRow;

export function rowToCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    color: row.color,
    description: row.description,
  };
}

/**
 * Input for creating a category
 */
export interface CategoryInput {
  name: string;
  color: string;
  description?: string;
}

/**
 * Patch for updating a category; undefined fields keep their value
 */
export type CategoryUpdate = Partial<CategoryInput>;
