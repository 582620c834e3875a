/**
 * Tag - tags table models
 *
 * Tags belong to exactly one category; (name, category_id) is unique.
 */

/**
 * Tag row (snake_case - matches SQLite schema exactly)
 */
export interface TagRow {
  id: number;
  name: string;
  category_id: number;
  description: string;
}

/**
 * Tag (camelCase - for TypeScript usage)
 */
export interface Tag {
  id: number;
  name: string;
  categoryId: number;
  description: string;
}

/**
 * Conversion helper: TagRow → Tag
 */
export function rowToTag(row: TagRow): Tag {
  return {
    id: row.id,
    name: row.name,
    categoryId: row.category_id,
    description: row.description,
  };
}

/**
 * Input for creating a tag
 */
export interface TagInput {
  name: string;
  categoryId: number;
  description?: string;
}

/**
 * Patch for updating a tag; undefined fields keep their value
 */
export type TagUpdate = Partial<TagInput>;
