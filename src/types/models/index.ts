/**
 * Core Data Models - Central export point
 *
 * All database models and enums organized by category.
 */

// ============================================================================
// ENUMS
// ============================================================================

export type { MediaType } from './enums/media-type';
export { MEDIA_TYPES, parseMediaType, serializeMediaType } from './enums/media-type';

// ============================================================================
// DATABASE MODELS
// ============================================================================

// Base Paths Table
export type { BasePath, BasePathRow } from './database/base-path';
export { rowToBasePath } from './database/base-path';

// Tag Categories Table
export type { Category, CategoryRow, CategoryInput, CategoryUpdate } from './database/category';
export { rowToCategory } from './database/category';

// Tags Table
export type { Tag, TagRow, TagInput, TagUpdate } from './database/tag';
export { rowToTag } from './database/tag';

// Media Table
export type { MediaFile, MediaFileRow, MediaFileInput, MediaFileUpdate } from './database/media-file';
export { rowToMediaFile } from './database/media-file';

// Media Tags Table
export type { MediaTag, MediaTagRow } from './database/media-tag';
export { rowToMediaTag } from './database/media-tag';
