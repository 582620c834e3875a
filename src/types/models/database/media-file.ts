/**
 * Media File - media table models
 *
 * One row per file found under a base path. (base_path_id, relative_path)
 * is unique.
 */

import type { MediaType } from '../enums/media-type';
import { parseMediaType } from '../enums/media-type';

/**
 * Media row (snake_case - matches SQLite schema exactly)
 */
export interface MediaFileRow {
  id: number;

  /** Path relative to the base path, no leading/trailing slash */
  relative_path: string;

  base_path_id: number;

  /** Pixels (null when unknown or not applicable) */
  width: number | null;

  /** Pixels (null when unknown or not applicable) */
  height: number | null;

  /** File size in kB */
  size: number;

  /** Rating from 1 to 10 (null = unrated) */
  mark: number | null;

  description: string;

  /** 'image' | 'video' | 'sound' | 'unknown' (other values read as unknown) */
  media_type: string | null;
}

/**
 * Media file (camelCase - for TypeScript usage)
 */
export interface MediaFile {
  id: number;
  relativePath: string;
  basePathId: number;
  width: number | null;
  height: number | null;
  /** File size in kB */
  size: number;
  mark: number | null;
  description: string;
  mediaType: MediaType;
}

/**
 * Conversion helper: MediaFileRow → MediaFile
 */
export function rowToMediaFile(row: MediaFileRow): MediaFile {
  return {
    id: row.id,
    relativePath: row.relative_path,
    basePathId: row.base_path_id,
    width: row.width,
    height: row.height,
    size: row.size,
    mark: row.mark,
    description: row.description,
    mediaType: parseMediaType(row.media_type),
  };
}

/**
 * Input for registering a media file
 */
export interface MediaFileInput {
  relativePath: string;
  basePathId: number;
  width?: number | null;
  height?: number | null;
  size: number;
  mark?: number | null;
  description?: string;
  mediaType?: MediaType;
}

/**
 * Patch for updating a media file.
 *
 * undefined keeps the stored value; null clears width, height or mark.
 * relativePath, basePathId and mediaType cannot change.
 */
export type MediaFileUpdate = Partial<Pick<MediaFileInput, 'width' | 'height' | 'size' | 'mark' | 'description'>>;
