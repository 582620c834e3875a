/**
 * Media Tag - media_tags association table models
 */

/**
 * Media tag row (snake_case - matches SQLite schema exactly)
 *
 * (media_id, tag_id) is unique.
 */
export interface MediaTagRow {
  id: number;
  media_id: number;
  tag_id: number;
}

export interface MediaTag {
  id: number;
  mediaId: number;
  tagId: number;
}

export function rowToMediaTag(row: MediaTagRow): MediaTag {
  return {
    id: row.id,
    mediaId: row.media_id,
    tagId: row.tag_id,
  };
}
