/**
 * Media Type - classification of a catalogued file
 *
 * Values:
 * - image, video, sound: stored verbatim in media.media_type
 * - unknown: anything else; stored as the literal 'unknown'
 */
export type MediaType = 'unknown' | 'image' | 'video' | 'sound';

export const MEDIA_TYPES: readonly MediaType[] = ['unknown', 'image', 'video', 'sound'];

/**
 * Stored value → MediaType. Unrecognized, empty and null values read as 'unknown'.
 */
export function parseMediaType(value: string | null | undefined): MediaType {
  switch (value) {
    case 'image':
    case 'video':
    case 'sound':
      return value;
    default:
      return 'unknown';
  }
}

/**
 * MediaType → stored value
 */
export function serializeMediaType(type: MediaType): string {
  return type;
}
