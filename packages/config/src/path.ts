/**
 * Configuration path helpers.
 *
 * Paths are colon-delimited and compared case-insensitively.
 */

export const KEY_DELIMITER = ':';

export const ConfigurationPath = {
  /**
   * Join segments with the key delimiter.
   */
  combine(...segments: string[]): string {
    return segments.join(KEY_DELIMITER);
  },

  /**
   * Last segment of a path.
   */
  getSectionKey(path: string): string {
    const index = path.lastIndexOf(KEY_DELIMITER);
    return index === -1 ? path : path.slice(index + 1);
  },

  /**
   * Path without its last segment, or undefined for a top level key.
   */
  getParentPath(path: string): string | undefined {
    const index = path.lastIndexOf(KEY_DELIMITER);
    return index === -1 ? undefined : path.slice(0, index);
  },
} as const;

/**
 * Normalized lookup form of a key.
 */
export function normalizeKey(key: string): string {
  return key.toLowerCase();
}
