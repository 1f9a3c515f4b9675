/**
 * Scalar parsing helpers for configuration and environment values.
 */

/**
 * Parse comma-separated string into array.
 *
 * Trims whitespace and filters empty values.
 */
export function parseCommaSeparated(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Strict boolean parse: "true"/"false" (case-insensitive, trimmed).
 *
 * Returns undefined for anything else, including "1" and "yes".
 */
export function tryParseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const lower = value.trim().toLowerCase();
  if (lower === 'true') {
    return true;
  }
  if (lower === 'false') {
    return false;
  }
  return undefined;
}
