import type { LogFilterRule, LogLevel } from './types.js';

/**
 * Match a category against a filter pattern.
 *
 * Without a wildcard the pattern is a prefix. With one `*`, the category
 * must start with the part before it and end with the part after it.
 */
export function matchesCategory(pattern: string, category: string): boolean {
  const star = pattern.indexOf('*');
  if (star === -1) {
    return category.startsWith(pattern);
  }

  const prefix = pattern.slice(0, star);
  const suffix = pattern.slice(star + 1);
  return (
    category.length >= prefix.length + suffix.length &&
    category.startsWith(prefix) &&
    category.endsWith(suffix)
  );
}

/**
 * A record passes when every rule matching its category accepts it.
 */
export function isEnabled(rules: readonly LogFilterRule[], category: string, level: LogLevel): boolean {
  for (const rule of rules) {
    if (matchesCategory(rule.pattern, category) && !rule.predicate(level, category)) {
      return false;
    }
  }
  return true;
}
