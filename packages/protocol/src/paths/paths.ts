// Logical path helpers
// Logical paths are relative, '/'-separated and independent of the host OS.

/**
 * Normalize a logical path: backslashes become '/', duplicate and trailing
 * separators are dropped, and leading './' or '/' segments are removed.
 */
export function normalizePath(path: string): string {
  const segments = path
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.');
  return segments.join('/');
}

/**
 * Join logical path parts, normalizing the result
 */
export function joinPath(...parts: string[]): string {
  return normalizePath(parts.filter((part) => part !== '').join('/'));
}

/**
 * Last segment of a logical path
 */
export function fileName(path: string): string {
  const normalized = normalizePath(path);
  const slash = normalized.lastIndexOf('/');
  return slash >= 0 ? normalized.slice(slash + 1) : normalized;
}

/**
 * Lower-cased extension including the dot (".csv"), or '' when there is none
 */
export function extensionOf(path: string): string {
  const name = fileName(path);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot).toLowerCase() : '';
}

/**
 * File name without its extension: "Localizations/ko.csv" → "ko"
 */
export function baseName(path: string): string {
  const name = fileName(path);
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

/**
 * Extension a file pattern targets: "*.csv" → ".csv".
 * Falls back to ".json" when the pattern names no extension.
 */
export function extensionFromPattern(pattern: string | undefined): string {
  if (!pattern) {
    return '.json';
  }
  const dot = pattern.lastIndexOf('.');
  return dot >= 0 ? pattern.slice(dot).toLowerCase() : '.json';
}

/**
 * Check a file name against a pattern with `*` and `?` wildcards.
 * Matching is case-insensitive and never crosses a '/'.
 */
export function matchesPattern(name: string, pattern: string): boolean {
  let source = '';
  for (const char of pattern) {
    if (char === '*') {
      source += '[^/]*';
    } else if (char === '?') {
      source += '[^/]';
    } else {
      source += char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i').test(name);
}
