/**
 * Path normalization for remote object paths.
 */

export const SEPARATOR = '/';

/**
 * Normalize a user-supplied path so it starts with exactly one separator.
 * Leading separator runs collapse to one and trailing separators are dropped.
 * Idempotent: `normalizePath(normalizePath(p)) === normalizePath(p)`.
 *
 * @example
 * normalizePath('reports/q1.yaml');  // '/reports/q1.yaml'
 * normalizePath('//reports/');       // '/reports'
 * normalizePath('');                 // '/'
 */
export function normalizePath(path: string): string {
  const trimmed = path.replace(/^\/+/, '').replace(/\/+$/, '');
  return SEPARATOR + trimmed;
}

/**
 * Convert a normalized path to the form the remote API expects.
 * The API names the root with the empty string.
 */
export function toRemotePath(normalized: string): string {
  return normalized === SEPARATOR ? '' : normalized;
}

