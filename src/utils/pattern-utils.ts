/**
 * Glob matching for backup exclusions
 */

import { minimatch } from 'minimatch';

/**
 * Matches a POSIX relative path against a glob, case-insensitively. Names
 * starting with a dot are matchable.
 */
export function matchPattern(relativePath: string, pattern: string): boolean {
  return minimatch(relativePath, pattern, { dot: true, nocase: true });
}

export function matchesAny(
  relativePath: string,
  patterns: readonly string[],
): boolean {
  return patterns.some((pattern) => matchPattern(relativePath, pattern));
}
