/**
 * Ignore-path matching for the scanner.
 *
 * A relative entry matches a relative path or final name exactly, or as a
 * gitignore pattern (a bare name matches at any depth). Absolute entries compare
 * against the entry's absolute path. All comparisons are case-insensitive.
 */
import * as path from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { toPosixPath } from '../../utils/file-system.js';

export interface IgnoreList {
  /**
   * Check if an entry should be skipped.
   * @param relativePath - Path from the scan root
   * @param absolutePath - Absolute path of the entry
   */
  ignores(relativePath: string, absolutePath: string, isDirectory: boolean): boolean;

  /** Number of configured entries */
  readonly size: number;
}

/**
 * Create an IgnoreList from user-supplied entries.
 */
export function createIgnoreList(entries: readonly string[]): IgnoreList {
  const absolute = new Set<string>();
  const relative: string[] = [];
  const exact = new Set<string>();

  for (const raw of entries) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    if (path.isAbsolute(trimmed)) {
      absolute.add(toPosixPath(path.resolve(trimmed)).toLowerCase());
    } else {
      const token = toPosixPath(trimmed).toLowerCase();
      relative.push(token);
      exact.add(token.replace(/\/+$/, ''));
    }
  }

  const ig: Ignore = ignore({ ignorecase: true }).add(relative);
  const size = absolute.size + relative.length;

  return {
    size,
    ignores(relativePath: string, absolutePath: string, isDirectory: boolean): boolean {
      if (size === 0) return false;
      if (absolute.has(toPosixPath(absolutePath).toLowerCase())) {
        return true;
      }
      const rel = toPosixPath(relativePath);
      if (relative.length === 0 || rel === '' || rel.startsWith('..')) {
        return false;
      }
      const lowerRel = rel.toLowerCase();
      if (exact.has(lowerRel) || exact.has(path.posix.basename(lowerRel))) {
        return true;
      }
      return ig.ignores(isDirectory ? `${rel}/` : rel);
    },
  };
}
