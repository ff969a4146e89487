/**
 * Removal of directories left empty after a run.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { isWithin } from '../../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

/**
 * Walk `root` bottom-up and remove empty directories. The root itself and
 * anything under an excluded root are kept. Symlinked directories are not
 * followed. Directories that cannot be read or removed are left in place.
 *
 * @returns Removed paths, deepest first
 */
export async function removeEmptyDirectories(
  root: string,
  excludedRoots: readonly string[],
  log: Logger = defaultLogger
): Promise<string[]> {
  const resolvedRoot = path.resolve(root);
  const excluded = excludedRoots.map((dir) => path.resolve(dir));
  const removed: string[] = [];

  const visit = async (dir: string): Promise<void> => {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      log.debug(`cannot read ${dir}: ${String(error)}`);
      return;
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        await visit(path.join(dir, entry.name));
      }
    }

    if (dir === resolvedRoot || excluded.some((ex) => isWithin(dir, ex))) {
      return;
    }

    try {
      // Re-read: children may have just been removed.
      if ((await fs.promises.readdir(dir)).length === 0) {
        await fs.promises.rmdir(dir);
        removed.push(dir);
        log.info(`REMOVE EMPTY DIR: ${dir}`);
      }
    } catch (error) {
      log.debug(`cannot remove ${dir}: ${String(error)}`);
    }
  };

  await visit(resolvedRoot);
  return removed;
}
