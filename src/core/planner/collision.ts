/**
 * Collision-free destination selection.
 */
import * as path from 'node:path';
import { pathExists } from '../../utils/file-system.js';
import { splitCompoundSuffix } from '../../utils/string.js';

export type ExistsCheck = (filePath: string) => Promise<boolean>;

export interface ResolvedDestination {
  path: string;
  /** True when the name had to change */
  renamed: boolean;
}

/**
 * Pick a free path for `target`. A path is taken when something exists on disk
 * there or when it is in `claimed`. Taken names are retried as
 * `base (n)suffix` with n = 1, 2, ... The caller adds the result to `claimed`.
 */
export async function resolveCollision(
  target: string,
  claimed: ReadonlySet<string>,
  exists: ExistsCheck = pathExists
): Promise<ResolvedDestination> {
  const isTaken = async (candidate: string): Promise<boolean> =>
    claimed.has(candidate) || (await exists(candidate));

  if (!(await isTaken(target))) {
    return { path: target, renamed: false };
  }

  const dir = path.dirname(target);
  const [base, suffix] = splitCompoundSuffix(path.basename(target));
  for (let index = 1; ; index++) {
    const candidate = path.join(dir, `${base} (${index})${suffix}`);
    if (!(await isTaken(candidate))) {
      return { path: candidate, renamed: true };
    }
  }
}
