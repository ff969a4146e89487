/**
 * Item scanner: enumerates tidy candidates under a source root.
 *
 * Directories are pruned before descending, so ignored and bundle subtrees are
 * never read. Everything skipped by policy is counted in `ignored`; entries that
 * are simply not candidates (e.g. folders when folders are excluded during a
 * recursive scan) are not.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { isDirectory, isEmptyDirectory, isWithin } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { longestMatchingExtension } from '../../utils/string.js';
import { createIgnoreList, type IgnoreList } from './ignore-list.js';
import { NoopTagProbe } from './tag-probe.js';
import type { Item, ScanOptions, ScanResult, TagProbe } from './types.js';

/** Directory suffixes treated as opaque bundles. */
export const BUNDLE_SUFFIXES = ['.app', '.bundle', '.framework', '.plugin'] as const;

/** In-progress download and temp-file extensions that are never tidied. */
export const DEFAULT_IGNORE_EXTENSIONS: readonly string[] = [
  '.crdownload',
  '.part',
  '.partial',
  '.download',
  '.opdownload',
  '.!qb',
  '.tmp',
];

export interface ScannerDeps {
  tagProbe?: TagProbe;
  logger?: Logger;
  /** Debug-log every skipped entry */
  extraLogging?: boolean;
}

export function isBundleName(name: string): boolean {
  const lower = name.toLowerCase();
  return BUNDLE_SUFFIXES.some((suffix) => lower.endsWith(suffix));
}

/**
 * Scans a source directory according to ScanOptions.
 */
export class ItemScanner {
  private readonly tagProbe: TagProbe;
  private readonly log: Logger;
  private readonly extraLogging: boolean;
  private readonly ignoreList: IgnoreList;
  private readonly sourceRoot: string;
  private readonly excludedRoots: string[];
  /** Folders between the source and an excluded root: descended, never moved */
  private readonly excludedAncestors: Set<string>;
  private readonly probeTags: boolean;
  private ignored = 0;

  constructor(private readonly options: ScanOptions, deps: ScannerDeps = {}) {
    this.tagProbe = deps.tagProbe ?? new NoopTagProbe();
    this.log = deps.logger ?? defaultLogger;
    this.extraLogging = deps.extraLogging ?? false;
    this.ignoreList = createIgnoreList(options.ignorePaths);
    this.sourceRoot = path.resolve(options.sourceRoot);
    const wantsTags = options.includeTagged || options.ignoreTagged;
    this.probeTags = wantsTags && this.tagProbe.available;
    if (wantsTags && !this.tagProbe.available) {
      this.log.warn('tag detection is not available on this platform; every item is treated as untagged');
    }

    const destination = path.resolve(options.destinationRoot);
    // A destination that contains the source would swallow every entry.
    const roots = isWithin(this.sourceRoot, destination) ? [] : [destination];
    this.excludedRoots = [...roots, ...(options.excludedRoots ?? []).map((r) => path.resolve(r))];
    this.excludedAncestors = new Set();
    for (const root of this.excludedRoots) {
      let current = path.dirname(root);
      while (current !== this.sourceRoot && isWithin(current, this.sourceRoot)) {
        this.excludedAncestors.add(current);
        current = path.dirname(current);
      }
    }
  }

  async scan(): Promise<ScanResult> {
    if (!(await isDirectory(this.sourceRoot))) {
      throw new SystemError(
        ErrorCodes.SOURCE_NOT_FOUND,
        `source directory not found: ${this.sourceRoot}`,
        { sourceRoot: this.sourceRoot }
      );
    }

    this.ignored = 0;
    const items: Item[] = [];
    await this.walk(this.sourceRoot, '', items);
    return { items, ignored: this.ignored };
  }

  private async walk(dir: string, relDir: string, items: Item[]): Promise<void> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => compareNames(a.name, b.name));

    const subdirectories: Array<{ abs: string; rel: string }> = [];

    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      const rel = relDir ? `${relDir}/${entry.name}` : entry.name;
      // Symlinks report false here, so they are never descended.
      const entryIsDir = entry.isDirectory();

      if (this.isExcluded(abs, rel, entryIsDir)) continue;

      if (entryIsDir) {
        if (this.options.skipBundles && isBundleName(entry.name)) {
          this.skip('bundle', abs);
          continue;
        }
        if (this.excludedAncestors.has(abs)) {
          if (this.options.includeSubfolders) {
            subdirectories.push({ abs, rel });
          } else {
            this.skip('destination ancestor', abs);
          }
          continue;
        }
        const candidate = await this.considerFolder(abs, rel);
        if (candidate) items.push(candidate);
        if (this.options.includeSubfolders) {
          subdirectories.push({ abs, rel });
        }
        continue;
      }

      const candidate = await this.considerFile(abs, rel);
      if (candidate) items.push(candidate);
    }

    for (const sub of subdirectories) {
      await this.walk(sub.abs, sub.rel, items);
    }
  }

  private isExcluded(abs: string, rel: string, entryIsDir: boolean): boolean {
    if (this.excludedRoots.some((root) => isWithin(abs, root))) {
      this.skip('destination subtree', abs);
      return true;
    }
    if (this.ignoreList.ignores(rel, abs, entryIsDir)) {
      this.skip('ignore list', abs);
      return true;
    }
    return false;
  }

  private async considerFolder(abs: string, rel: string): Promise<Item | null> {
    const { includeFolders, ignoreFolders, includeEmptyFolders, includeSubfolders } = this.options;

    if (!includeFolders) {
      // During recursion a folder is something to descend into, not a skip.
      if (!includeSubfolders) this.skip('folder', abs);
      return null;
    }
    if (ignoreFolders) {
      this.skip('folder', abs);
      return null;
    }
    if (includeEmptyFolders && !(await isEmptyDirectory(abs))) {
      if (!includeSubfolders) this.skip('non-empty folder', abs);
      return null;
    }

    const item = await this.buildItem(abs, rel, true);
    if (this.options.ignoreTagged && item.hasTag) {
      this.skip('tagged', abs);
      return null;
    }
    return item;
  }

  private async considerFile(abs: string, rel: string): Promise<Item | null> {
    const item = await this.buildItem(abs, rel, false);
    if (this.options.ignoreAliases && item.isSymlink) {
      this.skip('alias', abs);
      return null;
    }
    if (this.options.ignoreTagged && item.hasTag) {
      this.skip('tagged', abs);
      return null;
    }
    if (longestMatchingExtension(item.name, this.options.ignoreExtensions) !== null) {
      this.skip('ignored extension', abs);
      return null;
    }
    return item;
  }

  private async buildItem(abs: string, rel: string, entryIsDir: boolean): Promise<Item> {
    const stat = await fs.promises.lstat(abs);
    const hasTag = this.probeTags ? await this.tagProbe.hasTag(abs) : false;
    return {
      path: abs,
      relativePath: rel,
      name: path.basename(abs),
      isDirectory: entryIsDir,
      isSymlink: stat.isSymbolicLink(),
      sizeBytes: entryIsDir ? 0 : stat.size,
      createdAt: stat.mtime,
      hasTag,
    };
  }

  private skip(reason: string, abs: string): void {
    this.ignored += 1;
    if (this.extraLogging) {
      this.log.debug(`SKIP ${reason}: ${abs}`);
    }
  }
}

function compareNames(a: string, b: string): number {
  const lowerA = a.toLowerCase();
  const lowerB = b.toLowerCase();
  if (lowerA !== lowerB) return lowerA < lowerB ? -1 : 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Convenience wrapper around ItemScanner.
 */
export async function scanItems(options: ScanOptions, deps: ScannerDeps = {}): Promise<ScanResult> {
  return new ItemScanner(options, deps).scan();
}
