/**
 * Merging CLI switches, config values and defaults.
 */
import { normalizeExtension } from '../../utils/string.js';
import { DEFAULT_IGNORE_EXTENSIONS } from '../scanner/scanner.js';
import { TOGGLE_NAMES, type TidyConfig, type Toggles } from './types.js';

export const DEFAULT_TOGGLES: Readonly<Toggles> = Object.freeze({
  includeSubfolders: false,
  includeFolders: false,
  includeEmptyFolders: false,
  includeTagged: false,
  ignoreTagged: false,
  ignoreAliases: false,
  ignoreFolders: false,
  skipBundles: true,
  removeEmptyFolders: false,
  createDatedTopFolder: false,
  extraLogging: false,
});

/**
 * A switch given on the command line turns the option on; otherwise the
 * config value applies; otherwise the default.
 */
export function resolveToggles(cli: Partial<Toggles>, config: Partial<Toggles>): Toggles {
  const resolved: Toggles = { ...DEFAULT_TOGGLES };
  for (const name of TOGGLE_NAMES) {
    resolved[name] = cli[name] === true || (config[name] ?? DEFAULT_TOGGLES[name]);
  }
  return resolved;
}

/**
 * Built-in ignore extensions plus configured and command-line ones.
 */
export function combineIgnoreExtensions(config: TidyConfig, cliExtensions: readonly string[] = []): Set<string> {
  const result = new Set<string>(DEFAULT_IGNORE_EXTENSIONS);
  for (const ext of config.ignoreExtensions) result.add(ext);
  for (const ext of cliExtensions) {
    if (ext.trim()) result.add(normalizeExtension(ext));
  }
  return result;
}

export function combineIgnorePaths(config: TidyConfig, cliPaths: readonly string[] = []): string[] {
  const result = new Set<string>(config.ignorePaths);
  for (const entry of cliPaths) {
    const trimmed = entry.trim().toLowerCase();
    if (trimmed) result.add(trimmed);
  }
  return [...result];
}
