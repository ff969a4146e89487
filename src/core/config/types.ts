/**
 * Resolved configuration types.
 */
import type { RuleOverrides } from '../rules/types.js';

/** Boolean switches settable from both the CLI and the config file. */
export const TOGGLE_NAMES = [
  'includeSubfolders',
  'includeFolders',
  'includeEmptyFolders',
  'includeTagged',
  'ignoreTagged',
  'ignoreAliases',
  'ignoreFolders',
  'skipBundles',
  'removeEmptyFolders',
  'createDatedTopFolder',
  'extraLogging',
] as const;

export type ToggleName = (typeof TOGGLE_NAMES)[number];

export type Toggles = Record<ToggleName, boolean>;

/**
 * Validated configuration handed to the engine.
 */
export interface TidyConfig {
  overrides: RuleOverrides;
  /** Normalized extensions */
  ignoreExtensions: string[];
  /** Trimmed, lowercased */
  ignorePaths: string[];
  /** Only switches the file sets explicitly */
  toggles: Partial<Toggles>;
}
