/**
 * Configuration loading: YAML file -> validated TidyConfig.
 *
 * Rule references (`rules.enable`, `subfolders`, ...) may name a rule by id,
 * by description or by subfolder; all are normalized before lookup.
 */
import * as path from 'node:path';
import { fileExists, readFile } from '../../utils/file-system.js';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes, TidyError, errorMessage } from '../../utils/errors.js';
import { normalizeExtension, normalizeIdentifier, normalizeSubfolder } from '../../utils/string.js';
import { createCondition, createRule } from '../rules/conditions.js';
import { buildRuleAliases, emptyOverrides, resolveRuleReference } from '../rules/catalog.js';
import { getBuiltinRules } from '../rules/builtin.js';
import type { Condition, Rule } from '../rules/types.js';
import { ConfigFileSchema, type ConfigFile, type CustomRuleConfig } from './schema.js';
import type { TidyConfig, ToggleName, Toggles } from './types.js';

export const CUSTOM_RULE_PREFIX = 'custom_';

/**
 * Configuration used when no file is given.
 */
export function getDefaultConfig(): TidyConfig {
  return {
    overrides: emptyOverrides(),
    ignoreExtensions: [],
    ignorePaths: [],
    toggles: {},
  };
}

const SHORTCUT_FIELDS = [
  ['kind', 'kind'],
  ['name_contains', 'name_contains'],
  ['created_within_days', 'created_within_days'],
  ['size_gte', 'size_gte'],
  ['size_lte', 'size_lte'],
  ['extensions', 'extension_any'],
] as const;

/**
 * Build a custom rule from its config entry. The id gets the `custom_` prefix.
 */
export function parseCustomRule(rawId: string, raw: CustomRuleConfig): Rule {
  const conditions: Condition[] = (raw.conditions ?? []).map((c) => createCondition(c.type, c.value));

  if (conditions.length === 0) {
    for (const [field, tag] of SHORTCUT_FIELDS) {
      const value = raw[field];
      if (value !== undefined) {
        conditions.push(createCondition(tag, value));
      }
    }
  }

  return createRule({
    id: `${CUSTOM_RULE_PREFIX}${rawId}`,
    description: raw.description || `Custom rule ${rawId}`,
    subfolder: raw.subfolder || raw.folder_name || `Custom/${rawId}`,
    enabled: raw.enabled,
    builtIn: false,
    mode: raw.mode ?? 'all',
    conditions,
  });
}

function parseCustomRules(section: ConfigFile['custom_rules']): Rule[] {
  if (section === undefined) {
    return [];
  }
  if (Array.isArray(section)) {
    return section.map((entry, index) => parseCustomRule(entry.id ?? `rule_${index + 1}`, entry));
  }
  return Object.entries(section).map(([id, entry]) => parseCustomRule(id, entry));
}

/**
 * Turn a validated config file into engine configuration.
 */
export function buildConfig(file: ConfigFile, baseRules: readonly Rule[]): TidyConfig {
  const customRules = parseCustomRules(file.custom_rules);
  const aliases = buildRuleAliases([...baseRules, ...customRules]);

  // Known references map to ids; unknown ones stay as normalized tokens.
  const lookup = (ref: string): string | null => resolveRuleReference(ref, aliases);
  const lookupOrToken = (ref: string): string => lookup(ref) ?? normalizeIdentifier(ref);

  const enable = new Set<string>();
  for (const ref of file.rules.enable) {
    const id = lookup(ref);
    if (id) enable.add(id);
  }
  const disable = new Set<string>();
  for (const ref of file.rules.disable) {
    const id = lookup(ref);
    if (id) disable.add(id);
  }
  const order = file.rules.order.map(lookupOrToken).filter(Boolean);

  const extensionOverrides = new Map<string, string[]>();
  for (const [ref, extensions] of Object.entries(file.extension_rules)) {
    extensionOverrides.set(lookupOrToken(ref), extensions.map(normalizeExtension));
  }
  const subfolderOverrides = new Map<string, string>();
  for (const [ref, subfolder] of Object.entries(file.subfolders)) {
    subfolderOverrides.set(lookupOrToken(ref), normalizeSubfolder(subfolder));
  }

  const toggles: Partial<Toggles> = {};
  const setToggle = (name: ToggleName, value: boolean | undefined): void => {
    if (value !== undefined) toggles[name] = value;
  };
  setToggle('ignoreAliases', file.ignore.aliases);
  setToggle('ignoreFolders', file.ignore.folders);
  setToggle('ignoreTagged', file.ignore.tagged);
  setToggle('includeSubfolders', file.options.include_subfolders);
  setToggle('includeFolders', file.options.include_folders);
  setToggle('includeEmptyFolders', file.options.include_empty_folders);
  setToggle('includeTagged', file.options.include_tagged);
  setToggle('skipBundles', file.options.skip_bundles);
  setToggle('removeEmptyFolders', file.options.remove_empty_folders);
  setToggle('createDatedTopFolder', file.options.create_dated_top_folder);
  setToggle('extraLogging', file.options.extra_logging);

  return {
    overrides: {
      enable,
      disable,
      extensionOverrides,
      subfolderOverrides,
      order,
      customRules,
    },
    ignoreExtensions: file.ignore.extensions.map(normalizeExtension),
    ignorePaths: file.ignore.paths.map((entry) => entry.trim().toLowerCase()).filter(Boolean),
    toggles,
  };
}

/**
 * Parse config file content.
 */
export function parseConfig(content: string, baseRules: readonly Rule[] = getBuiltinRules()): TidyConfig {
  let data: unknown;
  try {
    data = parseYaml(content);
  } catch (error) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, errorMessage(error));
  }
  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid config: ${formatZodError(result.error)}`, {
      errors: result.error.issues,
    });
  }
  try {
    return buildConfig(result.data, baseRules);
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(ErrorCodes.CONFIG_LOAD_ERROR, `Invalid config: ${errorMessage(error)}`);
  }
}

/**
 * Load configuration from a file. Without a path, defaults apply.
 * An explicit path that does not exist is an error.
 */
export async function loadConfig(
  configPath?: string,
  baseRules: readonly Rule[] = getBuiltinRules()
): Promise<TidyConfig> {
  if (configPath === undefined) {
    return getDefaultConfig();
  }

  const fullPath = path.resolve(configPath);
  if (!(await fileExists(fullPath))) {
    throw new ConfigError(ErrorCodes.CONFIG_NOT_FOUND, `config file not found: ${fullPath}`, {
      path: fullPath,
    });
  }

  try {
    return parseConfig(await readFile(fullPath), baseRules);
  } catch (error) {
    const code = error instanceof TidyError ? error.code : ErrorCodes.CONFIG_LOAD_ERROR;
    throw new ConfigError(code, `Failed to load config from ${fullPath}: ${errorMessage(error)}`, {
      path: fullPath,
    });
  }
}
