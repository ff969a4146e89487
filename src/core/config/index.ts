export { loadConfig, parseConfig, buildConfig, parseCustomRule, getDefaultConfig, CUSTOM_RULE_PREFIX } from './loader.js';
export { resolveToggles, combineIgnoreExtensions, combineIgnorePaths, DEFAULT_TOGGLES } from './options.js';
export { ConfigFileSchema, CustomRuleSchema } from './schema.js';
export type { ConfigFile, CustomRuleConfig } from './schema.js';
export { TOGGLE_NAMES } from './types.js';
export type { TidyConfig, ToggleName, Toggles } from './types.js';
