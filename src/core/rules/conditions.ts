/**
 * Condition and rule construction. Everything entering the catalog passes
 * through here, so values are normalized once and evaluation stays pure.
 */
import { normalizeExtension, normalizeIdentifier, normalizeSubfolder, dedupe } from '../../utils/string.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import {
  CONDITION_TAGS,
  type Condition,
  type ConditionTag,
  type Rule,
  type RuleMode,
} from './types.js';

const CONDITION_TAG_SET: ReadonlySet<string> = new Set<string>(CONDITION_TAGS);

function isConditionTag(tag: string): tag is ConditionTag {
  return CONDITION_TAG_SET.has(tag);
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function unsupported(tag: string, value: unknown, reason: string): Condition {
  return { type: 'unsupported', tag, value, reason };
}

/**
 * Build a condition from a raw tag and value.
 * Unknown tags and unusable values yield an `unsupported` condition.
 */
export function createCondition(rawTag: string, value: unknown): Condition {
  const tag = normalizeIdentifier(rawTag);
  if (!isConditionTag(tag)) {
    return unsupported(rawTag, value, `unknown condition type '${rawTag}'`);
  }

  switch (tag) {
    case 'extension_any': {
      const extensions: string[] = [];
      for (const raw of asList(value)) {
        const text = String(raw);
        if (text.trim()) extensions.push(normalizeExtension(text));
      }
      return { type: tag, value: dedupe(extensions) };
    }
    case 'name_contains':
      return {
        type: tag,
        value: asList(value).map((part) => String(part).toLowerCase()),
      };
    case 'kind':
      if (typeof value !== 'string') {
        return unsupported(tag, value, 'kind must be a string');
      }
      return { type: tag, value: value.trim().toLowerCase() };
    case 'created_within_days':
    case 'size_gte':
    case 'size_lte': {
      const parsed = toFiniteNumber(value);
      if (parsed === null) {
        return unsupported(tag, value, `${tag} must be a number`);
      }
      // Byte thresholds are whole numbers; day windows may be fractional.
      return { type: tag, value: tag === 'created_within_days' ? parsed : Math.trunc(parsed) };
    }
    case 'is_folder':
    case 'is_alias':
    case 'has_tag':
      return { type: tag, value: Boolean(value) };
  }
}

/** Shorthand for an `extension_any` condition. */
export function extensionCondition(...extensions: string[]): Condition {
  return createCondition('extension_any', extensions);
}

export interface RuleInput {
  id: string;
  description: string;
  subfolder: string;
  enabled: boolean;
  builtIn: boolean;
  mode?: RuleMode;
  conditions: Condition[];
}

/**
 * Build a frozen rule with normalized id, description and subfolder.
 */
export function createRule(input: RuleInput): Rule {
  const id = normalizeIdentifier(input.id);
  if (!id) {
    throw new ConfigError(ErrorCodes.CONFIG_INVALID_RULE, `Invalid rule id '${input.id}'`);
  }
  let subfolder: string;
  try {
    subfolder = normalizeSubfolder(input.subfolder);
  } catch {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID_RULE,
      `Rule '${id}' has an empty subfolder`,
      { ruleId: id }
    );
  }
  if (!input.builtIn && input.conditions.length === 0) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID_RULE,
      `Custom rule '${id}' must define at least one condition`,
      { ruleId: id }
    );
  }
  return Object.freeze({
    id,
    description: input.description.trim(),
    subfolder,
    enabled: input.enabled,
    builtIn: input.builtIn,
    mode: input.mode ?? 'all',
    conditions: Object.freeze([...input.conditions]),
  });
}
