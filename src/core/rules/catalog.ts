/**
 * Rule catalog: applies overrides and explicit ordering to a base rule list.
 * The base list is never mutated; every call derives a new list.
 */
import { normalizeIdentifier } from '../../utils/string.js';
import { extensionCondition } from './conditions.js';
import type { Rule, RuleOverrides } from './types.js';

/**
 * Overrides that change nothing.
 */
export function emptyOverrides(): RuleOverrides {
  return {
    enable: new Set(),
    disable: new Set(),
    extensionOverrides: new Map(),
    subfolderOverrides: new Map(),
    order: [],
    customRules: [],
  };
}

/**
 * Resolve the active rule list.
 *
 * 1. append custom rules (same id replaces in place)
 * 2. apply subfolder/extension substitutions and enable, then disable flags
 *    to built-in and custom rules alike
 * 3. move ids listed in `order` to the front, in that order
 */
export function resolveRules(base: readonly Rule[], overrides: RuleOverrides): Rule[] {
  const merged: Rule[] = [...base];
  for (const custom of overrides.customRules) {
    const existing = merged.findIndex((rule) => rule.id === custom.id);
    if (existing >= 0) {
      merged[existing] = custom;
    } else {
      merged.push(custom);
    }
  }

  const resolved = merged.map((rule) => applyRuleOverrides(rule, overrides));
  return applyExplicitOrder(resolved, overrides.order);
}

/**
 * One rule with its overrides applied. Untouched rules are returned as is.
 */
function applyRuleOverrides(rule: Rule, overrides: RuleOverrides): Rule {
  const extensions = overrides.extensionOverrides.get(rule.id);
  const subfolder = overrides.subfolderOverrides.get(rule.id);
  let enabled = rule.enabled;
  if (overrides.enable.has(rule.id)) enabled = true;
  if (overrides.disable.has(rule.id)) enabled = false;

  if (extensions === undefined && subfolder === undefined && enabled === rule.enabled) {
    return rule;
  }
  return Object.freeze({
    ...rule,
    subfolder: subfolder ?? rule.subfolder,
    enabled,
    conditions: extensions ? Object.freeze([extensionCondition(...extensions)]) : rule.conditions,
  });
}

/**
 * Stable reorder: listed ids first in the given sequence, everything else after
 * in its current relative order. Unknown and repeated ids are skipped.
 */
export function applyExplicitOrder(rules: readonly Rule[], order: readonly string[]): Rule[] {
  if (order.length === 0) {
    return [...rules];
  }
  const byId = new Map(rules.map((rule) => [rule.id, rule] as const));
  const used = new Set<string>();
  const ordered: Rule[] = [];

  for (const id of order) {
    const rule = byId.get(id);
    if (rule && !used.has(id)) {
      ordered.push(rule);
      used.add(id);
    }
  }
  for (const rule of rules) {
    if (!used.has(rule.id)) {
      ordered.push(rule);
    }
  }
  return ordered;
}

/**
 * Map every accepted spelling of a rule (id, description, subfolder) to its id.
 */
export function buildRuleAliases(rules: readonly Rule[]): Map<string, string> {
  const aliases = new Map<string, string>();
  for (const rule of rules) {
    aliases.set(rule.id, rule.id);
    aliases.set(normalizeIdentifier(rule.description), rule.id);
    aliases.set(normalizeIdentifier(rule.subfolder), rule.id);
  }
  return aliases;
}

/**
 * Resolve a user-supplied rule reference. Returns null for unknown references.
 */
export function resolveRuleReference(
  reference: string,
  aliases: ReadonlyMap<string, string>
): string | null {
  return aliases.get(normalizeIdentifier(reference)) ?? null;
}
