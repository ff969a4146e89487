/**
 * Rule matching: the first enabled rule whose conditions hold wins.
 */
import type { Rule } from '../rules/types.js';
import type { Item } from '../scanner/types.js';
import { evaluateCondition, type EvaluationContext } from './evaluator.js';

/**
 * Check one rule against an item, honoring its mode.
 * A rule without conditions never matches.
 */
export function matchesRule(rule: Rule, item: Item, context: EvaluationContext): boolean {
  if (rule.conditions.length === 0) {
    return false;
  }
  const check = (condition: Rule['conditions'][number]) => evaluateCondition(condition, item, context);
  return rule.mode === 'any' ? rule.conditions.some(check) : rule.conditions.every(check);
}

/**
 * Find the first enabled rule, in list order, that matches the item.
 */
export function findMatchingRule(
  rules: readonly Rule[],
  item: Item,
  context: EvaluationContext
): Rule | null {
  for (const rule of rules) {
    if (rule.enabled && matchesRule(rule, item, context)) {
      return rule;
    }
  }
  return null;
}
