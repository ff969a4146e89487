/**
 * Specificity-based rule reordering.
 *
 * Narrow rules (one extension, several phrases, conjunctive mode, user-defined)
 * move ahead of broad ones. Matching semantics never change; only priority does.
 * Disabled rules stay at the end in their original relative order.
 */
import { FALLBACK_RULE_ID, type Condition, type Rule } from '../rules/types.js';
import type { PriorityOptimizationReport, RulePriorityScore } from './types.js';

export const PRIORITY_STRATEGY = 'specificity_v1';

const EXCLUDED_SCORE = -1_000_000;
const MAX_COUNTED_PHRASES = 5;
const MAX_COUNTED_CONDITIONS = 5;

/**
 * Score one condition. Higher means more selective.
 */
export function conditionSpecificityScore(condition: Condition): number {
  switch (condition.type) {
    case 'extension_any':
      return 120 / Math.max(1, condition.value.length);
    case 'name_contains': {
      const phrases = new Set(condition.value.map((part) => part.trim()).filter(Boolean));
      return 70 + Math.min(phrases.size, MAX_COUNTED_PHRASES) * 4;
    }
    case 'created_within_days':
    case 'size_gte':
    case 'size_lte':
      return 45;
    case 'has_tag':
    case 'is_alias':
    case 'is_folder':
      return 40;
    case 'kind':
      return 35;
    case 'unsupported':
      return 0;
    default: {
      const unreachable: never = condition;
      return unreachable;
    }
  }
}

/**
 * Score a whole rule: condition scores plus mode, origin and size bonuses.
 */
export function ruleSpecificityScore(rule: Rule): number {
  if (!rule.enabled) {
    return EXCLUDED_SCORE;
  }
  let score = rule.conditions.reduce((sum, condition) => sum + conditionSpecificityScore(condition), 0);
  if (rule.mode === 'all') score += 12;
  if (!rule.builtIn) score += 6;
  score += Math.min(rule.conditions.length, MAX_COUNTED_CONDITIONS) * 3;

  // The catch-all always matches last.
  if (rule.id === FALLBACK_RULE_ID) {
    score += EXCLUDED_SCORE;
  }
  return score;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Reorder enabled rules by descending specificity, stable on ties.
 */
export function optimizeRulePriority(rules: readonly Rule[]): {
  rules: Rule[];
  report: PriorityOptimizationReport;
} {
  const scored: Array<{ rule: Rule; score: number; index: number }> = [];
  const disabled: Rule[] = [];

  rules.forEach((rule, index) => {
    if (rule.enabled) {
      scored.push({ rule, score: ruleSpecificityScore(rule), index });
    } else {
      disabled.push(rule);
    }
  });

  scored.sort((a, b) => b.score - a.score || a.index - b.index);

  const optimized = [...scored.map((entry) => entry.rule), ...disabled];
  const beforeOrder = rules.map((rule) => rule.id);
  const afterOrder = optimized.map((rule) => rule.id);

  const scores: RulePriorityScore[] = scored.map((entry, optimizedIndex) => ({
    ruleId: entry.rule.id,
    description: entry.rule.description,
    score: round3(entry.score),
    originalIndex: entry.index,
    optimizedIndex,
  }));

  return {
    rules: optimized,
    report: {
      enabled: true,
      strategy: PRIORITY_STRATEGY,
      changed: beforeOrder.some((id, i) => id !== afterOrder[i]),
      beforeOrder,
      afterOrder,
      scores,
    },
  };
}

/**
 * Report for a run that skipped optimization.
 */
export function disabledPriorityReport(rules: readonly Rule[]): PriorityOptimizationReport {
  const order = rules.map((rule) => rule.id);
  return {
    enabled: false,
    strategy: PRIORITY_STRATEGY,
    changed: false,
    beforeOrder: order,
    afterOrder: [...order],
    scores: [],
  };
}
