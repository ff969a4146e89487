export { evaluateCondition } from './evaluator.js';
export type { EvaluationContext } from './evaluator.js';
export { matchesRule, findMatchingRule } from './matcher.js';
