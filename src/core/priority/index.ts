export {
  conditionSpecificityScore,
  ruleSpecificityScore,
  optimizeRulePriority,
  disabledPriorityReport,
  PRIORITY_STRATEGY,
} from './optimizer.js';
export type { PriorityOptimizationReport, RulePriorityScore } from './types.js';
