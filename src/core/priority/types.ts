/**
 * Priority optimizer type definitions.
 */

export interface RulePriorityScore {
  ruleId: string;
  description: string;
  /** Rounded to 3 decimals */
  score: number;
  originalIndex: number;
  optimizedIndex: number;
}

/**
 * Informational outcome of the optimization pre-pass.
 */
export interface PriorityOptimizationReport {
  enabled: boolean;
  strategy: string;
  /** Whether the rule order differs from the input */
  changed: boolean;
  beforeOrder: string[];
  afterOrder: string[];
  /** One entry per enabled rule, in optimized order */
  scores: RulePriorityScore[];
}
