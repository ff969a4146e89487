/**
 * Machine-readable run report (snake_case JSON).
 */
import { writeFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes, ok, err, errorMessage, type Result } from '../../utils/errors.js';
import type { Rule } from '../rules/types.js';
import type { TidySummary } from '../planner/types.js';
import type { PriorityOptimizationReport } from '../priority/types.js';

export interface RuleHitEntry {
  rule_id: string;
  description: string;
  subfolder: string;
  hits: number;
  built_in: boolean;
  enabled: boolean;
}

export interface StatsPayload {
  generated_at: string;
  mode: 'apply' | 'dry-run';
  source_dir: string;
  destination_dir: string;
  total_targets: number;
  rule_hits: RuleHitEntry[];
  rule_hits_nonzero: Record<string, number>;
  unclassified: number;
  fallback_mime: number;
  priority_optimization: {
    enabled: boolean;
    strategy: string;
    changed: boolean;
    before_order: string[];
    after_order: string[];
    scores: Array<{
      rule_id: string;
      description: string;
      score: number;
      original_index: number;
      optimized_index: number;
    }>;
  };
  summary: {
    scanned: number;
    ignored: number;
    matched: number;
    planned_moves: number;
    moved: number;
    collisions: number;
    errors: number;
    rules_used: number;
  };
}

export interface StatsInput {
  summary: TidySummary;
  /** Rules in the order they were matched */
  rules: readonly Rule[];
  sourceDir: string;
  destinationDir: string;
  apply: boolean;
  priority: PriorityOptimizationReport;
  generatedAt?: Date;
}

/**
 * One entry per enabled rule, zero-hit rules included.
 */
export function buildRuleHitReport(rules: readonly Rule[], summary: TidySummary): RuleHitEntry[] {
  return rules
    .filter((rule) => rule.enabled)
    .map((rule) => ({
      rule_id: rule.id,
      description: rule.description,
      subfolder: rule.subfolder,
      hits: summary.ruleHits.get(rule.id) ?? 0,
      built_in: rule.builtIn,
      enabled: rule.enabled,
    }));
}

export function buildStatsPayload(input: StatsInput): StatsPayload {
  const { summary, priority } = input;
  const ruleHits = buildRuleHitReport(input.rules, summary);
  const nonzero: Record<string, number> = {};
  for (const entry of ruleHits) {
    if (entry.hits > 0) nonzero[entry.rule_id] = entry.hits;
  }

  return {
    generated_at: (input.generatedAt ?? new Date()).toISOString(),
    mode: input.apply ? 'apply' : 'dry-run',
    source_dir: input.sourceDir,
    destination_dir: input.destinationDir,
    total_targets: summary.totalTargets,
    rule_hits: ruleHits,
    rule_hits_nonzero: nonzero,
    unclassified: summary.unclassified,
    fallback_mime: summary.fallback,
    priority_optimization: {
      enabled: priority.enabled,
      strategy: priority.strategy,
      changed: priority.changed,
      before_order: priority.beforeOrder,
      after_order: priority.afterOrder,
      scores: priority.scores.map((score) => ({
        rule_id: score.ruleId,
        description: score.description,
        score: score.score,
        original_index: score.originalIndex,
        optimized_index: score.optimizedIndex,
      })),
    },
    summary: {
      scanned: summary.scanned,
      ignored: summary.ignored,
      matched: summary.matched,
      planned_moves: summary.plannedMoves,
      moved: summary.moved,
      collisions: summary.collisions,
      errors: summary.errors,
      rules_used: summary.rulesUsed,
    },
  };
}

/**
 * Write the report, creating parent directories.
 */
export async function writeStatsJson(
  filePath: string,
  payload: StatsPayload
): Promise<Result<string, SystemError>> {
  try {
    await writeFile(filePath, `${JSON.stringify(payload, null, 2)}\n`);
  } catch (error) {
    return err(
      new SystemError(ErrorCodes.STATS_WRITE_FAILED, `failed to write stats json: ${errorMessage(error)}`, {
        filePath,
      })
    );
  }
  return ok(filePath);
}
