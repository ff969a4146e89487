/**
 * Move planner: matches scanned items to rules and assigns each a distinct,
 * non-clobbering destination. Touches the filesystem only for existence checks.
 */
import * as path from 'node:path';
import { pathExists } from '../../utils/file-system.js';
import type { Logger } from '../../utils/logger.js';
import { findMatchingRule } from '../matching/matcher.js';
import type { EvaluationContext } from '../matching/evaluator.js';
import { FALLBACK_RULE_ID, type Rule } from '../rules/types.js';
import type { Item, ScanResult } from '../scanner/types.js';
import { resolveCollision, type ExistsCheck } from './collision.js';
import { createSummary, type MovePlanEntry, type TidySummary } from './types.js';

export interface PlanOptions {
  destinationRoot: string;
  rules: readonly Rule[];
  context: EvaluationContext;
  exists?: ExistsCheck;
  /** Receives a debug line per match when set */
  logger?: Logger;
}

function depthOf(item: Item): number {
  return item.relativePath.split('/').length - 1;
}

/**
 * Deepest first, then case-insensitive name, so a folder is planned after
 * anything still inside it.
 */
export function orderCandidates(items: readonly Item[]): Item[] {
  return [...items].sort((a, b) => {
    const byDepth = depthOf(b) - depthOf(a);
    if (byDepth !== 0) return byDepth;
    const nameA = a.name.toLowerCase();
    const nameB = b.name.toLowerCase();
    return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
  });
}

/**
 * Build the move plan and the scan/match counters for one run.
 */
export async function planMoves(
  scan: ScanResult,
  options: PlanOptions
): Promise<{ plan: MovePlanEntry[]; summary: TidySummary }> {
  const summary = createSummary();
  summary.ignored = scan.ignored;
  summary.scanned = scan.items.length;
  summary.totalTargets = summary.scanned;

  const exists = options.exists ?? pathExists;
  const claimed = new Set<string>();
  const plan: MovePlanEntry[] = [];

  for (const item of orderCandidates(scan.items)) {
    const rule = findMatchingRule(options.rules, item, options.context);
    if (!rule) {
      summary.unclassified += 1;
      continue;
    }

    summary.matched += 1;
    summary.ruleHits.set(rule.id, (summary.ruleHits.get(rule.id) ?? 0) + 1);
    if (rule.id === FALLBACK_RULE_ID) {
      summary.fallback += 1;
    }

    const target = path.join(options.destinationRoot, rule.subfolder, item.name);
    const resolved = await resolveCollision(target, claimed, exists);
    claimed.add(resolved.path);
    if (resolved.renamed) {
      summary.collisions += 1;
    }
    options.logger?.debug(`MATCH [${rule.id}]: ${item.relativePath}`);

    plan.push({
      source: item.path,
      destination: resolved.path,
      ruleId: rule.id,
      ruleDescription: rule.description,
      collisionRenamed: resolved.renamed,
    });
  }

  summary.plannedMoves = plan.length;
  summary.rulesUsed = summary.ruleHits.size;
  return { plan, summary };
}
