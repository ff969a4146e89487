/**
 * Type definitions for the tidy engine.
 */
import type { Toggles } from '../config/types.js';
import type { MovePlanEntry, TidySummary } from '../planner/types.js';
import type { PriorityOptimizationReport } from '../priority/types.js';
import type { Rule } from '../rules/types.js';
import type { StatsPayload } from '../report/stats.js';

/**
 * Input parameters for one tidy run. Paths are absolute.
 */
export interface TidyInput {
  sourceDir: string;
  /** Defaults to sourceDir */
  destinationDir?: string;
  undoDir: string;
  /** Whether to move anything (false = dry-run) */
  apply: boolean;
  toggles: Toggles;
  ignoreExtensions: ReadonlySet<string>;
  ignorePaths: readonly string[];
  optimizePriority: boolean;
  /** Write a stats report here when set */
  statsJson?: string;
}

/**
 * Complete result of a tidy run.
 */
export interface TidyResult {
  /** Where moves land; includes the dated folder when one is used */
  destinationDir: string;
  /** Rules in the order they were matched */
  rules: Rule[];
  plan: MovePlanEntry[];
  summary: TidySummary;
  priority: PriorityOptimizationReport;
  removedEmptyDirs: string[];
  /** Undo record file, when one was written */
  undoRecordPath: string | null;
  stats: StatsPayload | null;
}
