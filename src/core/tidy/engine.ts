/**
 * Tidy engine: one scan -> match -> plan -> execute -> record run.
 */
import * as path from 'node:path';
import { ensureDir, isDirectory } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { TidyConfig } from '../config/types.js';
import { removeEmptyDirectories } from '../executor/cleanup.js';
import { executePlan } from '../executor/executor.js';
import { planMoves } from '../planner/planner.js';
import type { ExistsCheck } from '../planner/collision.js';
import type { TidySummary } from '../planner/types.js';
import { disabledPriorityReport, optimizeRulePriority } from '../priority/optimizer.js';
import { buildStatsPayload, writeStatsJson, type StatsPayload } from '../report/stats.js';
import { getBuiltinRules, getKindTable } from '../rules/builtin.js';
import { resolveRules } from '../rules/catalog.js';
import type { KindTable, Rule } from '../rules/types.js';
import { scanItems } from '../scanner/scanner.js';
import { NoopTagProbe } from '../scanner/tag-probe.js';
import type { TagProbe } from '../scanner/types.js';
import { TransactionStore } from '../transactions/store.js';
import type { TidyInput, TidyResult } from './types.js';

export interface TidyEngineDeps {
  baseRules?: readonly Rule[];
  kinds?: KindTable;
  tagProbe?: TagProbe;
  logger?: Logger;
  now?: () => Date;
  exists?: ExistsCheck;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time folder name `YYYY-MM-DD_HH-MM-SS`.
 */
export function formatDatedFolderName(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}-${pad2(date.getMinutes())}-${pad2(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Target folders of every enabled rule under `destination`.
 */
export function ruleTargetRoots(rules: readonly Rule[], destination: string): string[] {
  const roots = new Set<string>();
  for (const rule of rules) {
    if (rule.enabled) roots.add(path.join(destination, rule.subfolder));
  }
  return [...roots];
}

export class TidyEngine {
  private readonly baseRules: readonly Rule[];
  private readonly kinds: KindTable;
  private readonly tagProbe: TagProbe;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly exists?: ExistsCheck;

  constructor(private readonly config: TidyConfig, deps: TidyEngineDeps = {}) {
    this.baseRules = deps.baseRules ?? getBuiltinRules();
    this.kinds = deps.kinds ?? getKindTable();
    this.tagProbe = deps.tagProbe ?? new NoopTagProbe();
    this.log = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
    this.exists = deps.exists;
  }

  /**
   * Built-in rules with the config's overrides and custom rules applied.
   */
  resolveRules(): Rule[] {
    return resolveRules(this.baseRules, this.config.overrides);
  }

  async run(input: TidyInput): Promise<TidyResult> {
    const sourceDir = path.resolve(input.sourceDir);
    const destinationDir = path.resolve(input.destinationDir ?? sourceDir);
    const { toggles } = input;

    // Phase 1: preconditions
    if (!(await isDirectory(sourceDir))) {
      throw new SystemError(ErrorCodes.SOURCE_NOT_FOUND, `source directory not found: ${sourceDir}`, {
        sourceDir,
      });
    }
    if (!(await isDirectory(destinationDir))) {
      if (input.apply) {
        await ensureDir(destinationDir);
      } else {
        this.log.info(`destination directory will be created when applying: ${destinationDir}`);
      }
    }

    // Phase 2: rule order
    let rules = this.resolveRules();
    let priority = disabledPriorityReport(rules);
    if (input.optimizePriority) {
      ({ rules, report: priority } = optimizeRulePriority(rules));
      this.log.info(
        `OPTIMIZE_PRIORITY enabled=${priority.enabled} changed=${priority.changed} strategy=${priority.strategy}`
      );
      this.log.info(`OPTIMIZE_ORDER before=${priority.beforeOrder.join(',')}`);
      this.log.info(`OPTIMIZE_ORDER after=${priority.afterOrder.join(',')}`);
    }

    const runDestination = toggles.createDatedTopFolder
      ? path.join(destinationDir, formatDatedFolderName(this.now()))
      : destinationDir;
    if (toggles.createDatedTopFolder && input.apply) {
      await ensureDir(runDestination);
    }

    // Sorting in place: tidied folders must not be re-scanned.
    const inPlace = runDestination === sourceDir;
    const excludedRoots = inPlace ? ruleTargetRoots(rules, runDestination) : [];

    // Phase 3: scan and plan
    const scan = await scanItems(
      {
        sourceRoot: sourceDir,
        destinationRoot: runDestination,
        excludedRoots,
        includeSubfolders: toggles.includeSubfolders,
        includeFolders: toggles.includeFolders,
        includeEmptyFolders: toggles.includeEmptyFolders,
        ignoreFolders: toggles.ignoreFolders,
        ignoreAliases: toggles.ignoreAliases,
        includeTagged: toggles.includeTagged,
        ignoreTagged: toggles.ignoreTagged,
        skipBundles: toggles.skipBundles,
        ignoreExtensions: input.ignoreExtensions,
        ignorePaths: input.ignorePaths,
      },
      { tagProbe: this.tagProbe, logger: this.log, extraLogging: toggles.extraLogging }
    );

    const { plan, summary } = await planMoves(scan, {
      destinationRoot: runDestination,
      rules,
      context: { referenceTime: this.now(), kinds: this.kinds },
      exists: this.exists,
      logger: toggles.extraLogging ? this.log : undefined,
    });

    // Phase 4: execute
    const execution = await executePlan(plan, { apply: input.apply, logger: this.log });
    summary.errors += execution.errors;
    summary.moved = execution.executed.length;

    let removedEmptyDirs: string[] = [];
    if (input.apply && toggles.removeEmptyFolders) {
      removedEmptyDirs = await removeEmptyDirectories(
        sourceDir,
        inPlace ? excludedRoots : [runDestination],
        this.log
      );
    }

    let undoRecordPath: string | null = null;
    if (input.apply && execution.executed.length > 0) {
      const store = new TransactionStore(input.undoDir, this.log, this.now);
      const created = await store.create({
        sourceDir,
        destinationDir: runDestination,
        moves: execution.executed,
        removedEmptyDirs,
      });
      undoRecordPath = created.filePath;
      this.log.info(`UNDO RECORD: ${undoRecordPath}`);
    }

    // Phase 5: report
    this.logSummary(summary, rules);

    let stats: StatsPayload | null = null;
    if (input.statsJson) {
      stats = buildStatsPayload({
        summary,
        rules,
        sourceDir,
        destinationDir: runDestination,
        apply: input.apply,
        priority,
        generatedAt: this.now(),
      });
      const written = await writeStatsJson(input.statsJson, stats);
      if (written.ok) {
        this.log.info(`STATS JSON: ${written.value}`);
      } else {
        summary.errors += 1;
        this.log.error(written.error.message);
      }
    }

    return {
      destinationDir: runDestination,
      rules,
      plan,
      summary,
      priority,
      removedEmptyDirs,
      undoRecordPath,
      stats,
    };
  }

  private logSummary(summary: TidySummary, rules: readonly Rule[]): void {
    this.log.info(
      `SUMMARY scanned=${summary.scanned} ignored=${summary.ignored} matched=${summary.matched} ` +
        `planned=${summary.plannedMoves} moved=${summary.moved} collisions=${summary.collisions} ` +
        `errors=${summary.errors} rules_used=${summary.rulesUsed}`
    );
    this.log.info(
      `REPORT total_targets=${summary.totalTargets} unclassified=${summary.unclassified} fallback_mime=${summary.fallback}`
    );

    const hits = rules
      .filter((rule) => rule.enabled && (summary.ruleHits.get(rule.id) ?? 0) > 0)
      .map((rule) => `${rule.id}:${summary.ruleHits.get(rule.id) ?? 0}`);
    this.log.info(hits.length > 0 ? `RULE_HITS ${hits.join(', ')}` : 'RULE_HITS (none)');
  }
}
