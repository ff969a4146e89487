/**
 * Tests for the JSON run report.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildRuleHitReport, buildStatsPayload, writeStatsJson } from '../../../../src/core/report/stats.js';
import { createSummary, type TidySummary } from '../../../../src/core/planner/types.js';
import { disabledPriorityReport, optimizeRulePriority } from '../../../../src/core/priority/optimizer.js';
import { createRule, extensionCondition } from '../../../../src/core/rules/conditions.js';
import type { Rule } from '../../../../src/core/rules/types.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';

function makeRule(id: string, enabled = true): Rule {
  return createRule({
    id,
    description: `${id} files`,
    subfolder: id.toUpperCase(),
    enabled,
    builtIn: true,
    conditions: [extensionCondition(`.${id}`)],
  });
}

const rules = [makeRule('pdf'), makeRule('zip'), makeRule('off', false)];

function makeSummary(): TidySummary {
  const summary = createSummary();
  Object.assign(summary, {
    scanned: 3,
    ignored: 1,
    totalTargets: 3,
    matched: 2,
    unclassified: 1,
    plannedMoves: 2,
    moved: 2,
    rulesUsed: 1,
  });
  summary.ruleHits.set('pdf', 2);
  return summary;
}

describe('buildRuleHitReport', () => {
  it('should list every enabled rule including zero hits', () => {
    expect(buildRuleHitReport(rules, makeSummary())).toEqual([
      { rule_id: 'pdf', description: 'pdf files', subfolder: 'PDF', hits: 2, built_in: true, enabled: true },
      { rule_id: 'zip', description: 'zip files', subfolder: 'ZIP', hits: 0, built_in: true, enabled: true },
    ]);
  });
});

describe('buildStatsPayload', () => {
  it('should produce the snake_case report', () => {
    const payload = buildStatsPayload({
      summary: makeSummary(),
      rules,
      sourceDir: '/src',
      destinationDir: '/dest',
      apply: false,
      priority: disabledPriorityReport(rules),
      generatedAt: new Date('2026-03-10T12:00:00.000Z'),
    });

    expect(payload.generated_at).toBe('2026-03-10T12:00:00.000Z');
    expect(payload.mode).toBe('dry-run');
    expect(payload.source_dir).toBe('/src');
    expect(payload.destination_dir).toBe('/dest');
    expect(payload.total_targets).toBe(3);
    expect(payload.rule_hits_nonzero).toEqual({ pdf: 2 });
    expect(payload.unclassified).toBe(1);
    expect(payload.fallback_mime).toBe(0);
    expect(payload.summary).toEqual({
      scanned: 3,
      ignored: 1,
      matched: 2,
      planned_moves: 2,
      moved: 2,
      collisions: 0,
      errors: 0,
      rules_used: 1,
    });
    expect(payload.priority_optimization).toEqual({
      enabled: false,
      strategy: 'specificity_v1',
      changed: false,
      before_order: ['pdf', 'zip', 'off'],
      after_order: ['pdf', 'zip', 'off'],
      scores: [],
    });
  });

  it('should include optimization scores', () => {
    const { report } = optimizeRulePriority(rules);
    const payload = buildStatsPayload({
      summary: makeSummary(),
      rules,
      sourceDir: '/src',
      destinationDir: '/dest',
      apply: true,
      priority: report,
    });

    expect(payload.mode).toBe('apply');
    expect(payload.priority_optimization.scores[0]).toEqual({
      rule_id: 'pdf',
      description: 'pdf files',
      score: 135,
      original_index: 0,
      optimized_index: 0,
    });
  });
});

describe('writeStatsJson', () => {
  let tempDir: string;
  const payload = buildStatsPayload({
    summary: createSummary(),
    rules: [],
    sourceDir: '/src',
    destinationDir: '/dest',
    apply: false,
    priority: disabledPriorityReport([]),
    generatedAt: new Date('2026-03-10T12:00:00.000Z'),
  });

  beforeEach(() => {
    tempDir = join(tmpdir(), `tidy-stats-test-${Date.now()}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write indented JSON and create parent folders', async () => {
    const filePath = join(tempDir, 'reports', 'stats.json');

    const result = await writeStatsJson(filePath, payload);

    expect(result).toEqual({ ok: true, value: filePath });
    const raw = readFileSync(filePath, 'utf-8');
    expect(raw.startsWith('{\n  "generated_at": "2026-03-10T12:00:00.000Z",')).toBe(true);
    expect(JSON.parse(raw)).toEqual(payload);
  });

  it('should return an error when the file cannot be written', async () => {
    const blocker = join(tempDir, 'blocker');
    writeFileSync(blocker, '');

    const result = await writeStatsJson(join(blocker, 'stats.json'), payload);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ErrorCodes.STATS_WRITE_FAILED);
      expect(result.error.message).toMatch(/^failed to write stats json: /);
    }
  });
});
