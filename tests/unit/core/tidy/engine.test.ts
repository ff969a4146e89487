/**
 * Tests for the tidy engine.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TidyEngine, formatDatedFolderName, ruleTargetRoots } from '../../../../src/core/tidy/index.js';
import type { TidyInput } from '../../../../src/core/tidy/index.js';
import { getDefaultConfig, parseConfig } from '../../../../src/core/config/loader.js';
import { DEFAULT_TOGGLES, combineIgnoreExtensions } from '../../../../src/core/config/options.js';
import type { Toggles } from '../../../../src/core/config/types.js';
import { createRule, extensionCondition } from '../../../../src/core/rules/conditions.js';
import { TransactionStore } from '../../../../src/core/transactions/store.js';
import { undoTransaction } from '../../../../src/core/transactions/undo.js';
import { ErrorCodes } from '../../../../src/utils/errors.js';
import { Logger } from '../../../../src/utils/logger.js';

const NOW = new Date(2026, 2, 10, 9, 8, 7);

describe('formatDatedFolderName', () => {
  it('should use local time with zero padding', () => {
    expect(formatDatedFolderName(NOW)).toBe('2026-03-10_09-08-07');
  });
});

describe('ruleTargetRoots', () => {
  it('should list enabled rule folders once', () => {
    const make = (id: string, subfolder: string, enabled = true) =>
      createRule({ id, description: id, subfolder, enabled, builtIn: true, conditions: [extensionCondition('.x')] });

    expect(ruleTargetRoots([make('a', 'Docs'), make('b', 'Docs'), make('c', 'Off', false)], '/dest')).toEqual([
      join('/dest', 'Docs'),
    ]);
  });
});

describe('TidyEngine', () => {
  let root: string;
  let source: string;
  let undoDir: string;
  let log: Logger;

  function input(overrides: Partial<TidyInput> = {}, toggles: Partial<Toggles> = {}): TidyInput {
    return {
      sourceDir: source,
      undoDir,
      apply: false,
      toggles: { ...DEFAULT_TOGGLES, ...toggles },
      ignoreExtensions: combineIgnoreExtensions(getDefaultConfig()),
      ignorePaths: [],
      optimizePriority: false,
      ...overrides,
    };
  }

  function engine(config = getDefaultConfig()): TidyEngine {
    return new TidyEngine(config, { logger: log, now: () => NOW });
  }

  beforeEach(() => {
    root = join(tmpdir(), `tidy-engine-test-${Date.now()}`);
    source = join(root, 'Downloads');
    undoDir = join(root, 'undos');
    mkdirSync(source, { recursive: true });
    writeFileSync(join(source, 'doc.pdf'), 'pdf');
    writeFileSync(join(source, 'video.mp4.part'), 'partial');
    writeFileSync(join(source, 'unknown.xyz'), 'mystery');
    log = new Logger();
    log.setLevel('silent');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('dry run', () => {
    it('should plan without touching the disk', async () => {
      const result = await engine().run(input());

      expect(result.plan).toEqual([
        {
          source: join(source, 'doc.pdf'),
          destination: join(source, 'Documents', 'PDF', 'doc.pdf'),
          ruleId: 'pdf_documents',
          ruleDescription: 'PDF Documents',
          collisionRenamed: false,
        },
      ]);
      expect(result.summary).toMatchObject({
        scanned: 2,
        ignored: 1,
        matched: 1,
        unclassified: 1,
        plannedMoves: 1,
        moved: 0,
        errors: 0,
        rulesUsed: 1,
      });
      expect(result.undoRecordPath).toBeNull();
      expect(readdirSync(source).sort()).toEqual(['doc.pdf', 'unknown.xyz', 'video.mp4.part']);
      expect(existsSync(undoDir)).toBe(false);
    });

    it('should never plan unfinished downloads', async () => {
      for (const name of ['a.crdownload', 'b.pdf.part', 'c.partial', 'd.zip.download']) {
        writeFileSync(join(source, name), 'incomplete');
      }

      const result = await engine().run(input({}, { extraLogging: true }));

      expect(result.plan.map((move) => move.source)).toEqual([join(source, 'doc.pdf')]);
      expect(result.summary).toMatchObject({ scanned: 2, ignored: 5 });
    });

    it('should plan the same moves when repeated', async () => {
      const first = await engine().run(input());
      const second = await engine().run(input());

      expect(second.plan).toEqual(first.plan);
    });

    it('should log the summary lines', async () => {
      const info = vi.spyOn(log, 'info');

      await engine().run(input());

      expect(info).toHaveBeenCalledWith(
        'SUMMARY scanned=2 ignored=1 matched=1 planned=1 moved=0 collisions=0 errors=0 rules_used=1'
      );
      expect(info).toHaveBeenCalledWith('REPORT total_targets=2 unclassified=1 fallback_mime=0');
      expect(info).toHaveBeenCalledWith('RULE_HITS pdf_documents:1');
    });

    it('should announce a destination it would create', async () => {
      const info = vi.spyOn(log, 'info');
      const destination = join(root, 'Sorted');

      const result = await engine().run(input({ destinationDir: destination }));

      expect(info).toHaveBeenCalledWith(`destination directory will be created when applying: ${destination}`);
      expect(result.plan[0].destination).toBe(join(destination, 'Documents', 'PDF', 'doc.pdf'));
      expect(existsSync(destination)).toBe(false);
    });
  });

  describe('apply and undo', () => {
    it('should move, record, and restore', async () => {
      const result = await engine().run(input({ apply: true }));

      expect(result.summary.moved).toBe(1);
      expect(readFileSync(join(source, 'Documents', 'PDF', 'doc.pdf'), 'utf-8')).toBe('pdf');
      expect(result.undoRecordPath).not.toBeNull();

      const store = new TransactionStore(undoDir, log, () => NOW);
      const records = await store.list();
      expect(records).toHaveLength(1);
      expect(records[0].moves).toEqual([
        {
          from: join(source, 'doc.pdf'),
          to: join(source, 'Documents', 'PDF', 'doc.pdf'),
          rule_id: 'pdf_documents',
        },
      ]);

      const record = await store.select();
      const undo = await undoTransaction(record, { apply: true, logger: log });
      await store.markUndone(record);

      expect(undo).toEqual({ restored: 1, collisions: 0, errors: 0 });
      expect(readFileSync(join(source, 'doc.pdf'), 'utf-8')).toBe('pdf');
      await expect(store.select()).rejects.toMatchObject({ code: ErrorCodes.TX_NOT_FOUND });
    });

    it('should leave tidied folders alone on the next run', async () => {
      await engine().run(input({ apply: true }));
      const second = await engine().run(input({ apply: true }));

      expect(second.summary.matched).toBe(0);
      expect(second.undoRecordPath).toBeNull();
      expect(readdirSync(undoDir)).toHaveLength(1);
    });

    it('should not move the parents of tidied folders on a later folder run', async () => {
      writeFileSync(join(source, 'a.png'), 'png');
      const config = parseConfig('rules:\n  enable: [folders]\n');

      await engine(config).run(input({ apply: true }, { includeFolders: true }));
      expect(existsSync(join(source, 'Images', 'PNG', 'a.png'))).toBe(true);
      expect(existsSync(join(source, 'Documents', 'PDF', 'doc.pdf'))).toBe(true);

      const second = await engine(config).run(input({}, { includeFolders: true }));

      expect(second.plan).toEqual([]);
      expect(second.summary.ignored).toBe(3);
    });

    it('should remove folders emptied by the run', async () => {
      mkdirSync(join(source, 'nested'));
      writeFileSync(join(source, 'nested', 'inner.pdf'), 'inner');

      const result = await engine().run(
        input({ apply: true }, { includeSubfolders: true, removeEmptyFolders: true })
      );

      expect(result.removedEmptyDirs).toEqual([join(source, 'nested')]);
      expect(existsSync(join(source, 'Documents', 'PDF', 'inner.pdf'))).toBe(true);
    });
  });

  describe('options', () => {
    it('should route a run into a dated folder', async () => {
      const result = await engine().run(input({ apply: true }, { createDatedTopFolder: true }));

      const dated = join(source, '2026-03-10_09-08-07');
      expect(result.destinationDir).toBe(dated);
      expect(existsSync(join(dated, 'Documents', 'PDF', 'doc.pdf'))).toBe(true);
    });

    it('should apply config overrides', async () => {
      const config = parseConfig('subfolders:\n  pdf_documents: Papers\n');

      const result = await engine(config).run(input());

      expect(result.plan[0].destination).toBe(join(source, 'Papers', 'doc.pdf'));
    });

    it('should log priority optimization', async () => {
      const info = vi.spyOn(log, 'info');

      const result = await engine().run(input({ optimizePriority: true }));

      expect(result.priority.enabled).toBe(true);
      expect(info).toHaveBeenCalledWith(
        `OPTIMIZE_PRIORITY enabled=true changed=${result.priority.changed} strategy=specificity_v1`
      );
      expect(result.summary.matched).toBe(1);
    });

    it('should write a stats report in dry-run mode', async () => {
      const statsJson = join(root, 'stats.json');

      const result = await engine().run(input({ statsJson }));

      const saved: unknown = JSON.parse(readFileSync(statsJson, 'utf-8'));
      expect(saved).toMatchObject({ mode: 'dry-run', total_targets: 2, rule_hits_nonzero: { pdf_documents: 1 } });
      expect(result.stats?.unclassified).toBe(1);
    });

    it('should count a failed stats write as an error', async () => {
      writeFileSync(join(root, 'blocker'), '');

      const result = await engine().run(input({ statsJson: join(root, 'blocker', 'stats.json') }));

      expect(result.summary.errors).toBe(1);
    });
  });

  it('should fail when the source is missing', async () => {
    await expect(engine().run(input({ sourceDir: join(root, 'missing') }))).rejects.toMatchObject({
      code: ErrorCodes.SOURCE_NOT_FOUND,
    });
  });
});
