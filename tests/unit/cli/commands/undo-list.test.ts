/**
 * Tests for the undo-list command.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('chalk', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
  },
}));

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

import { createUndoListCommand, formatRecordLine } from '../../../../src/cli/commands/undo-list.js';
import { logger } from '../../../../src/utils/logger.js';

describe('undo-list command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let undoDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    undoDir = join(tmpdir(), `tidy-undo-list-test-${Date.now()}`);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    rmSync(undoDir, { recursive: true, force: true });
  });

  it('should format a record line', () => {
    expect(
      formatRecordLine({
        id: '20260310-090807-0a1b2c3d',
        createdAt: '2026-03-10T09:08:07.000Z',
        sourceDir: '/src',
        destinationDir: '/dest',
        moves: [{}, {}],
        removedEmptyDirs: [],
        undoneAt: '2026-03-11T00:00:00.000Z',
        filePath: '/undos/x.json',
      })
    ).toBe('20260310-090807-0a1b2c3d  done  moves=2  source=/src  destination=/dest');
  });

  it('should say when there are no records', async () => {
    await createUndoListCommand().parseAsync(['node', 'test', '--undo-dir', undoDir]);

    expect(logger.info).toHaveBeenCalledWith(`No undo records found in ${undoDir}`);
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it('should list records newest first', async () => {
    mkdirSync(undoDir, { recursive: true });
    writeFileSync(
      join(undoDir, 'a.json'),
      JSON.stringify({ id: 'a', created_at: '2026-01-01T00:00:00Z', source_dir: '/s', destination_dir: '/d', moves: [] })
    );
    writeFileSync(
      join(undoDir, 'b.json'),
      JSON.stringify({ id: 'b', created_at: '2026-02-01T00:00:00Z', source_dir: '/s', destination_dir: '/d', moves: null })
    );

    await createUndoListCommand().parseAsync(['node', 'test', '--undo-dir', undoDir]);

    expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
      'UNDO RECORDS: 2',
      'b  pending  moves=0  source=/s  destination=/d',
      'a  pending  moves=0  source=/s  destination=/d',
    ]);
  });
});
