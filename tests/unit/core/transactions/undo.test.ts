/**
 * Tests for undo replay.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { undoTransaction } from '../../../../src/core/transactions/undo.js';
import type { StoredTransaction } from '../../../../src/core/transactions/types.js';
import { TransactionError, ErrorCodes } from '../../../../src/utils/errors.js';
import { Logger } from '../../../../src/utils/logger.js';

describe('undoTransaction', () => {
  let root: string;
  let source: string;
  let destination: string;
  let log: Logger;

  function makeRecord(moves: unknown[] | null, removedEmptyDirs: string[] = []): StoredTransaction {
    return {
      id: 'test-record',
      createdAt: '2026-03-10T12:00:00.000Z',
      sourceDir: source,
      destinationDir: destination,
      moves,
      removedEmptyDirs,
      undoneAt: null,
      filePath: join(root, 'test-record.json'),
    };
  }

  function moved(name: string, subfolder: string, content = name): { from: string; to: string; rule_id: string } {
    const to = join(destination, subfolder, name);
    mkdirSync(join(destination, subfolder), { recursive: true });
    writeFileSync(to, content);
    return { from: join(source, name), to, rule_id: 'r' };
  }

  beforeEach(() => {
    root = join(tmpdir(), `tidy-undo-test-${Date.now()}`);
    source = join(root, 'src');
    destination = join(root, 'dest');
    mkdirSync(source, { recursive: true });
    mkdirSync(destination, { recursive: true });
    log = new Logger();
    log.setLevel('silent');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should move entries back to their original paths', async () => {
    const record = makeRecord([moved('a.pdf', 'Documents/PDF'), moved('b.zip', 'Archives')]);

    const result = await undoTransaction(record, { apply: true, logger: log });

    expect(result).toEqual({ restored: 2, collisions: 0, errors: 0 });
    expect(readFileSync(join(source, 'a.pdf'), 'utf-8')).toBe('a.pdf');
    expect(existsSync(join(destination, 'Archives', 'b.zip'))).toBe(false);
  });

  it('should change nothing in dry-run mode', async () => {
    const info = vi.spyOn(log, 'info');
    const move = moved('a.pdf', 'Documents/PDF');

    const result = await undoTransaction(makeRecord([move]), { apply: false, logger: log });

    expect(result).toEqual({ restored: 0, collisions: 0, errors: 0 });
    expect(existsSync(move.to)).toBe(true);
    expect(info).toHaveBeenCalledWith(`DRY-RUN UNDO: ${move.to} -> ${move.from}`);
  });

  it('should not overwrite an entry that now occupies the original path', async () => {
    const move = moved('a.pdf', 'Documents/PDF', 'tidied');
    writeFileSync(join(source, 'a.pdf'), 'newer download');

    const result = await undoTransaction(makeRecord([move]), { apply: true, logger: log });

    expect(result).toEqual({ restored: 1, collisions: 1, errors: 0 });
    expect(readFileSync(join(source, 'a.pdf'), 'utf-8')).toBe('newer download');
    expect(readFileSync(join(source, 'a (1).pdf'), 'utf-8')).toBe('tidied');
  });

  it('should replay in reverse so later moves are undone first', async () => {
    const first = moved('doc.pdf', 'Documents/PDF', 'first');
    const second = { ...moved('doc (1).pdf', 'Documents/PDF', 'second'), from: join(source, 'sub', 'doc.pdf') };
    const info = vi.spyOn(log, 'info');

    await undoTransaction(makeRecord([first, second]), { apply: true, logger: log });

    expect(info.mock.calls.map((call) => call[0])).toEqual([
      `UNDO MOVE: ${second.to} -> ${second.from}`,
      `UNDO MOVE: ${first.to} -> ${first.from}`,
    ]);
    expect(readFileSync(join(source, 'sub', 'doc.pdf'), 'utf-8')).toBe('second');
  });

  it('should count missing sources and invalid entries as errors', async () => {
    const error = vi.spyOn(log, 'error');
    const good = moved('a.pdf', 'Documents/PDF');
    const gone = { from: join(source, 'gone.pdf'), to: join(destination, 'gone.pdf'), rule_id: 'r' };

    const result = await undoTransaction(makeRecord([{ from: 5 }, gone, good]), { apply: true, logger: log });

    expect(result).toEqual({ restored: 1, collisions: 0, errors: 2 });
    expect(error).toHaveBeenCalledWith(`UNDO source missing: ${gone.to}`);
    expect(error).toHaveBeenCalledWith('UNDO invalid move entry at index 0');
  });

  it('should count a failed move as an error', async () => {
    const error = vi.spyOn(log, 'error');
    const gone = { from: join(source, 'gone.pdf'), to: join(destination, 'gone.pdf'), rule_id: 'r' };
    // Claims the recorded destination exists although nothing is there to move.
    const exists = async (candidate: string): Promise<boolean> => candidate === gone.to;

    const result = await undoTransaction(makeRecord([gone]), { apply: true, logger: log, exists });

    expect(result).toEqual({ restored: 0, collisions: 0, errors: 1 });
    expect(error).toHaveBeenCalledWith(
      expect.stringContaining(`UNDO move failed: ${gone.to} -> ${gone.from} (`)
    );
  });

  it('should recreate removed empty directories', async () => {
    const removed = join(source, 'old', 'empty');

    await undoTransaction(makeRecord([], [removed]), { apply: true, logger: log });

    expect(existsSync(removed)).toBe(true);
  });

  it('should reject a record whose moves are not a list', async () => {
    let caught: unknown;
    try {
      await undoTransaction(makeRecord(null), { apply: true, logger: log });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TransactionError);
    expect(caught).toMatchObject({ code: ErrorCodes.TX_MALFORMED });
  });
});
