/**
 * Reverse replay of an undo record.
 */
import { ensureDir, moveEntry, pathExists } from '../../utils/file-system.js';
import {
  TransactionError,
  ErrorCodes,
  ok,
  err,
  errorMessage,
  type Result,
} from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { resolveCollision, type ExistsCheck } from '../planner/collision.js';
import { MoveEntrySchema } from './schema.js';
import type { MoveRecord, StoredTransaction, UndoResult } from './types.js';

export interface UndoOptions {
  apply: boolean;
  logger?: Logger;
  exists?: ExistsCheck;
}

function parseMoveEntry(raw: unknown, index: number): Result<MoveRecord, TransactionError> {
  const parsed = MoveEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new TransactionError(ErrorCodes.UNDO_ENTRY_INVALID, `invalid move entry at index ${index}`, {
        index,
      })
    );
  }
  return ok({ from: parsed.data.from, to: parsed.data.to, ruleId: parsed.data.rule_id });
}

interface RestoredEntry {
  target: string;
  renamed: boolean;
}

async function restoreEntry(
  move: MoveRecord,
  claimed: Set<string>,
  options: Required<Pick<UndoOptions, 'apply' | 'exists'>> & { log: Logger }
): Promise<Result<RestoredEntry, TransactionError>> {
  const source = move.to;
  if (!(await options.exists(source))) {
    return err(
      new TransactionError(ErrorCodes.UNDO_SOURCE_MISSING, `source missing: ${source}`, { source })
    );
  }

  const resolved = await resolveCollision(move.from, claimed, options.exists);
  claimed.add(resolved.path);

  if (!options.apply) {
    options.log.info(`DRY-RUN UNDO: ${source} -> ${resolved.path}`);
    return ok({ target: resolved.path, renamed: resolved.renamed });
  }

  try {
    await moveEntry(source, resolved.path);
  } catch (error) {
    return err(
      new TransactionError(
        ErrorCodes.UNDO_MOVE_FAILED,
        `move failed: ${source} -> ${resolved.path} (${errorMessage(error)})`,
        { source, target: resolved.path }
      )
    );
  }
  options.log.info(`UNDO MOVE: ${source} -> ${resolved.path}`);
  return ok({ target: resolved.path, renamed: resolved.renamed });
}

/**
 * Move every recorded destination back to its source, last move first.
 * Anything now occupying an original path is left alone and the restored
 * entry gets a ` (n)` name instead. Removed empty directories are recreated.
 *
 * Throws TransactionError when `moves` is not a list; nothing is touched then.
 */
export async function undoTransaction(
  record: StoredTransaction,
  options: UndoOptions
): Promise<UndoResult> {
  const log = options.logger ?? defaultLogger;
  const exists = options.exists ?? pathExists;

  if (record.moves === null) {
    throw new TransactionError(
      ErrorCodes.TX_MALFORMED,
      `invalid undo record ${record.id}: moves must be an array`,
      { id: record.id, filePath: record.filePath }
    );
  }

  const result: UndoResult = { restored: 0, collisions: 0, errors: 0 };
  const claimed = new Set<string>();

  for (let index = record.moves.length - 1; index >= 0; index--) {
    const entry = parseMoveEntry(record.moves[index], index);
    const restored = entry.ok
      ? await restoreEntry(entry.value, claimed, { apply: options.apply, exists, log })
      : entry;
    if (!restored.ok) {
      result.errors += 1;
      log.error(`UNDO ${restored.error.message}`);
      continue;
    }
    if (restored.value.renamed) {
      result.collisions += 1;
    }
    if (options.apply) {
      result.restored += 1;
    }
  }

  for (const dir of record.removedEmptyDirs) {
    if (!options.apply) {
      log.info(`DRY-RUN UNDO DIR CREATE: ${dir}`);
      continue;
    }
    try {
      await ensureDir(dir);
    } catch (error) {
      log.warn(`could not recreate ${dir}: ${errorMessage(error)}`);
    }
  }

  return result;
}
