/**
 * undo command: move the entries of one tidy run back.
 */
import { Command } from 'commander';
import { TransactionStore, undoTransaction } from '../../core/transactions/index.js';
import { expandHome } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_UNDO_DIR, ExitCode, runCommand, type ExitCodeValue } from '../shared.js';

interface UndoOptions {
  undoDir: string;
  id?: string;
  apply?: boolean;
}

/**
 * Create the undo command.
 */
export function createUndoCommand(): Command {
  return new Command('undo')
    .description('Undo the latest pending tidy run, or one by id')
    .option('--undo-dir <dir>', 'Undo history directory', DEFAULT_UNDO_DIR)
    .option('--id <id>', 'Undo record id')
    .option('--apply', 'Move files back (default is dry-run)')
    .action(async (options: UndoOptions) => {
      await runCommand(async () => runUndo(options));
    });
}

export async function runUndo(options: UndoOptions): Promise<ExitCodeValue> {
  const apply = options.apply ?? false;
  const store = new TransactionStore(expandHome(options.undoDir), logger);
  const record = await store.select(options.id);

  const result = await undoTransaction(record, { apply, logger });
  if (apply && result.errors === 0) {
    await store.markUndone(record);
  }

  logger.info(
    `UNDO SUMMARY restored=${result.restored} collisions=${result.collisions} errors=${result.errors}`
  );
  return result.errors > 0 ? ExitCode.ITEM_ERRORS : ExitCode.SUCCESS;
}
