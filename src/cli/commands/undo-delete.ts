/**
 * undo-delete command: prune undo records by id and/or age.
 */
import { Command } from 'commander';
import { TransactionStore } from '../../core/transactions/index.js';
import { expandHome } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import {
  DEFAULT_UNDO_DIR,
  ExitCode,
  parseNonNegativeInt,
  runCommand,
  type ExitCodeValue,
} from '../shared.js';

interface UndoDeleteOptions {
  undoDir: string;
  id?: string;
  olderThanDays?: number;
  apply?: boolean;
}

/**
 * Create the undo-delete command.
 */
export function createUndoDeleteCommand(): Command {
  return new Command('undo-delete')
    .description('Delete undo records by id or age')
    .option('--undo-dir <dir>', 'Undo history directory', DEFAULT_UNDO_DIR)
    .option('--id <id>', 'Delete one record')
    .option('--older-than-days <n>', 'Delete records older than N days', parseNonNegativeInt)
    .option('--apply', 'Delete (default is dry-run, count only)')
    .action(async (options: UndoDeleteOptions) => {
      await runCommand(async () => runUndoDelete(options));
    });
}

export async function runUndoDelete(options: UndoDeleteOptions): Promise<ExitCodeValue> {
  const store = new TransactionStore(expandHome(options.undoDir), logger);
  const selected = await store.selectForDeletion({
    id: options.id,
    olderThanDays: options.olderThanDays,
  });

  if (!options.apply) {
    logger.info(`DRY-RUN delete count=${selected.length}`);
    return ExitCode.SUCCESS;
  }

  const deleted = await store.delete(selected);
  logger.info(`deleted undo records=${deleted}`);
  return ExitCode.SUCCESS;
}
