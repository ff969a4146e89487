/**
 * undo-list command: show stored undo records, newest first.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { TransactionStore, type StoredTransaction } from '../../core/transactions/index.js';
import { expandHome } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_UNDO_DIR, ExitCode, runCommand, type ExitCodeValue } from '../shared.js';

interface UndoListOptions {
  undoDir: string;
}

export function formatRecordLine(record: StoredTransaction): string {
  const state = record.undoneAt ? 'done' : 'pending';
  const moves = record.moves?.length ?? 0;
  return `${record.id}  ${state}  moves=${moves}  source=${record.sourceDir}  destination=${record.destinationDir}`;
}

/**
 * Create the undo-list command.
 */
export function createUndoListCommand(): Command {
  return new Command('undo-list')
    .description('List undo records')
    .option('--undo-dir <dir>', 'Undo history directory', DEFAULT_UNDO_DIR)
    .action(async (options: UndoListOptions) => {
      await runCommand(async () => runUndoList(options));
    });
}

export async function runUndoList(options: UndoListOptions): Promise<ExitCodeValue> {
  const undoDir = expandHome(options.undoDir);
  const records = await new TransactionStore(undoDir, logger).list();

  if (records.length === 0) {
    logger.info(`No undo records found in ${undoDir}`);
    return ExitCode.SUCCESS;
  }

  console.log(chalk.bold(`UNDO RECORDS: ${records.length}`));
  for (const record of records) {
    console.log(formatRecordLine(record));
  }
  return ExitCode.SUCCESS;
}
