/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { expandHome } from '../utils/file-system.js';
import { logger } from '../utils/logger.js';
import { createTidyCommand } from './commands/tidy.js';
import { createRulesListCommand } from './commands/rules-list.js';
import { createUndoListCommand } from './commands/undo-list.js';
import { createUndoCommand } from './commands/undo.js';
import { createUndoDeleteCommand } from './commands/undo-delete.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
function readVersion(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
    return raw.version;
  }
  return '0.0.0';
}

const VERSION = readVersion(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')));

export interface GlobalOptions {
  verbose?: boolean;
  logFile?: string;
}

/**
 * Apply the global logging switches.
 */
export function configureLogging(options: GlobalOptions): void {
  logger.setLevel(options.verbose ? 'debug' : 'info');
  logger.setLogFile(options.logFile ? expandHome(options.logFile) : null);
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('downloads-tidy')
    .description('Rule-based folder tidier with dry-run previews and undo')
    .version(VERSION)
    .option('--verbose', 'Show debug output')
    .option('--log-file <path>', 'Also write all log lines to a file')
    .hook('preAction', (_program, actionCommand) => {
      configureLogging(actionCommand.optsWithGlobals<GlobalOptions>());
    });

  program.addCommand(createTidyCommand(), { isDefault: true });
  [createRulesListCommand, createUndoListCommand, createUndoCommand, createUndoDeleteCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
