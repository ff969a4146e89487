/**
 * Tidy command: scan, classify and move (or preview) a folder's contents.
 */
import { Command, Option } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { combineIgnoreExtensions, combineIgnorePaths, resolveToggles } from '../../core/config/options.js';
import type { Toggles } from '../../core/config/types.js';
import { createTagProbe } from '../../core/scanner/tag-probe.js';
import { TidyEngine, type TidyResult } from '../../core/tidy/index.js';
import { expandHome } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_SOURCE_DIR, DEFAULT_UNDO_DIR, ExitCode, runCommand, type ExitCodeValue } from '../shared.js';

export interface TidyCommandOptions {
  source: string;
  destination?: string;
  /** Older spelling of --source */
  downloadsDir?: string;
  config?: string;
  undoDir: string;
  apply?: boolean;
  includeSubfolders?: boolean;
  includeFolders?: boolean;
  includeEmptyFolders?: boolean;
  includeTagged?: boolean;
  ignoreTagged?: boolean;
  ignoreAliases?: boolean;
  ignoreFolders?: boolean;
  skipBundles?: boolean;
  removeEmptyFolders?: boolean;
  createDatedTopFolder?: boolean;
  ignoreExt?: string[];
  ignorePath?: string[];
  statsJson?: string;
  optimizePriority?: boolean;
  extraLogging?: boolean;
}

/**
 * Create the tidy command.
 */
export function createTidyCommand(): Command {
  return new Command('tidy')
    .description('Sort a folder into categorized subfolders (default command)')
    .option('--source <dir>', 'Folder to tidy', DEFAULT_SOURCE_DIR)
    .option('--destination <dir>', 'Where tidied items go (default: the source folder)')
    .addOption(new Option('--downloads-dir <dir>').hideHelp())
    .option('-c, --config <path>', 'YAML config file')
    .option('--undo-dir <dir>', 'Undo history directory', DEFAULT_UNDO_DIR)
    .option('--apply', 'Move files (default is dry-run)')
    .option('--include-subfolders', 'Include items inside subfolders')
    .option('--include-folders', 'Allow folders themselves to be moved')
    .option('--include-empty-folders', 'With --include-folders, move only empty folders')
    .option('--include-tagged', 'Read OS tags so has_tag conditions can match')
    .option('--ignore-tagged', 'Skip tagged items')
    .option('--ignore-aliases', 'Skip symlinks')
    .option('--ignore-folders', 'Skip folder candidates')
    .option('--skip-bundles', 'Skip .app/.bundle/.framework/.plugin directories (on by default)')
    .option('--remove-empty-folders', 'Remove source folders left empty after moving')
    .option('--create-dated-top-folder', 'Put this run\'s output in a timestamped folder')
    .option('--ignore-ext <ext...>', 'Extra extensions to ignore')
    .option('--ignore-path <path...>', 'Names, relative paths or patterns to ignore')
    .option('--stats-json <path>', 'Write a JSON report (dry-run too)')
    .option('--optimize-priority', 'Reorder enabled rules by specificity before matching')
    .option('--extra-logging', 'Log every skipped item and match')
    .action(async (options: TidyCommandOptions) => {
      await runCommand(async () => runTidy(options));
    });
}

function cliToggles(options: TidyCommandOptions): Partial<Toggles> {
  return {
    includeSubfolders: options.includeSubfolders,
    includeFolders: options.includeFolders,
    includeEmptyFolders: options.includeEmptyFolders,
    includeTagged: options.includeTagged,
    ignoreTagged: options.ignoreTagged,
    ignoreAliases: options.ignoreAliases,
    ignoreFolders: options.ignoreFolders,
    skipBundles: options.skipBundles,
    removeEmptyFolders: options.removeEmptyFolders,
    createDatedTopFolder: options.createDatedTopFolder,
    extraLogging: options.extraLogging,
  };
}

/**
 * Run a tidy pass and return the process exit code.
 */
export async function runTidy(options: TidyCommandOptions): Promise<ExitCodeValue> {
  const config = await loadConfig(options.config ? expandHome(options.config) : undefined);
  const sourceDir = expandHome(options.downloadsDir ?? options.source);

  const engine = new TidyEngine(config, { tagProbe: createTagProbe(), logger });
  const result = await engine.run({
    sourceDir,
    destinationDir: options.destination ? expandHome(options.destination) : undefined,
    undoDir: expandHome(options.undoDir),
    apply: options.apply ?? false,
    toggles: resolveToggles(cliToggles(options), config.toggles),
    ignoreExtensions: combineIgnoreExtensions(config, options.ignoreExt),
    ignorePaths: combineIgnorePaths(config, options.ignorePath),
    optimizePriority: options.optimizePriority ?? false,
    statsJson: options.statsJson ? expandHome(options.statsJson) : undefined,
  });

  printOutcome(result, options.apply ?? false);
  return result.summary.errors > 0 ? ExitCode.ITEM_ERRORS : ExitCode.SUCCESS;
}

function printOutcome(result: TidyResult, apply: boolean): void {
  const { summary } = result;
  if (summary.errors > 0) {
    logger.fail(`${summary.errors} error(s) during tidy`);
  } else if (apply) {
    logger.success(`Moved ${summary.moved} item(s)`);
  } else if (summary.plannedMoves > 0) {
    logger.success(`Dry run: ${summary.plannedMoves} move(s) planned. Re-run with --apply to move.`);
  } else {
    logger.success('Nothing to tidy');
  }
}
