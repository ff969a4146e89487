/**
 * Executes (or simulates) a move plan. A failed move is counted and logged;
 * the rest of the batch still runs.
 */
import { moveEntry } from '../../utils/file-system.js';
import { SystemError, ErrorCodes, ok, err, errorMessage, type Result } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import type { MovePlanEntry } from '../planner/types.js';
import type { MoveRecord } from '../transactions/types.js';

export interface ExecuteOptions {
  apply: boolean;
  logger?: Logger;
}

export interface ExecuteResult {
  /** Successfully performed moves, in plan order */
  executed: MoveRecord[];
  errors: number;
}

/**
 * Perform one planned move.
 */
export async function executeMove(entry: MovePlanEntry): Promise<Result<MoveRecord, SystemError>> {
  try {
    await moveEntry(entry.source, entry.destination);
  } catch (error) {
    return err(
      new SystemError(ErrorCodes.MOVE_FAILED, errorMessage(error), {
        source: entry.source,
        destination: entry.destination,
      })
    );
  }
  return ok({ from: entry.source, to: entry.destination, ruleId: entry.ruleId });
}

/**
 * Run a plan. In dry-run mode nothing on disk changes and `executed` is empty.
 */
export async function executePlan(
  plan: readonly MovePlanEntry[],
  options: ExecuteOptions
): Promise<ExecuteResult> {
  const log = options.logger ?? defaultLogger;
  const executed: MoveRecord[] = [];
  let errors = 0;

  for (const entry of plan) {
    if (!options.apply) {
      log.info(`DRY-RUN [${entry.ruleDescription}]: ${entry.source} -> ${entry.destination}`);
      continue;
    }

    const result = await executeMove(entry);
    if (result.ok) {
      executed.push(result.value);
      log.info(`MOVE [${entry.ruleDescription}]: ${entry.source} -> ${entry.destination}`);
    } else {
      errors += 1;
      log.error(`ERROR move failed: ${entry.source} -> ${entry.destination} (${result.error.message})`);
    }
  }

  return { executed, errors };
}
