/**
 * Undo record store: one `<id>.json` file per apply run in a directory.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import { globFiles, readFile, writeFile, isDirectory } from '../../utils/file-system.js';
import { TransactionError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { StoredTransactionSchema, fromStoredJson, toRecordJson, toStoredJson } from './schema.js';
import type {
  DeleteSelector,
  MoveRecord,
  StoredTransaction,
  TransactionRecord,
} from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Build a record id from local time plus 8 random hex characters.
 */
export function createTransactionId(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`;
  return `${date}-${time}-${randomBytes(4).toString('hex')}`;
}

export interface CreateTransactionInput {
  sourceDir: string;
  destinationDir: string;
  moves: MoveRecord[];
  removedEmptyDirs: string[];
}

export class TransactionStore {
  constructor(
    readonly directory: string,
    private readonly log: Logger = defaultLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Persist a new pending record. Callers only create records for runs that
   * moved at least one entry.
   */
  async create(input: CreateTransactionInput): Promise<{ record: TransactionRecord; filePath: string }> {
    const created = this.now();
    const record: TransactionRecord = {
      id: createTransactionId(created),
      createdAt: created.toISOString(),
      sourceDir: input.sourceDir,
      destinationDir: input.destinationDir,
      moves: input.moves,
      removedEmptyDirs: input.removedEmptyDirs,
      undoneAt: null,
    };
    const filePath = path.join(this.directory, `${record.id}.json`);
    await writeFile(filePath, `${JSON.stringify(toRecordJson(record), null, 2)}\n`);
    return { record, filePath };
  }

  /**
   * All readable records, newest first by creation time.
   * Files that are not valid records are skipped.
   */
  async list(): Promise<StoredTransaction[]> {
    if (!(await isDirectory(this.directory))) {
      return [];
    }
    const files = (await globFiles('*.json', { cwd: this.directory })).sort();
    const records: StoredTransaction[] = [];

    for (const file of files) {
      let data: unknown;
      try {
        data = JSON.parse(await readFile(file));
      } catch (error) {
        this.log.debug(`skipping unreadable undo record ${file}: ${errorMessage(error)}`);
        continue;
      }
      const parsed = StoredTransactionSchema.safeParse(data);
      if (!parsed.success) {
        this.log.debug(`skipping foreign JSON file ${file}`);
        continue;
      }
      records.push(fromStoredJson(parsed.data, file));
    }

    // Stable: equal timestamps keep file-name order.
    return records.sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0));
  }

  /**
   * Pick a record to undo: the given id, or the newest pending one.
   */
  async select(id?: string): Promise<StoredTransaction> {
    const records = await this.list();

    if (id === undefined) {
      const pending = records.find((record) => record.undoneAt === null);
      if (!pending) {
        throw new TransactionError(ErrorCodes.TX_NOT_FOUND, 'no pending undo record found');
      }
      return pending;
    }

    const record = records.find((candidate) => candidate.id === id);
    if (!record) {
      throw new TransactionError(ErrorCodes.TX_NOT_FOUND, `undo record not found: ${id}`, { id });
    }
    if (record.undoneAt !== null) {
      throw new TransactionError(
        ErrorCodes.TX_ALREADY_UNDONE,
        `undo record already undone: ${id} (at ${record.undoneAt})`,
        { id, undoneAt: record.undoneAt }
      );
    }
    return record;
  }

  /**
   * Stamp `undone_at` and rewrite the record file.
   */
  async markUndone(record: StoredTransaction): Promise<StoredTransaction> {
    const updated: StoredTransaction = { ...record, undoneAt: this.now().toISOString() };
    await writeFile(updated.filePath, `${JSON.stringify(toStoredJson(updated), null, 2)}\n`);
    return updated;
  }

  /**
   * Records matching every given selector. Age compares `created_at` against
   * now minus the given days; records without a parseable timestamp never match it.
   */
  async selectForDeletion(selector: DeleteSelector): Promise<StoredTransaction[]> {
    if (selector.id === undefined && selector.olderThanDays === undefined) {
      throw new TransactionError(
        ErrorCodes.TX_SELECTOR_REQUIRED,
        'undo-delete requires --id or --older-than-days'
      );
    }
    const cutoff =
      selector.olderThanDays === undefined
        ? null
        : this.now().getTime() - selector.olderThanDays * DAY_MS;

    const records = await this.list();
    return records.filter((record) => {
      if (selector.id !== undefined && record.id !== selector.id) {
        return false;
      }
      if (cutoff !== null) {
        const created = Date.parse(record.createdAt);
        if (Number.isNaN(created) || created >= cutoff) {
          return false;
        }
      }
      return true;
    });
  }

  /**
   * Delete record files. Files that vanished in the meantime are not counted.
   */
  async delete(records: readonly StoredTransaction[]): Promise<number> {
    let deleted = 0;
    for (const record of records) {
      try {
        await fs.promises.unlink(record.filePath);
        deleted += 1;
      } catch (error) {
        this.log.warn(`could not delete undo record ${record.filePath}: ${errorMessage(error)}`);
      }
    }
    return deleted;
  }
}
