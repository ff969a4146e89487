/**
 * Undo record type definitions.
 */

/** One executed move, as recorded for undo. */
export interface MoveRecord {
  from: string;
  to: string;
  ruleId: string;
}

/**
 * A record as written after an apply run.
 */
export interface TransactionRecord {
  /** `YYYYMMDD-HHMMSS-xxxxxxxx`, local time plus random hex */
  id: string;
  /** ISO-8601 timestamp */
  createdAt: string;
  sourceDir: string;
  destinationDir: string;
  moves: MoveRecord[];
  removedEmptyDirs: string[];
  undoneAt: string | null;
}

/**
 * A record read back from the undo directory. Move entries stay unvalidated
 * until undo time so one bad entry does not hide the whole record.
 */
export interface StoredTransaction {
  id: string;
  createdAt: string;
  sourceDir: string;
  destinationDir: string;
  /** Raw entries; null when the stored field is not a list */
  moves: unknown[] | null;
  removedEmptyDirs: string[];
  undoneAt: string | null;
  /** File the record was loaded from */
  filePath: string;
}

export interface UndoResult {
  restored: number;
  collisions: number;
  errors: number;
}

export interface DeleteSelector {
  id?: string;
  olderThanDays?: number;
}
