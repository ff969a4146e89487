/**
 * On-disk JSON shape of undo records (snake_case).
 */
import { z } from 'zod';
import type { MoveRecord, StoredTransaction, TransactionRecord } from './types.js';

/**
 * Envelope accepted when listing. Only `id` is required; `moves` is checked
 * when the record is undone.
 */
export const StoredTransactionSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  created_at: z.string().default(''),
  source_dir: z.string().default(''),
  destination_dir: z.string().default(''),
  moves: z.unknown().optional(),
  removed_empty_dirs: z.unknown().optional(),
  undone_at: z.string().nullish(),
});

export const MoveEntrySchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  rule_id: z.string().default(''),
});

export type StoredTransactionJson = z.infer<typeof StoredTransactionSchema>;

export function fromStoredJson(data: StoredTransactionJson, filePath: string): StoredTransaction {
  const removed = Array.isArray(data.removed_empty_dirs)
    ? data.removed_empty_dirs.filter((dir): dir is string => typeof dir === 'string')
    : [];
  return {
    id: data.id,
    createdAt: data.created_at,
    sourceDir: data.source_dir,
    destinationDir: data.destination_dir,
    moves: Array.isArray(data.moves) ? data.moves : null,
    removedEmptyDirs: removed,
    undoneAt: data.undone_at || null,
    filePath,
  };
}

function moveToJson(move: MoveRecord): Record<string, string> {
  return { from: move.from, to: move.to, rule_id: move.ruleId };
}

export function toRecordJson(record: TransactionRecord): Record<string, unknown> {
  return {
    id: record.id,
    created_at: record.createdAt,
    source_dir: record.sourceDir,
    destination_dir: record.destinationDir,
    moves: record.moves.map(moveToJson),
    removed_empty_dirs: record.removedEmptyDirs,
    undone_at: record.undoneAt,
  };
}

/**
 * Serialize a loaded record, keeping move entries exactly as read.
 */
export function toStoredJson(record: StoredTransaction): Record<string, unknown> {
  return {
    id: record.id,
    created_at: record.createdAt,
    source_dir: record.sourceDir,
    destination_dir: record.destinationDir,
    moves: record.moves ?? [],
    removed_empty_dirs: record.removedEmptyDirs,
    undone_at: record.undoneAt,
  };
}
