export { TransactionStore, createTransactionId } from './store.js';
export type { CreateTransactionInput } from './store.js';
export { undoTransaction } from './undo.js';
export type { UndoOptions } from './undo.js';
export { StoredTransactionSchema, MoveEntrySchema } from './schema.js';
export type {
  MoveRecord,
  TransactionRecord,
  StoredTransaction,
  UndoResult,
  DeleteSelector,
} from './types.js';
