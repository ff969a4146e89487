export { executePlan, executeMove } from './executor.js';
export type { ExecuteOptions, ExecuteResult } from './executor.js';
export { removeEmptyDirectories } from './cleanup.js';
