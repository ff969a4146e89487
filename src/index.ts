/**
 * downloads-tidy library exports.
 */

// Rules
export * from './core/rules/index.js';

// Scanning and matching
export * from './core/scanner/index.js';
export * from './core/matching/index.js';
export * from './core/priority/index.js';

// Planning and execution
export * from './core/planner/index.js';
export * from './core/executor/index.js';

// Undo records
export * from './core/transactions/index.js';

// Configuration
export * from './core/config/index.js';

// Reporting and orchestration
export * from './core/report/index.js';
export * from './core/tidy/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
