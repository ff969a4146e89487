export { TidyEngine, formatDatedFolderName, ruleTargetRoots } from './engine.js';
export type { TidyEngineDeps } from './engine.js';
export type { TidyInput, TidyResult } from './types.js';
