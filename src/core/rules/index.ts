export * from './types.js';
export * from './conditions.js';
export * from './builtin.js';
export * from './catalog.js';
