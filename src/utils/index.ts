export * from './errors.js';
export * from './file-system.js';
export { logger, Logger } from './logger.js';
export type { LogLevel } from './logger.js';
export * from './string.js';
export * from './yaml.js';
