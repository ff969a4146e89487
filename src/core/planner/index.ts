export { planMoves, orderCandidates } from './planner.js';
export type { PlanOptions } from './planner.js';
export { resolveCollision } from './collision.js';
export type { ExistsCheck, ResolvedDestination } from './collision.js';
export { createSummary } from './types.js';
export type { MovePlanEntry, TidySummary } from './types.js';
