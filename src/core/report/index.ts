export { buildStatsPayload, buildRuleHitReport, writeStatsJson } from './stats.js';
export type { StatsPayload, StatsInput, RuleHitEntry } from './stats.js';
