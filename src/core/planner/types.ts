/**
 * Planner type definitions.
 */

/**
 * One planned move. Destinations within a plan are pairwise distinct.
 */
export interface MovePlanEntry {
  source: string;
  destination: string;
  ruleId: string;
  ruleDescription: string;
  collisionRenamed: boolean;
}

/**
 * Run counters. The planner fills the scan and match fields; the executor
 * adds moved and errors.
 */
export interface TidySummary {
  /** Candidates after ignore filtering */
  scanned: number;
  ignored: number;
  totalTargets: number;
  matched: number;
  /** Always scanned - matched */
  unclassified: number;
  /** Hits of the mime_fallback rule */
  fallback: number;
  /** Rule id -> hit count, only rules that matched */
  ruleHits: Map<string, number>;
  plannedMoves: number;
  moved: number;
  collisions: number;
  errors: number;
  /** Distinct rules that matched at least once */
  rulesUsed: number;
}

export function createSummary(): TidySummary {
  return {
    scanned: 0,
    ignored: 0,
    totalTargets: 0,
    matched: 0,
    unclassified: 0,
    fallback: 0,
    ruleHits: new Map(),
    plannedMoves: 0,
    moved: 0,
    collisions: 0,
    errors: 0,
    rulesUsed: 0,
  };
}
