/**
 * Allocation domain types
 *
 * Shared by the history provider, cost model, engine and adjustment service.
 * Everything here is a plain immutable value; JSON only appears at the storage
 * boundary (see audit-log.ts).
 */

import type { ConflictType } from '../constants';

/** One side of a pairing as delivered by the pairing source. */
export interface Competitor {
  /** External identifier from the pairing source */
  id: string;
  name: string;
  /** Score earned in the round being allocated */
  roundScore: number;
  /** Tournament-to-date score; null when unknown */
  totalScore: number | null;
}

/**
 * A matchup for the round being generated. A pairing without competitorB is a
 * bye and never receives a table.
 */
export interface Pairing {
  competitorA: Competitor;
  competitorB: Competitor | null;
  /** Table number proposed by the pairing source, when it proposed one */
  suggestedTableNumber: number | null;
}

/** A physical table available in every round of a tournament. */
export interface TableInfo {
  tableNumber: number;
  terrainTypeId: number | null;
  terrainTypeName: string | null;
}

export interface Conflict {
  readonly type: ConflictType;
  readonly message: string;
  readonly competitorId?: string;
  readonly tableNumber?: number;
  readonly terrainTypeId?: number;
}

/** Breakdown produced when a table was scored by the cost model. */
export interface ScoredCostBreakdown {
  readonly tableReuse: number;
  readonly terrainReuse: number;
  readonly tableNumber: number;
}

/** Breakdown for pass-through, bye and manually edited allocations. */
export interface FixedCostBreakdown {
  readonly tableReuse: number;
  readonly terrainReuse: number;
  readonly suggestedTableMismatch: number;
}

export type CostBreakdown = ScoredCostBreakdown | FixedCostBreakdown;

export interface AuditRecord {
  readonly timestamp: string;
  readonly totalCost: number;
  readonly costBreakdown: CostBreakdown;
  readonly reasons: readonly string[];
  /** Cost of every other table that was free at decision time, keyed by table number */
  readonly alternativesConsidered: Readonly<Record<number, number>>;
  readonly isRound1: boolean;
  readonly isBye: boolean;
  readonly conflicts: readonly Conflict[];
}

export interface CompetitorSnapshot {
  readonly id: string;
  readonly name: string;
  readonly score: number;
}

export interface AllocationDecision {
  /** null for byes and for round 1 pairings left without a table */
  readonly tableNumber: number | null;
  readonly terrainTypeName: string | null;
  readonly suggestedTableNumber: number | null;
  readonly competitorA: CompetitorSnapshot;
  readonly competitorB: CompetitorSnapshot | null;
  readonly audit: AuditRecord;
}

export interface AllocationRunResult {
  decisions: AllocationDecision[];
  conflicts: Conflict[];
  summary: string;
}

/** Read side of a competitor's past rounds within one tournament. */
export interface HistoryProvider {
  readonly tournamentId: number;
  readonly currentRound: number;
  usedTables(competitorId: string): ReadonlySet<number>;
  usedTerrains(competitorId: string): ReadonlySet<number>;
}
