import { CONFLICT_TYPES, SUMMARY_OPTIMAL } from '../constants';
import type { ReuseFinding } from './cost-model';
import type { AllocationDecision, Conflict } from './types';

export interface TableCollision {
  tableNumber: number;
  /** Positions in the decision list, or allocation ids when read from storage */
  holders: number[];
}

export function findingToConflict(finding: ReuseFinding): Conflict {
  return {
    type: finding.type,
    message: finding.message,
    competitorId: finding.competitor.id,
    tableNumber: finding.tableNumber,
    ...(finding.terrainTypeId !== undefined && { terrainTypeId: finding.terrainTypeId }),
  };
}

export function noTableConflict(pairingLabel: string): Conflict {
  return {
    type: CONFLICT_TYPES.NO_TABLE_AVAILABLE,
    message: `No available tables for pairing ${pairingLabel}`,
  };
}

/**
 * Classifies a greedy run:
 *   "All allocations optimal - no constraint violations."
 *   "Best effort allocation with 2 table reuse conflict(s), 1 terrain reuse conflict(s)."
 */
export function summarizeConflicts(conflicts: readonly Conflict[]): string {
  if (conflicts.length === 0) {
    return SUMMARY_OPTIMAL;
  }

  const tableReuseCount = conflicts.filter((c) => c.type === CONFLICT_TYPES.TABLE_REUSE).length;
  const terrainReuseCount = conflicts.filter((c) => c.type === CONFLICT_TYPES.TERRAIN_REUSE).length;

  const parts: string[] = [];
  if (tableReuseCount > 0) parts.push(`${tableReuseCount} table reuse conflict(s)`);
  if (terrainReuseCount > 0) parts.push(`${terrainReuseCount} terrain reuse conflict(s)`);

  return `Best effort allocation with ${parts.join(', ')}.`;
}

/** Tables claimed by more than one non-bye decision. Empty for a valid round. */
export function detectDecisionCollisions(decisions: readonly AllocationDecision[]): TableCollision[] {
  const holders = new Map<number, number[]>();
  decisions.forEach((decision, index) => {
    if (decision.tableNumber === null) return;
    const list = holders.get(decision.tableNumber) ?? [];
    list.push(index);
    holders.set(decision.tableNumber, list);
  });

  return [...holders.entries()]
    .filter(([, list]) => list.length > 1)
    .map(([tableNumber, list]) => ({ tableNumber, holders: list }))
    .sort((a, b) => a.tableNumber - b.tableNumber);
}
