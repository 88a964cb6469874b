/**
 * Allocation Cost Model
 *
 * Scores one pairing on one candidate table. Lower is better. Three tiers,
 * highest priority first:
 *
 * - Tier 1, table reuse:   +100000 per competitor who already played on this table
 * - Tier 2, terrain reuse: +10000 per competitor who already played this terrain
 *                          (only when the table has a terrain type)
 * - Tier 3, table number:  +tableNumber, so among equally safe tables the
 *                          lowest-numbered one wins
 *
 * The function is pure: it reads history through the HistoryProvider and
 * returns a value. The engine and its tests can call it directly.
 */

import {
  COST_TABLE_NUMBER,
  COST_TABLE_REUSE,
  COST_TERRAIN_REUSE,
  CONFLICT_TYPES,
} from '../constants';
import { competitorsOf } from './pairing';
import type { Competitor, HistoryProvider, Pairing, ScoredCostBreakdown, TableInfo } from './types';

/** A single reuse of a table or terrain by one competitor. */
export interface ReuseFinding {
  type: typeof CONFLICT_TYPES.TABLE_REUSE | typeof CONFLICT_TYPES.TERRAIN_REUSE;
  competitor: Competitor;
  /** Human-readable reason naming the competitor and the resource */
  message: string;
  tableNumber: number;
  terrainTypeId?: number;
}

export interface CostResult {
  totalCost: number;
  costBreakdown: ScoredCostBreakdown;
  reasons: string[];
  findings: ReuseFinding[];
}

/**
 * Lists every table and terrain reuse the given competitors would incur on
 * the table. Table findings come first, then terrain findings, each in
 * competitor order.
 */
export function findReuse(
  competitors: readonly Competitor[],
  table: TableInfo,
  history: HistoryProvider
): ReuseFinding[] {
  const findings: ReuseFinding[] = [];

  for (const competitor of competitors) {
    if (history.usedTables(competitor.id).has(table.tableNumber)) {
      findings.push({
        type: CONFLICT_TYPES.TABLE_REUSE,
        competitor,
        message: `${competitor.name} previously played on table ${table.tableNumber}`,
        tableNumber: table.tableNumber,
      });
    }
  }

  const terrainTypeId = table.terrainTypeId;
  if (terrainTypeId !== null) {
    const terrainName = table.terrainTypeName ?? `terrain #${terrainTypeId}`;
    for (const competitor of competitors) {
      if (history.usedTerrains(competitor.id).has(terrainTypeId)) {
        findings.push({
          type: CONFLICT_TYPES.TERRAIN_REUSE,
          competitor,
          message: `${competitor.name} previously experienced ${terrainName}`,
          tableNumber: table.tableNumber,
          terrainTypeId,
        });
      }
    }
  }

  return findings;
}

/** Sum of the tier 1 and tier 2 weights for a set of findings. */
export function reuseCosts(findings: readonly ReuseFinding[]): { tableReuse: number; terrainReuse: number } {
  let tableReuse = 0;
  let terrainReuse = 0;
  for (const finding of findings) {
    if (finding.type === CONFLICT_TYPES.TABLE_REUSE) {
      tableReuse += COST_TABLE_REUSE;
    } else {
      terrainReuse += COST_TERRAIN_REUSE;
    }
  }
  return { tableReuse, terrainReuse };
}

export function calculateCost(pairing: Pairing, table: TableInfo, history: HistoryProvider): CostResult {
  const findings = findReuse(competitorsOf(pairing), table, history);
  const { tableReuse, terrainReuse } = reuseCosts(findings);
  const tableNumber = table.tableNumber * COST_TABLE_NUMBER;

  return {
    totalCost: tableReuse + terrainReuse + tableNumber,
    costBreakdown: { tableReuse, terrainReuse, tableNumber },
    reasons: [
      ...findings.map((finding) => finding.message),
      `Table number preference adds ${tableNumber} for table ${table.tableNumber}`,
    ],
    findings,
  };
}

export type CostModel = typeof calculateCost;
