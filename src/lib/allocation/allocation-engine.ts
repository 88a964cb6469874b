/**
 * Allocation Engine
 *
 * Seats every pairing of a round at a table. Two modes, chosen by round
 * number alone:
 *
 * Round 1 (pass-through):
 *   No history exists yet, so each pairing keeps the table suggested by the
 *   pairing source. A suggestion that is missing, unknown to the tournament,
 *   or already taken in this pass is replaced by the lowest-numbered free
 *   table. When no table is left the pairing gets no table and a
 *   NO_TABLE_AVAILABLE conflict; the run still completes.
 *
 * Round N > 1 (greedy):
 *   1. Byes are set aside.
 *   2. Remaining pairings are ordered by combined tournament score
 *      (descending), then the smaller competitor id (ascending), then input
 *      position, so higher-scoring pairings pick first regardless of input order.
 *   3. Each pairing takes the cheapest free table according to the cost
 *      model. Tables are scanned in ascending number order; on an exact tie
 *      the pairing's suggested table wins, otherwise the first one scanned.
 *   4. Reuse findings become informational TABLE_REUSE / TERRAIN_REUSE conflicts.
 *   5. Byes are appended in their original relative order.
 *
 * The engine keeps no state between calls and performs no I/O beyond the
 * history lookups it is given.
 */

import { BYE_REASON, SUMMARY_ROUND1_CLEAN } from '../constants';
import { createAuditRecord } from '../audit-log';
import { InsufficientTablesError, InvariantViolationError } from '../error-handling';
import { createLogger, type Logger } from '../logger';
import { parseOrThrow, roundNumberSchema, tablesSchema } from '../validation/schemas';
import { calculateCost, type CostModel, type CostResult } from './cost-model';
import { detectDecisionCollisions, findingToConflict, noTableConflict, summarizeConflicts } from './conflicts';
import {
  combinedTotalScore,
  describePairing,
  isSeatedPairing,
  minCompetitorId,
  snapshotOf,
  type SeatedPairing,
} from './pairing';
import type {
  AllocationDecision,
  AllocationRunResult,
  Conflict,
  FixedCostBreakdown,
  HistoryProvider,
  Pairing,
  TableInfo,
} from './types';

export interface GenerateAllocationsInput {
  pairings: readonly Pairing[];
  tables: readonly TableInfo[];
  roundNumber: number;
  history: HistoryProvider;
}

export interface AllocationEngineOptions {
  costModel?: CostModel;
  /** Source of audit timestamps */
  clock?: () => Date;
  logger?: Logger;
}

const ZERO_COST: FixedCostBreakdown = { tableReuse: 0, terrainReuse: 0, suggestedTableMismatch: 0 };

/**
 * Orders seated pairings for the greedy walk. Deterministic: the result
 * depends only on combined score and smallest competitor id, with input
 * position as the last resort for pairings that tie on both.
 */
export function orderPairingsForAllocation<P extends Pairing>(pairings: readonly P[]): P[] {
  return pairings
    .map((pairing, index) => ({
      pairing,
      index,
      score: combinedTotalScore(pairing),
      minId: minCompetitorId(pairing),
    }))
    .sort((a, b) => {
      if (a.score !== b.score) return b.score - a.score;
      if (a.minId !== b.minId) return a.minId < b.minId ? -1 : 1;
      return a.index - b.index;
    })
    .map((entry) => entry.pairing);
}

/** Tables in ascending number order; the scan order that resolves cost ties. */
export function sortTables(tables: readonly TableInfo[]): TableInfo[] {
  return [...tables].sort((a, b) => a.tableNumber - b.tableNumber);
}

export class AllocationEngine {
  private readonly costModel: CostModel;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: AllocationEngineOptions = {}) {
    this.costModel = options.costModel ?? calculateCost;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('allocation-engine');
  }

  /**
   * Generates one decision per pairing, byes included.
   *
   * @throws ValidationError if the round number or table list is invalid
   * @throws InsufficientTablesError if, from round 2 on, seated pairings outnumber tables
   * @throws InvariantViolationError if the history is scoped to another round
   */
  generate(input: GenerateAllocationsInput): AllocationRunResult {
    const roundNumber = parseOrThrow(roundNumberSchema, input.roundNumber, 'round number');
    if (input.history.currentRound !== roundNumber) {
      throw new InvariantViolationError('History is scoped to a different round', {
        roundNumber,
        historyRound: input.history.currentRound,
      });
    }
    const tables = sortTables(parseOrThrow(tablesSchema, input.tables, 'tables'));
    const timestamp = this.clock();

    const seated = input.pairings.filter(isSeatedPairing);
    const byes = input.pairings.filter((pairing) => !isSeatedPairing(pairing));

    const isRound1 = roundNumber === 1;
    const decisions = isRound1
      ? this.passThrough(seated, tables, timestamp)
      : this.greedy(seated, tables, input.history, timestamp);

    for (const bye of byes) {
      decisions.push(this.byeDecision(bye, isRound1, timestamp));
    }

    const collisions = detectDecisionCollisions(decisions);
    if (collisions.length > 0) {
      throw new InvariantViolationError('Generated allocations share a table', { collisions });
    }

    const conflicts = decisions.flatMap((decision) => [...decision.audit.conflicts]);
    const summary = isRound1 ? this.round1Summary(conflicts) : summarizeConflicts(conflicts);

    this.logger.info('Allocations generated', {
      tournamentId: input.history.tournamentId,
      roundNumber,
      pairings: seated.length,
      byes: byes.length,
      conflicts: conflicts.length,
      summary,
    });

    return { decisions, conflicts, summary };
  }

  private passThrough(
    pairings: readonly SeatedPairing[],
    tables: readonly TableInfo[],
    timestamp: Date
  ): AllocationDecision[] {
    const byNumber = new Map(tables.map((table) => [table.tableNumber, table]));
    const claimed = new Set<number>();

    return pairings.map((pairing) => {
      const suggested = pairing.suggestedTableNumber;
      let tableNumber: number | null = suggested;
      let reason = 'Round 1 - using suggested table assignment';

      if (suggested === null) {
        reason = 'Round 1 - suggested table number missing, assigned next available';
      } else if (!byNumber.has(suggested)) {
        tableNumber = null;
        reason = `Round 1 - suggested table ${suggested} not in tournament tables, assigned next available`;
      } else if (claimed.has(suggested)) {
        tableNumber = null;
        reason = `Round 1 - suggested table ${suggested} already assigned, assigned next available`;
      }

      if (tableNumber === null) {
        tableNumber = tables.find((table) => !claimed.has(table.tableNumber))?.tableNumber ?? null;
      }

      const conflicts: Conflict[] = [];
      if (tableNumber === null) {
        conflicts.push(noTableConflict(describePairing(pairing)));
      } else {
        claimed.add(tableNumber);
      }

      return {
        tableNumber,
        terrainTypeName: tableNumber === null ? null : byNumber.get(tableNumber)?.terrainTypeName ?? null,
        suggestedTableNumber: suggested,
        competitorA: snapshotOf(pairing.competitorA),
        competitorB: snapshotOf(pairing.competitorB),
        audit: createAuditRecord({
          timestamp,
          totalCost: 0,
          costBreakdown: ZERO_COST,
          reasons: [reason],
          isRound1: true,
          conflicts,
        }),
      };
    });
  }

  private greedy(
    pairings: readonly SeatedPairing[],
    tables: readonly TableInfo[],
    history: HistoryProvider,
    timestamp: Date
  ): AllocationDecision[] {
    if (pairings.length > tables.length) {
      throw new InsufficientTablesError(pairings.length, tables.length);
    }

    const claimed = new Set<number>();
    const decisions: AllocationDecision[] = [];

    for (const pairing of orderPairingsForAllocation(pairings)) {
      let best: { table: TableInfo; cost: CostResult } | null = null;
      const alternatives: Record<number, number> = {};

      for (const table of tables) {
        if (claimed.has(table.tableNumber)) continue;

        const cost = this.costModel(pairing, table, history);
        alternatives[table.tableNumber] = cost.totalCost;

        if (
          best === null ||
          cost.totalCost < best.cost.totalCost ||
          (cost.totalCost === best.cost.totalCost && table.tableNumber === pairing.suggestedTableNumber)
        ) {
          best = { table, cost };
        }
      }

      if (best === null) {
        throw new InsufficientTablesError(pairings.length, tables.length);
      }

      delete alternatives[best.table.tableNumber];
      claimed.add(best.table.tableNumber);

      decisions.push({
        tableNumber: best.table.tableNumber,
        terrainTypeName: best.table.terrainTypeName,
        suggestedTableNumber: pairing.suggestedTableNumber,
        competitorA: snapshotOf(pairing.competitorA),
        competitorB: snapshotOf(pairing.competitorB),
        audit: createAuditRecord({
          timestamp,
          totalCost: best.cost.totalCost,
          costBreakdown: best.cost.costBreakdown,
          reasons: best.cost.reasons,
          alternativesConsidered: alternatives,
          isRound1: false,
          conflicts: best.cost.findings.map(findingToConflict),
        }),
      });
    }

    return decisions;
  }

  private byeDecision(pairing: Pairing, isRound1: boolean, timestamp: Date): AllocationDecision {
    return {
      tableNumber: null,
      terrainTypeName: null,
      suggestedTableNumber: null,
      competitorA: snapshotOf(pairing.competitorA),
      competitorB: null,
      audit: createAuditRecord({
        timestamp,
        totalCost: 0,
        costBreakdown: ZERO_COST,
        reasons: [BYE_REASON],
        isRound1,
        isBye: true,
      }),
    };
  }

  private round1Summary(conflicts: readonly Conflict[]): string {
    return conflicts.length > 0
      ? `Round 1 allocations generated with ${conflicts.length} conflict(s).`
      : SUMMARY_ROUND1_CLEAN;
  }
}
