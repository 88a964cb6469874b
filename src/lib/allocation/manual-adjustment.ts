/**
 * Manual Adjustment Service
 *
 * Operator edits to a generated round: move one allocation to a free table
 * (reassign) or exchange the tables of two allocations (swap).
 *
 * Each edit is one read-check-write transaction. The allocation's `version`
 * is compared on write; a concurrent edit raises OptimisticLockError and
 * the whole transaction is re-run with backoff. Before commit the round is
 * re-checked for tables held twice, so a failed edit leaves nothing behind.
 *
 * Results are returned in the success/error envelope, never thrown.
 */

import { AUDIT_ACTIONS, createAuditRecord, type AuditAction } from '../audit-log';
import { COST_SUGGESTED_TABLE_MISMATCH } from '../constants';
import type { AllocationRepository, StoredAllocation, StoredPlayer } from '../db/allocation-repository';
import {
  ByeNotAssignableError,
  createSuccessResponse,
  CrossRoundSwapError,
  handleAllocationError,
  InvariantViolationError,
  NotFoundError,
  SelfSwapError,
  TableNotInTournamentError,
  TableOccupiedError,
  type OperationResult,
} from '../error-handling';
import { createLogger, type Logger } from '../logger';
import { updateWithRetry, type RetryConfig } from '../optimistic-locking';
import { idSchema, parseOrThrow, tableNumberSchema } from '../validation/schemas';
import { findingToConflict } from './conflicts';
import { findReuse, reuseCosts } from './cost-model';
import { TournamentHistory } from './history-provider';
import type { AuditRecord, Competitor, Conflict, TableInfo } from './types';

export interface AdjustmentOutcome {
  allocationId: number;
  previousTableNumber: number | null;
  /** null only when a swap partner had no table */
  newTableNumber: number | null;
  conflicts: Conflict[];
  audit: AuditRecord;
}

export interface SwapOutcome {
  first: AdjustmentOutcome;
  second: AdjustmentOutcome;
}

export interface ManualAdjustmentOptions {
  clock?: () => Date;
  logger?: Logger;
  retry?: Partial<RetryConfig>;
}

interface EditAudit {
  audit: AuditRecord;
  conflicts: Conflict[];
}

function toCompetitor(player: StoredPlayer): Competitor {
  return {
    id: player.externalId,
    name: player.name,
    roundScore: player.roundScore,
    totalScore: player.totalScore,
  };
}

function tableOf(allocation: StoredAllocation): TableInfo | null {
  if (allocation.tableNumber === null) return null;
  return {
    tableNumber: allocation.tableNumber,
    terrainTypeId: allocation.terrainTypeId,
    terrainTypeName: allocation.terrainTypeName,
  };
}

/** Narrows out byes, which never hold a table. */
function requireSeated(allocation: StoredAllocation): StoredAllocation & { player2: StoredPlayer } {
  const { player2 } = allocation;
  if (player2 === null) {
    throw new ByeNotAssignableError(allocation.id);
  }
  return { ...allocation, player2 };
}

export class ManualAdjustmentService {
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly retry: Partial<RetryConfig>;

  constructor(private readonly repository: AllocationRepository, options: ManualAdjustmentOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('manual-adjustment');
    this.retry = options.retry ?? {};
  }

  /** Moves an allocation to a table no other allocation of its round holds. */
  async reassign(allocationId: number, newTableNumber: number): Promise<OperationResult<AdjustmentOutcome>> {
    try {
      const id = parseOrThrow(idSchema, allocationId, 'allocation id');
      const tableNumber = parseOrThrow(tableNumberSchema, newTableNumber, 'table number');

      const outcome = await updateWithRetry(
        () => this.repository.transaction((repo) => this.reassignWithin(repo, id, tableNumber)),
        this.retry
      );

      this.logger.info('Allocation reassigned', {
        allocationId: id,
        from: outcome.previousTableNumber,
        to: outcome.newTableNumber,
        conflicts: outcome.conflicts.length,
      });
      return createSuccessResponse(outcome, `Allocation ${id} moved to table ${tableNumber}`);
    } catch (error) {
      return handleAllocationError(error, 'allocation-reassign');
    }
  }

  /** Exchanges the tables of two allocations in the same round. */
  async swap(allocationId1: number, allocationId2: number): Promise<OperationResult<SwapOutcome>> {
    try {
      const firstId = parseOrThrow(idSchema, allocationId1, 'allocation id');
      const secondId = parseOrThrow(idSchema, allocationId2, 'allocation id');
      if (firstId === secondId) {
        throw new SelfSwapError();
      }

      const outcome = await updateWithRetry(
        () => this.repository.transaction((repo) => this.swapWithin(repo, firstId, secondId)),
        this.retry
      );

      this.logger.info('Allocation tables swapped', {
        allocationIds: [firstId, secondId],
        tables: [outcome.first.newTableNumber, outcome.second.newTableNumber],
      });
      return createSuccessResponse(outcome, `Allocations ${firstId} and ${secondId} swapped tables`);
    } catch (error) {
      return handleAllocationError(error, 'allocation-swap');
    }
  }

  private reassignWithin(repo: AllocationRepository, allocationId: number, tableNumber: number): AdjustmentOutcome {
    const allocation = requireSeated(this.load(repo, allocationId));

    const table = repo.findTableByNumber(allocation.tournamentId, tableNumber);
    if (!table) {
      throw new TableNotInTournamentError(tableNumber, allocation.tournamentId);
    }

    const holder = repo.findTableHolder(allocation.roundId, table.id);
    if (holder !== null && holder !== allocation.id) {
      throw new TableOccupiedError(tableNumber, holder);
    }

    const history = new TournamentHistory(allocation.tournamentId, allocation.roundNumber, repo);
    const { audit, conflicts } = this.editAudit(
      allocation,
      table,
      history,
      `Manually reassigned from ${allocation.tableNumber === null ? 'no table' : `table ${allocation.tableNumber}`} to table ${tableNumber}`
    );

    repo.updateAllocationTable(allocation.id, allocation.version, table.id, audit);
    this.recordAudit(repo, allocation, AUDIT_ACTIONS.REASSIGN_TABLE, audit);
    this.assertNoCollisions(repo, allocation.roundId);

    return {
      allocationId: allocation.id,
      previousTableNumber: allocation.tableNumber,
      newTableNumber: tableNumber,
      conflicts,
      audit,
    };
  }

  private swapWithin(repo: AllocationRepository, firstId: number, secondId: number): SwapOutcome {
    const first = this.load(repo, firstId);
    const second = this.load(repo, secondId);

    if (first.roundId !== second.roundId) {
      throw new CrossRoundSwapError();
    }
    requireSeated(first);
    requireSeated(second);

    // Both allocations share a round, so one history serves both
    const history = new TournamentHistory(first.tournamentId, first.roundNumber, repo);
    const firstTable = tableOf(first);
    const secondTable = tableOf(second);

    const firstEdit = this.editAudit(first, secondTable, history, `Swapped tables with allocation ${second.id}`);
    const secondEdit = this.editAudit(second, firstTable, history, `Swapped tables with allocation ${first.id}`);

    repo.swapAllocationTables(first, second, firstEdit.audit, secondEdit.audit);
    this.recordAudit(repo, first, AUDIT_ACTIONS.SWAP_TABLES, firstEdit.audit);
    this.recordAudit(repo, second, AUDIT_ACTIONS.SWAP_TABLES, secondEdit.audit);
    this.assertNoCollisions(repo, first.roundId);

    return {
      first: {
        allocationId: first.id,
        previousTableNumber: first.tableNumber,
        newTableNumber: second.tableNumber,
        ...firstEdit,
      },
      second: {
        allocationId: second.id,
        previousTableNumber: second.tableNumber,
        newTableNumber: first.tableNumber,
        ...secondEdit,
      },
    };
  }

  private load(repo: AllocationRepository, allocationId: number): StoredAllocation {
    const allocation = repo.findAllocation(allocationId);
    if (!allocation) {
      throw new NotFoundError(`Allocation ${allocationId} not found`);
    }
    return allocation;
  }

  /**
   * Audit record for an allocation placed on `table` by hand. Reuse is
   * priced with the generation weights, plus a flat penalty for leaving the
   * suggested table.
   */
  private editAudit(
    allocation: StoredAllocation,
    table: TableInfo | null,
    history: TournamentHistory,
    actionReason: string
  ): EditAudit {
    const competitors = allocation.player2
      ? [toCompetitor(allocation.player1), toCompetitor(allocation.player2)]
      : [toCompetitor(allocation.player1)];

    const findings = table ? findReuse(competitors, table, history) : [];
    const { tableReuse, terrainReuse } = reuseCosts(findings);

    const suggested = allocation.suggestedTableNumber;
    const leftSuggestion = suggested !== null && suggested !== (table?.tableNumber ?? null);
    const suggestedTableMismatch = leftSuggestion ? COST_SUGGESTED_TABLE_MISMATCH : 0;

    const reasons = [actionReason, ...findings.map((finding) => finding.message)];
    if (leftSuggestion) {
      reasons.push(`Moved away from suggested table ${suggested}`);
    }

    const conflicts = findings.map(findingToConflict);
    const audit = createAuditRecord({
      timestamp: this.clock(),
      totalCost: tableReuse + terrainReuse + suggestedTableMismatch,
      costBreakdown: { tableReuse, terrainReuse, suggestedTableMismatch },
      reasons,
      isRound1: allocation.roundNumber === 1,
      conflicts,
    });

    return { audit, conflicts };
  }

  private recordAudit(
    repo: AllocationRepository,
    allocation: StoredAllocation,
    action: AuditAction,
    audit: AuditRecord
  ): void {
    repo.appendAuditLog({ allocationId: allocation.id, roundId: allocation.roundId, action, audit });
  }

  private assertNoCollisions(repo: AllocationRepository, roundId: number): void {
    const collisions = repo.findTableCollisions(roundId);
    if (collisions.length > 0) {
      throw new InvariantViolationError('Round has tables assigned more than once', { roundId, collisions });
    }
  }
}
