/**
 * Allocation Generation Service
 *
 * Runs the engine for a stored tournament round and persists the result.
 * Pairings are taken from the caller or, when omitted, rebuilt from the
 * round's current allocations so a round can be re-allocated after history
 * changed. Everything from reading history to writing the audit log happens
 * in one transaction.
 */

import { AUDIT_ACTIONS } from '../audit-log';
import type { AllocationRepository, StoredAllocation } from '../db/allocation-repository';
import {
  createSuccessResponse,
  handleAllocationError,
  InvariantViolationError,
  NotFoundError,
  type OperationResult,
} from '../error-handling';
import { createLogger, type Logger } from '../logger';
import { idSchema, pairingsSchema, parseOrThrow, roundNumberSchema, type PairingInput } from '../validation/schemas';
import { AllocationEngine } from './allocation-engine';
import { competitorsOf } from './pairing';
import { TournamentHistory } from './history-provider';
import type { Conflict, Pairing } from './types';

export interface GenerationOutcome {
  roundId: number;
  allocations: StoredAllocation[];
  conflicts: Conflict[];
  summary: string;
}

export interface GenerationServiceOptions {
  engine?: AllocationEngine;
  logger?: Logger;
}

/** Rebuilds engine input from stored allocations, byes included. */
export function pairingsFromAllocations(allocations: readonly StoredAllocation[]): Pairing[] {
  return allocations.map((allocation) => ({
    competitorA: {
      id: allocation.player1.externalId,
      name: allocation.player1.name,
      roundScore: allocation.player1.roundScore,
      totalScore: allocation.player1.totalScore,
    },
    competitorB: allocation.player2
      ? {
          id: allocation.player2.externalId,
          name: allocation.player2.name,
          roundScore: allocation.player2.roundScore,
          totalScore: allocation.player2.totalScore,
        }
      : null,
    suggestedTableNumber: allocation.suggestedTableNumber,
  }));
}

export class AllocationGenerationService {
  private readonly engine: AllocationEngine;
  private readonly logger: Logger;

  constructor(private readonly repository: AllocationRepository, options: GenerationServiceOptions = {}) {
    this.logger = options.logger ?? createLogger('allocation-generation');
    this.engine = options.engine ?? new AllocationEngine({ logger: this.logger });
  }

  /**
   * Replaces the allocations of a round with a fresh engine run.
   *
   * @param pairings - Pairings for the round; omit to re-allocate the stored ones
   */
  generate(
    tournamentId: number,
    roundNumber: number,
    pairings?: readonly PairingInput[]
  ): OperationResult<GenerationOutcome> {
    try {
      const id = parseOrThrow(idSchema, tournamentId, 'tournament id');
      const round = parseOrThrow(roundNumberSchema, roundNumber, 'round number');
      const supplied = pairings === undefined ? null : parseOrThrow(pairingsSchema, pairings, 'pairings');

      const outcome = this.repository.transaction((repo) => this.generateWithin(repo, id, round, supplied));

      return createSuccessResponse(outcome, outcome.summary);
    } catch (error) {
      return handleAllocationError(error, 'allocation-generate');
    }
  }

  private generateWithin(
    repo: AllocationRepository,
    tournamentId: number,
    roundNumber: number,
    supplied: Pairing[] | null
  ): GenerationOutcome {
    if (!repo.tournamentExists(tournamentId)) {
      throw new NotFoundError(`Tournament ${tournamentId} not found`);
    }

    const roundId = repo.ensureRound(tournamentId, roundNumber);
    const pairings = supplied ?? pairingsFromAllocations(repo.findAllocationsByRound(roundId));
    const tables = repo.findTables(tournamentId);

    const result = this.engine.generate({
      pairings,
      tables,
      roundNumber,
      history: new TournamentHistory(tournamentId, roundNumber, repo),
    });

    const playerIds = new Map<string, number>();
    for (const competitor of pairings.flatMap(competitorsOf)) {
      playerIds.set(competitor.id, repo.upsertPlayer(tournamentId, competitor));
    }
    const tableIds = new Map(tables.map((table) => [table.tableNumber, table.id]));

    const replaced = repo.deleteRoundAllocations(roundId);

    for (const decision of result.decisions) {
      const player1Id = playerIds.get(decision.competitorA.id);
      const player2Id = decision.competitorB ? playerIds.get(decision.competitorB.id) : null;
      const tableId = decision.tableNumber === null ? null : tableIds.get(decision.tableNumber);
      if (player1Id === undefined || player2Id === undefined || tableId === undefined) {
        throw new InvariantViolationError('Decision refers to an unknown player or table', { decision });
      }

      const allocationId = repo.insertAllocation({
        roundId,
        tableId,
        player1Id,
        player2Id,
        player1Score: decision.competitorA.score,
        player2Score: decision.competitorB?.score ?? 0,
        suggestedTableNumber: decision.suggestedTableNumber,
        audit: decision.audit,
      });
      repo.appendAuditLog({
        allocationId,
        roundId,
        action: AUDIT_ACTIONS.GENERATE_ALLOCATION,
        audit: decision.audit,
      });
    }

    this.logger.info('Round allocations stored', {
      tournamentId,
      roundNumber,
      roundId,
      replaced,
      stored: result.decisions.length,
    });

    return {
      roundId,
      allocations: repo.findAllocationsByRound(roundId),
      conflicts: result.conflicts,
      summary: result.summary,
    };
  }
}
