/**
 * Allocation Repository
 *
 * drizzle-orm queries over the SQLite schema. Serves three callers:
 * - TournamentHistory, through the HistorySource methods
 * - AllocationGenerationService, which replaces a round's allocations
 * - ManualAdjustmentService, which moves allocations between tables
 *
 * All methods are synchronous (sql.js). `transaction()` hands the
 * callback a repository bound to the open transaction; throwing inside it
 * rolls everything back.
 */

import { and, asc, eq, inArray, isNotNull, lt, or, sql } from 'drizzle-orm';
import { alias } from 'drizzle-orm/sqlite-core';
import { parseAuditRecord, serializeAuditRecord, type AuditAction } from '../audit-log';
import type { HistorySource } from '../allocation/history-provider';
import type { AuditRecord, Competitor, TableInfo } from '../allocation/types';
import { OptimisticLockError } from '../optimistic-locking';
import type { SyncDatabase } from './index';
import {
  allocationAuditLog,
  allocations,
  players,
  rounds,
  tables,
  terrainTypes,
  tournaments,
} from './schema';
import terrainTypeSeed from './terrain-types.json';

// ============================================================
// Types
// ============================================================

export interface StoredTable extends TableInfo {
  /** Row id in the tables table */
  id: number;
  tournamentId: number;
}

export interface StoredPlayer {
  /** Row id in the players table */
  id: number;
  /** Competitor id as given in the pairing */
  externalId: string;
  name: string;
  /** Round score stored on the allocation */
  roundScore: number;
  /** Tournament-to-date score; null when never reported */
  totalScore: number | null;
}

/** An allocation row joined with its round, players, table and terrain. */
export interface StoredAllocation {
  id: number;
  roundId: number;
  roundNumber: number;
  tournamentId: number;
  /** Null for a bye, or a round-1 pairing left without a table */
  tableId: number | null;
  tableNumber: number | null;
  /** Terrain of the assigned table, if it has one */
  terrainTypeId: number | null;
  terrainTypeName: string | null;
  player1: StoredPlayer;
  /** Null for a bye */
  player2: StoredPlayer | null;
  /** Table proposed by the pairing source, kept for the edit-time penalty */
  suggestedTableNumber: number | null;
  /** Audit record of the latest write, parsed from allocation_reason */
  audit: AuditRecord;
  /** Incremented on every table change; compared by updateAllocationTable */
  version: number;
}

export interface NewAllocation {
  roundId: number;
  /** Null for a bye */
  tableId: number | null;
  player1Id: number;
  player2Id: number | null;
  player1Score: number;
  player2Score: number;
  suggestedTableNumber: number | null;
  audit: AuditRecord;
}

export interface AuditLogEntry {
  allocationId: number;
  roundId: number;
  action: AuditAction;
  audit: AuditRecord;
}

export interface StoredAuditLogEntry {
  id: number;
  /** One of AUDIT_ACTIONS; stored as free text */
  action: string;
  audit: AuditRecord;
  /** ISO-8601 write time, distinct from the record's own timestamp */
  recordedAt: string;
}

export interface StoredTableCollision {
  tableNumber: number;
  allocationIds: number[];
}

export interface NewTable {
  tableNumber: number;
  terrainTypeId?: number | null;
}

const player1 = alias(players, 'player1');
const player2 = alias(players, 'player2');

// ============================================================
// Repository
// ============================================================

export class AllocationRepository implements HistorySource {
  constructor(private readonly db: SyncDatabase) {}

  transaction<T>(fn: (repository: AllocationRepository) => T): T {
    return this.db.transaction((tx) => fn(new AllocationRepository(tx)));
  }

  // ---------- history ----------

  tablesUsedBefore(tournamentId: number, competitorId: string, beforeRound: number): number[] {
    const playerId = this.findPlayerId(tournamentId, competitorId);
    if (playerId === null) return [];

    return this.db
      .selectDistinct({ tableNumber: tables.tableNumber })
      .from(allocations)
      .innerJoin(rounds, eq(allocations.roundId, rounds.id))
      .innerJoin(tables, eq(allocations.tableId, tables.id))
      .where(
        and(
          eq(rounds.tournamentId, tournamentId),
          lt(rounds.roundNumber, beforeRound),
          or(eq(allocations.player1Id, playerId), eq(allocations.player2Id, playerId))
        )
      )
      .orderBy(asc(tables.tableNumber))
      .all()
      .map((row) => row.tableNumber);
  }

  terrainsUsedBefore(tournamentId: number, competitorId: string, beforeRound: number): number[] {
    const playerId = this.findPlayerId(tournamentId, competitorId);
    if (playerId === null) return [];

    return this.db
      .selectDistinct({ terrainTypeId: tables.terrainTypeId })
      .from(allocations)
      .innerJoin(rounds, eq(allocations.roundId, rounds.id))
      .innerJoin(tables, eq(allocations.tableId, tables.id))
      .where(
        and(
          eq(rounds.tournamentId, tournamentId),
          lt(rounds.roundNumber, beforeRound),
          or(eq(allocations.player1Id, playerId), eq(allocations.player2Id, playerId)),
          isNotNull(tables.terrainTypeId)
        )
      )
      .all()
      .flatMap((row) => (row.terrainTypeId === null ? [] : [row.terrainTypeId]));
  }

  // ---------- tournament setup ----------

  /** Inserts the bundled terrain types that are not present yet; returns name -> id. */
  seedTerrainTypes(): Map<string, number> {
    for (const terrain of terrainTypeSeed) {
      this.db
        .insert(terrainTypes)
        .values({ name: terrain.name, description: terrain.description, sortOrder: terrain.sortOrder })
        .onConflictDoNothing()
        .run();
    }

    const rows = this.db.select().from(terrainTypes).orderBy(asc(terrainTypes.sortOrder)).all();
    return new Map(rows.map((row) => [row.name, row.id]));
  }

  createTournament(name: string, tableList: readonly NewTable[]): number {
    return this.transaction((repository) => {
      const tournament = repository.db
        .insert(tournaments)
        .values({ name, tableCount: tableList.length })
        .returning({ id: tournaments.id })
        .get();

      for (const table of tableList) {
        repository.db
          .insert(tables)
          .values({
            tournamentId: tournament.id,
            tableNumber: table.tableNumber,
            terrainTypeId: table.terrainTypeId ?? null,
          })
          .run();
      }

      return tournament.id;
    });
  }

  tournamentExists(tournamentId: number): boolean {
    const row = this.db.select({ id: tournaments.id }).from(tournaments).where(eq(tournaments.id, tournamentId)).get();
    return row !== undefined;
  }

  findTables(tournamentId: number): StoredTable[] {
    return this.tableQuery()
      .where(eq(tables.tournamentId, tournamentId))
      .orderBy(asc(tables.tableNumber))
      .all();
  }

  findTableByNumber(tournamentId: number, tableNumber: number): StoredTable | null {
    return (
      this.tableQuery()
        .where(and(eq(tables.tournamentId, tournamentId), eq(tables.tableNumber, tableNumber)))
        .get() ?? null
    );
  }

  // ---------- rounds and players ----------

  findRoundId(tournamentId: number, roundNumber: number): number | null {
    const row = this.db
      .select({ id: rounds.id })
      .from(rounds)
      .where(and(eq(rounds.tournamentId, tournamentId), eq(rounds.roundNumber, roundNumber)))
      .get();
    return row?.id ?? null;
  }

  ensureRound(tournamentId: number, roundNumber: number): number {
    const existing = this.findRoundId(tournamentId, roundNumber);
    if (existing !== null) return existing;

    return this.db.insert(rounds).values({ tournamentId, roundNumber }).returning({ id: rounds.id }).get().id;
  }

  /** Inserts or refreshes a player by external id; returns the row id. */
  upsertPlayer(tournamentId: number, competitor: Competitor): number {
    return this.db
      .insert(players)
      .values({
        tournamentId,
        externalId: competitor.id,
        name: competitor.name,
        totalScore: competitor.totalScore,
      })
      .onConflictDoUpdate({
        target: [players.tournamentId, players.externalId],
        // an unknown total never overwrites a known one
        set: { name: competitor.name, totalScore: sql`coalesce(excluded.total_score, ${players.totalScore})` },
      })
      .returning({ id: players.id })
      .get().id;
  }

  // ---------- allocations ----------

  findAllocation(allocationId: number): StoredAllocation | null {
    const row = selectAllocations(this.db).where(eq(allocations.id, allocationId)).get();
    return row ? toStoredAllocation(row) : null;
  }

  findAllocationsByRound(roundId: number): StoredAllocation[] {
    return selectAllocations(this.db)
      .where(eq(allocations.roundId, roundId))
      .orderBy(asc(allocations.id))
      .all()
      .map(toStoredAllocation);
  }

  /** Id of the allocation holding the table in the round, if any. */
  findTableHolder(roundId: number, tableId: number): number | null {
    const row = this.db
      .select({ id: allocations.id })
      .from(allocations)
      .where(and(eq(allocations.roundId, roundId), eq(allocations.tableId, tableId)))
      .get();
    return row?.id ?? null;
  }

  deleteRoundAllocations(roundId: number): number {
    return this.db
      .delete(allocations)
      .where(eq(allocations.roundId, roundId))
      .returning({ id: allocations.id })
      .all().length;
  }

  insertAllocation(allocation: NewAllocation): number {
    return this.db
      .insert(allocations)
      .values({
        roundId: allocation.roundId,
        tableId: allocation.tableId,
        player1Id: allocation.player1Id,
        player2Id: allocation.player2Id,
        player1Score: allocation.player1Score,
        player2Score: allocation.player2Score,
        suggestedTableNumber: allocation.suggestedTableNumber,
        allocationReason: serializeAuditRecord(allocation.audit),
      })
      .returning({ id: allocations.id })
      .get().id;
  }

  /**
   * Moves an allocation to `tableId` (null clears it) and stores its new
   * audit record, provided the row is still at `expectedVersion`.
   *
   * @returns the new version
   * @throws OptimisticLockError if the row changed or disappeared
   */
  updateAllocationTable(
    allocationId: number,
    expectedVersion: number,
    tableId: number | null,
    audit: AuditRecord
  ): number {
    const updated = this.db
      .update(allocations)
      .set({
        tableId,
        allocationReason: serializeAuditRecord(audit),
        version: sql`${allocations.version} + 1`,
      })
      .where(and(eq(allocations.id, allocationId), eq(allocations.version, expectedVersion)))
      .returning({ version: allocations.version })
      .get();

    if (!updated) {
      const current = this.db
        .select({ version: allocations.version })
        .from(allocations)
        .where(eq(allocations.id, allocationId))
        .get();
      throw new OptimisticLockError(
        current
          ? `Version mismatch: expected ${expectedVersion}, got ${current.version}`
          : `Allocation ${allocationId} not found`,
        current?.version ?? -1
      );
    }

    return updated.version;
  }

  /**
   * Exchanges the tables of two allocations. The first allocation is cleared
   * before the second takes its table, so the one-table-per-round index
   * never sees both holding the same table.
   */
  swapAllocationTables(
    first: StoredAllocation,
    second: StoredAllocation,
    firstAudit: AuditRecord,
    secondAudit: AuditRecord
  ): void {
    const firstVersion = this.updateAllocationTable(first.id, first.version, null, firstAudit);
    this.updateAllocationTable(second.id, second.version, first.tableId, secondAudit);
    this.updateAllocationTable(first.id, firstVersion, second.tableId, firstAudit);
  }

  /** Tables held by more than one allocation of the round. */
  findTableCollisions(roundId: number): StoredTableCollision[] {
    return this.db
      .select({
        tableNumber: tables.tableNumber,
        allocationIds: sql<string>`group_concat(${allocations.id})`,
      })
      .from(allocations)
      .innerJoin(tables, eq(allocations.tableId, tables.id))
      .where(eq(allocations.roundId, roundId))
      .groupBy(tables.tableNumber)
      .having(sql`count(*) > 1`)
      .orderBy(asc(tables.tableNumber))
      .all()
      .map((row) => ({
        tableNumber: row.tableNumber,
        allocationIds: row.allocationIds
          .split(',')
          .map(Number)
          .sort((a, b) => a - b),
      }));
  }

  // ---------- audit log ----------

  appendAuditLog(entry: AuditLogEntry): void {
    this.db
      .insert(allocationAuditLog)
      .values({
        allocationId: entry.allocationId,
        roundId: entry.roundId,
        action: entry.action,
        auditRecord: serializeAuditRecord(entry.audit),
        recordedAt: new Date().toISOString(),
      })
      .run();
  }

  findAuditLog(allocationIds: readonly number[]): StoredAuditLogEntry[] {
    if (allocationIds.length === 0) return [];

    return this.db
      .select()
      .from(allocationAuditLog)
      .where(inArray(allocationAuditLog.allocationId, [...allocationIds]))
      .orderBy(asc(allocationAuditLog.id))
      .all()
      .map((row) => ({
        id: row.id,
        action: row.action,
        audit: parseAuditRecord(row.auditRecord),
        recordedAt: row.recordedAt,
      }));
  }

  // ---------- helpers ----------

  private findPlayerId(tournamentId: number, externalId: string): number | null {
    const row = this.db
      .select({ id: players.id })
      .from(players)
      .where(and(eq(players.tournamentId, tournamentId), eq(players.externalId, externalId)))
      .get();
    return row?.id ?? null;
  }

  private tableQuery() {
    return this.db
      .select({
        id: tables.id,
        tournamentId: tables.tournamentId,
        tableNumber: tables.tableNumber,
        terrainTypeId: tables.terrainTypeId,
        terrainTypeName: terrainTypes.name,
      })
      .from(tables)
      .leftJoin(terrainTypes, eq(tables.terrainTypeId, terrainTypes.id))
      .$dynamic();
  }
}

function selectAllocations(db: SyncDatabase) {
  return db
    .select({
      allocation: allocations,
      roundNumber: rounds.roundNumber,
      tournamentId: rounds.tournamentId,
      player1,
      player2,
      tableNumber: tables.tableNumber,
      terrainTypeId: tables.terrainTypeId,
      terrainTypeName: terrainTypes.name,
    })
    .from(allocations)
    .innerJoin(rounds, eq(allocations.roundId, rounds.id))
    .innerJoin(player1, eq(allocations.player1Id, player1.id))
    .leftJoin(player2, eq(allocations.player2Id, player2.id))
    .leftJoin(tables, eq(allocations.tableId, tables.id))
    .leftJoin(terrainTypes, eq(tables.terrainTypeId, terrainTypes.id))
    .$dynamic();
}

type AllocationRow = ReturnType<ReturnType<typeof selectAllocations>['all']>[number];

function toStoredAllocation(row: AllocationRow): StoredAllocation {
  const { allocation } = row;
  return {
    id: allocation.id,
    roundId: allocation.roundId,
    roundNumber: row.roundNumber,
    tournamentId: row.tournamentId,
    tableId: allocation.tableId,
    tableNumber: row.tableNumber,
    terrainTypeId: row.terrainTypeId,
    terrainTypeName: row.terrainTypeName,
    player1: {
      id: row.player1.id,
      externalId: row.player1.externalId,
      name: row.player1.name,
      roundScore: allocation.player1Score,
      totalScore: row.player1.totalScore,
    },
    player2: row.player2
      ? {
          id: row.player2.id,
          externalId: row.player2.externalId,
          name: row.player2.name,
          roundScore: allocation.player2Score,
          totalScore: row.player2.totalScore,
        }
      : null,
    suggestedTableNumber: allocation.suggestedTableNumber,
    audit: parseAuditRecord(allocation.allocationReason),
    version: allocation.version,
  };
}
