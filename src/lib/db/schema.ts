/**
 * Drizzle table definitions. The DDL that creates them lives in schema.sql
 * and must be kept in step with this file.
 */

import { index, integer, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';

export const terrainTypes = sqliteTable('terrain_types', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull().unique(),
  description: text('description'),
  sortOrder: integer('sort_order').notNull().default(0),
});

export const tournaments = sqliteTable('tournaments', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  tableCount: integer('table_count').notNull(),
});

export const tables = sqliteTable(
  'tables',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tournamentId: integer('tournament_id')
      .notNull()
      .references(() => tournaments.id, { onDelete: 'cascade' }),
    tableNumber: integer('table_number').notNull(),
    terrainTypeId: integer('terrain_type_id').references(() => terrainTypes.id, { onDelete: 'set null' }),
  },
  (t) => ({
    tournamentTableIdx: uniqueIndex('idx_tournament_table').on(t.tournamentId, t.tableNumber),
  })
);

export const rounds = sqliteTable(
  'rounds',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tournamentId: integer('tournament_id')
      .notNull()
      .references(() => tournaments.id, { onDelete: 'cascade' }),
    roundNumber: integer('round_number').notNull(),
  },
  (t) => ({
    tournamentRoundIdx: uniqueIndex('idx_tournament_round').on(t.tournamentId, t.roundNumber),
  })
);

export const players = sqliteTable(
  'players',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    tournamentId: integer('tournament_id')
      .notNull()
      .references(() => tournaments.id, { onDelete: 'cascade' }),
    externalId: text('external_id').notNull(),
    name: text('name').notNull(),
    totalScore: integer('total_score'),
  },
  (t) => ({
    tournamentPlayerIdx: uniqueIndex('idx_tournament_player').on(t.tournamentId, t.externalId),
  })
);

export const allocations = sqliteTable(
  'allocations',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    roundId: integer('round_id')
      .notNull()
      .references(() => rounds.id, { onDelete: 'cascade' }),
    tableId: integer('table_id').references(() => tables.id),
    player1Id: integer('player1_id')
      .notNull()
      .references(() => players.id, { onDelete: 'cascade' }),
    player2Id: integer('player2_id').references(() => players.id, { onDelete: 'cascade' }),
    player1Score: integer('player1_score').notNull().default(0),
    player2Score: integer('player2_score').notNull().default(0),
    suggestedTableNumber: integer('suggested_table_number'),
    allocationReason: text('allocation_reason').notNull(),
    version: integer('version').notNull().default(0),
  },
  (t) => ({
    roundIdx: index('idx_allocations_round').on(t.roundId),
  })
);

/** Append-only history of every audit record written for an allocation. */
export const allocationAuditLog = sqliteTable(
  'allocation_audit_log',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    allocationId: integer('allocation_id').notNull(),
    roundId: integer('round_id').notNull(),
    action: text('action').notNull(),
    auditRecord: text('audit_record').notNull(),
    recordedAt: text('recorded_at').notNull(),
  },
  (t) => ({
    allocationIdx: index('idx_audit_allocation').on(t.allocationId),
  })
);
