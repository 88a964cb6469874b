/**
 * Allocation Audit Records
 *
 * Every allocation write carries a fresh, complete audit record explaining
 * why the pairing sits where it does: cost breakdown, reasons, the other
 * tables that were free, and the conflicts surfaced. Records are frozen on
 * creation and never edited; a manual edit produces a new record, and the
 * storage layer appends each one to the allocation_audit_log table so the
 * earlier records remain available.
 *
 * Records are plain values inside the library. JSON appears only here, at
 * the storage boundary (serializeAuditRecord / parseAuditRecord).
 *
 * Usage:
 *   import { createAuditRecord, AUDIT_ACTIONS } from './audit-log';
 *   const audit = createAuditRecord({ timestamp, totalCost, ... });
 *   repository.appendAuditLog({ allocationId, roundId, action: AUDIT_ACTIONS.SWAP_TABLES, audit });
 */

import type { AuditRecord, Conflict, CostBreakdown } from './allocation/types';
import { ValidationError } from './error-handling';
import { auditRecordSchema, parseOrThrow } from './validation/schemas';

// ============================================================
// Audit Action Constants
// ============================================================

export const AUDIT_ACTIONS = {
  /** Allocation created by a generation run */
  GENERATE_ALLOCATION: 'GENERATE_ALLOCATION',
  /** Allocation moved to another table by an operator */
  REASSIGN_TABLE: 'REASSIGN_TABLE',
  /** Two allocations exchanged tables */
  SWAP_TABLES: 'SWAP_TABLES',
} as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[keyof typeof AUDIT_ACTIONS];

// ============================================================
// Record Construction
// ============================================================

export interface AuditRecordParams {
  /** When the decision was made; stored as an ISO-8601 string */
  timestamp: Date;
  /** Sum of the breakdown */
  totalCost: number;
  /** Scored tiers for engine decisions, or the fixed shape for round 1, byes and edits */
  costBreakdown: CostBreakdown;
  /** Human-readable explanations, in the order they were produced */
  reasons: readonly string[];
  /** Cost of every other table that was free, keyed by table number. Defaults to none. */
  alternativesConsidered?: Readonly<Record<number, number>>;
  isRound1: boolean;
  /** Defaults to false */
  isBye?: boolean;
  /** Reuse or no-table conflicts the decision accepted. Defaults to none. */
  conflicts?: readonly Conflict[];
}

/**
 * Builds a frozen audit record. Arrays and nested objects are copied and
 * frozen too, so later changes to the caller's inputs cannot alter it.
 */
export function createAuditRecord(params: AuditRecordParams): AuditRecord {
  return Object.freeze({
    timestamp: params.timestamp.toISOString(),
    totalCost: params.totalCost,
    costBreakdown: Object.freeze({ ...params.costBreakdown }),
    reasons: Object.freeze([...params.reasons]),
    alternativesConsidered: Object.freeze({ ...(params.alternativesConsidered ?? {}) }),
    isRound1: params.isRound1,
    isBye: params.isBye ?? false,
    conflicts: Object.freeze((params.conflicts ?? []).map((conflict) => Object.freeze({ ...conflict }))),
  });
}

// ============================================================
// Storage Boundary
// ============================================================

export function serializeAuditRecord(record: AuditRecord): string {
  return JSON.stringify(record);
}

/**
 * Parses a stored audit record, validating its shape.
 *
 * @throws ValidationError if the stored JSON is malformed or incomplete
 */
export function parseAuditRecord(json: string): AuditRecord {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ValidationError('Invalid stored audit record. Not valid JSON', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = parseOrThrow(auditRecordSchema, raw, 'stored audit record');
  return createAuditRecord({ ...parsed, timestamp: new Date(parsed.timestamp) });
}
