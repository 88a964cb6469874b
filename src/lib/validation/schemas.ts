/**
 * Zod Validation Schemas
 *
 * Runtime validation for everything that crosses into the allocation core:
 * pairings from the ingestion side, table lists from tournament
 * configuration, identifiers and round numbers passed by callers, and audit
 * records read back from storage.
 *
 * Usage:
 *   import { pairingsSchema, parseOrThrow } from './validation/schemas';
 *   const pairings = parseOrThrow(pairingsSchema, input, 'pairings');
 */

import { z } from 'zod';
import { CONFLICT_TYPES, COST_TERRAIN_REUSE } from '../constants';
import { ValidationError } from '../error-handling';

// ============================================================
// Common Schemas
// ============================================================

/** Database row ids are positive integers. */
export const idSchema = z.number().int('ID must be an integer').positive('ID must be positive');

export const roundNumberSchema = z
  .number()
  .int('Round number must be an integer')
  .min(1, 'Round number must be at least 1');

/** The table-number tier must stay below one terrain reuse. */
const MAX_TABLE_NUMBER = COST_TERRAIN_REUSE - 1;

export const tableNumberSchema = z
  .number()
  .int('Table number must be an integer')
  .positive('Table number must be positive')
  .max(MAX_TABLE_NUMBER, `Table number must be at most ${MAX_TABLE_NUMBER}`);

// ============================================================
// Pairing Schemas
// ============================================================

export const competitorSchema = z.object({
  id: z.string().trim().min(1, 'Competitor id is required').max(100, 'Competitor id is too long'),
  name: z.string().trim().min(1, 'Competitor name is required').max(255, 'Competitor name is too long'),
  roundScore: z.number().int('Round score must be an integer'),
  totalScore: z.number().int('Total score must be an integer').nullable().default(null),
});

/**
 * A pairing has either an opponent or is a bye (competitorB null). Both sides
 * of a real pairing must be different competitors.
 */
export const pairingSchema = z
  .object({
    competitorA: competitorSchema,
    competitorB: competitorSchema.nullable(),
    suggestedTableNumber: tableNumberSchema.nullable().default(null),
  })
  .refine((pairing) => pairing.competitorB === null || pairing.competitorB.id !== pairing.competitorA.id, {
    message: 'A competitor cannot be paired with themselves',
    path: ['competitorB', 'id'],
  });

/** No competitor may appear in more than one pairing of a round. */
export const pairingsSchema = z.array(pairingSchema).superRefine((pairings, ctx) => {
  const seen = new Set<string>();
  pairings.forEach((pairing, index) => {
    const ids = pairing.competitorB ? [pairing.competitorA.id, pairing.competitorB.id] : [pairing.competitorA.id];
    for (const id of ids) {
      if (seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Competitor ${id} appears in more than one pairing`,
          path: [index],
        });
      }
      seen.add(id);
    }
  });
});

export type PairingInput = z.input<typeof pairingSchema>;

// ============================================================
// Table Schemas
// ============================================================

export const tableSchema = z.object({
  tableNumber: tableNumberSchema,
  terrainTypeId: idSchema.nullable(),
  terrainTypeName: z.string().min(1).nullable(),
});

export const tablesSchema = z.array(tableSchema).superRefine((tables, ctx) => {
  const seen = new Set<number>();
  tables.forEach((table, index) => {
    if (seen.has(table.tableNumber)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Table number ${table.tableNumber} is listed more than once`,
        path: [index, 'tableNumber'],
      });
    }
    seen.add(table.tableNumber);
  });
});

// ============================================================
// Audit Record Schema (storage boundary)
// ============================================================

export const conflictSchema = z.object({
  type: z.enum([CONFLICT_TYPES.TABLE_REUSE, CONFLICT_TYPES.TERRAIN_REUSE, CONFLICT_TYPES.NO_TABLE_AVAILABLE]),
  message: z.string(),
  competitorId: z.string().optional(),
  tableNumber: z.number().int().optional(),
  terrainTypeId: z.number().int().optional(),
});

const scoredBreakdownSchema = z.object({
  tableReuse: z.number().int(),
  terrainReuse: z.number().int(),
  tableNumber: z.number().int(),
});

const fixedBreakdownSchema = z.object({
  tableReuse: z.number().int(),
  terrainReuse: z.number().int(),
  suggestedTableMismatch: z.number().int(),
});

export const auditRecordSchema = z.object({
  timestamp: z.string().datetime(),
  totalCost: z.number().int(),
  costBreakdown: z.union([scoredBreakdownSchema.strict(), fixedBreakdownSchema.strict()]),
  reasons: z.array(z.string()),
  alternativesConsidered: z.record(z.string().regex(/^\d+$/), z.number().int()),
  isRound1: z.boolean(),
  isBye: z.boolean(),
  conflicts: z.array(conflictSchema),
});

// ============================================================
// Helpers
// ============================================================

/**
 * Formats Zod issues as "path: message" pairs, leaving out the rejected
 * values themselves.
 */
export function formatValidationIssues(error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const fieldPath = issue.path.join('.');
    return fieldPath ? `${fieldPath}: ${issue.message}` : issue.message;
  });
  return `Validation failed: ${issues.join('; ')}`;
}

/**
 * Parses `value` with `schema`, throwing a ValidationError that names the
 * input on failure.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}. ${formatValidationIssues(result.error)}`, {
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    });
  }
  return result.data;
}
