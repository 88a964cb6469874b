/**
 * Allocation Errors and Result Envelopes
 *
 * Hard failures are thrown as AllocationError subclasses carrying a
 * machine-readable code and a category:
 * - rejected:  the caller asked for something the contract does not allow
 * - conflict:  the request was valid but collides with current state
 *              (occupied table, concurrent edit); retrying later may succeed
 * - internal:  an invariant broke inside the library
 *
 * Service operations return a uniform envelope instead of throwing:
 * - Success: { success: true, data: T, message?: string }
 * - Error:   { success: false, error: string, code: string, category, details?: unknown }
 *
 * Usage:
 *   try {
 *     ...
 *     return createSuccessResponse(outcome, 'Table reassigned');
 *   } catch (error) {
 *     return handleAllocationError(error, 'allocation-reassign');
 *   }
 */

import { createLogger } from './logger';

const logger = createLogger('error-handling');

// ============================================================
// Error Classes
// ============================================================

export type ErrorCategory = 'rejected' | 'conflict' | 'internal';

export type AllocationErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_TABLES'
  | 'TABLE_NOT_IN_TOURNAMENT'
  | 'TABLE_OCCUPIED'
  | 'SELF_SWAP'
  | 'CROSS_ROUND_SWAP'
  | 'BYE_NOT_ASSIGNABLE'
  | 'OPTIMISTIC_LOCK'
  | 'INVARIANT_VIOLATION'
  | 'INTERNAL_ERROR';

export class AllocationError extends Error {
  constructor(
    message: string,
    public readonly code: AllocationErrorCode,
    public readonly category: ErrorCategory,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AllocationError';
  }
}

export class ValidationError extends AllocationError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 'rejected', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AllocationError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 'rejected');
    this.name = 'NotFoundError';
  }
}

export class InsufficientTablesError extends AllocationError {
  constructor(public readonly pairingCount: number, public readonly tableCount: number) {
    super(
      `Cannot allocate ${pairingCount} pairing(s) to ${tableCount} table(s)`,
      'INSUFFICIENT_TABLES',
      'rejected',
      { pairingCount, tableCount }
    );
    this.name = 'InsufficientTablesError';
  }
}

export class TableNotInTournamentError extends AllocationError {
  constructor(tableNumber: number, tournamentId: number) {
    super(
      `Table ${tableNumber} does not belong to tournament ${tournamentId}`,
      'TABLE_NOT_IN_TOURNAMENT',
      'rejected',
      { tableNumber, tournamentId }
    );
    this.name = 'TableNotInTournamentError';
  }
}

export class TableOccupiedError extends AllocationError {
  constructor(tableNumber: number, occupiedBy?: number) {
    super(
      `Table ${tableNumber} is already assigned in this round`,
      'TABLE_OCCUPIED',
      'conflict',
      occupiedBy !== undefined ? { tableNumber, occupiedBy } : { tableNumber }
    );
    this.name = 'TableOccupiedError';
  }
}

export class SelfSwapError extends AllocationError {
  constructor() {
    super('Cannot swap an allocation with itself', 'SELF_SWAP', 'rejected');
    this.name = 'SelfSwapError';
  }
}

export class CrossRoundSwapError extends AllocationError {
  constructor() {
    super('Both allocations must be in the same round', 'CROSS_ROUND_SWAP', 'rejected');
    this.name = 'CrossRoundSwapError';
  }
}

export class ByeNotAssignableError extends AllocationError {
  constructor(allocationId: number) {
    super(`Allocation ${allocationId} is a bye and cannot hold a table`, 'BYE_NOT_ASSIGNABLE', 'rejected', {
      allocationId,
    });
    this.name = 'ByeNotAssignableError';
  }
}

export class InvariantViolationError extends AllocationError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVARIANT_VIOLATION', 'internal', details);
    this.name = 'InvariantViolationError';
  }
}

// ============================================================
// Response Envelopes
// ============================================================

export interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  category: ErrorCategory;
  details?: unknown;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
}

export type OperationResult<T> = SuccessResponse<T> | ErrorResponse;

export function createSuccessResponse<T>(data: T, message?: string): SuccessResponse<T> {
  return {
    success: true,
    data,
    ...(message && { message }),
  };
}

export function createErrorResponse(
  message: string,
  code: string,
  category: ErrorCategory,
  details?: unknown
): ErrorResponse {
  const body: ErrorResponse = {
    success: false,
    error: message,
    code,
    category,
    ...(details !== undefined && { details }),
  };

  logger.warn('Error response created', { code, category, message });

  return body;
}

/**
 * sql.js raises a plain Error carrying the SQLite message; drivers that
 * attach an extended result code are matched on the code. Checked
 * structurally so callers need not import the driver.
 */
function isUniqueConstraintError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')) {
    return true;
  }
  return error.message.startsWith('UNIQUE constraint failed');
}

/**
 * Converts any thrown value into an ErrorResponse.
 *
 * - AllocationError subclasses keep their code, category and details
 * - SQLite unique constraint failures become TABLE_OCCUPIED conflicts, since the
 *   only unique constraint an allocation write can hit is one table per round
 * - Anything else becomes INTERNAL_ERROR with a generic message
 *
 * @param context - Operation name for the log entry (e.g. 'allocation-swap')
 */
export function handleAllocationError(error: unknown, context: string): ErrorResponse {
  if (error instanceof AllocationError) {
    logger.info('Allocation operation rejected', { context, code: error.code, message: error.message });
    return createErrorResponse(error.message, error.code, error.category, error.details);
  }

  logger.error('Allocation operation failed', {
    context,
    error: error instanceof Error ? error.message : String(error),
  });

  if (isUniqueConstraintError(error)) {
    return createErrorResponse('Table is already assigned in this round', 'TABLE_OCCUPIED', 'conflict');
  }

  return createErrorResponse('An unexpected error occurred', 'INTERNAL_ERROR', 'internal');
}
