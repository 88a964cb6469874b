/**
 * Allocation constants
 */

// Cost weights, highest priority first. Each tier outweighs the largest
// possible total of every tier below it, given table numbers capped below
// COST_TERRAIN_REUSE (see tableNumberSchema).
export const COST_TABLE_REUSE = 100000;
export const COST_TERRAIN_REUSE = 10000;
export const COST_TABLE_NUMBER = 1;

// Edit-time penalty when a pairing is moved off its suggested table
export const COST_SUGGESTED_TABLE_MISMATCH = 1;

export const CONFLICT_TYPES = {
  TABLE_REUSE: 'TABLE_REUSE',
  TERRAIN_REUSE: 'TERRAIN_REUSE',
  NO_TABLE_AVAILABLE: 'NO_TABLE_AVAILABLE',
} as const;

export type ConflictType = (typeof CONFLICT_TYPES)[keyof typeof CONFLICT_TYPES];

export const BYE_REASON = 'Bye - no opponent this round';

export const SUMMARY_OPTIMAL = 'All allocations optimal - no constraint violations.';
export const SUMMARY_ROUND1_CLEAN = 'Round 1 allocations use suggested table assignments.';
