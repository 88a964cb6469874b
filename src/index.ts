export * from './lib/allocation/types';
export { AllocationEngine, orderPairingsForAllocation, sortTables } from './lib/allocation/allocation-engine';
export type { AllocationEngineOptions, GenerateAllocationsInput } from './lib/allocation/allocation-engine';
export { calculateCost, findReuse, reuseCosts } from './lib/allocation/cost-model';
export type { CostModel, CostResult, ReuseFinding } from './lib/allocation/cost-model';
export { TournamentHistory } from './lib/allocation/history-provider';
export type { HistorySource } from './lib/allocation/history-provider';
export { detectDecisionCollisions, summarizeConflicts } from './lib/allocation/conflicts';
export type { TableCollision } from './lib/allocation/conflicts';
export { ManualAdjustmentService } from './lib/allocation/manual-adjustment';
export type { AdjustmentOutcome, ManualAdjustmentOptions, SwapOutcome } from './lib/allocation/manual-adjustment';
export { AllocationGenerationService, pairingsFromAllocations } from './lib/allocation/generation-service';
export type { GenerationOutcome, GenerationServiceOptions } from './lib/allocation/generation-service';
export { AllocationRepository } from './lib/db/allocation-repository';
export type { StoredAllocation, StoredPlayer, StoredTable, StoredTableCollision } from './lib/db/allocation-repository';
export { createDatabase } from './lib/db';
export type { AppDatabase, DatabaseHandle, SyncDatabase } from './lib/db';
export { AUDIT_ACTIONS, createAuditRecord, parseAuditRecord, serializeAuditRecord } from './lib/audit-log';
export * from './lib/error-handling';
export { OptimisticLockError, updateWithRetry } from './lib/optimistic-locking';
export type { RetryConfig } from './lib/optimistic-locking';
export * from './lib/constants';
export { loadConfig } from './lib/config';
export type { AppConfig } from './lib/config';
export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';
