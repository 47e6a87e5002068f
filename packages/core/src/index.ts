// Domain model
export type { CellValue, RawRecord, RecordBatch } from './domain/model/Record.js';
export { isNullish, columnsOf, toEpochMs, compareCells } from './domain/model/Record.js';
export { ChunkStatus } from './domain/model/ChunkStatus.js';
export type { ChunkOutcome } from './domain/model/Chunk.js';
export { createChunkOutcome } from './domain/model/Chunk.js';
export { RunStatus, canTransition, isTerminal } from './domain/model/RunStatus.js';
export type { RunOutcome } from './domain/model/RunStatus.js';
export type { RuleKind, RuleSeverity, RuleOutcome, ValidationResult } from './domain/model/ValidationResult.js';
export { blockingFailures, advisoryWarnings } from './domain/model/ValidationResult.js';
export type { LoadMode, LoadStatus, LoadResult, Rejection, RejectionReason } from './domain/model/LoadResult.js';
export { loadStatusOf } from './domain/model/LoadResult.js';
export type { Lease } from './domain/model/Lease.js';
export { createLease, isLeaseValid } from './domain/model/Lease.js';
export type { ColumnType, ColumnDefinition, DestinationDefinition } from './domain/model/Destination.js';
export {
  DestinationCatalog,
  destinationId,
  findColumn,
  naturalKeyOf,
  partitionKeyOf,
  normalizeKeyCell,
} from './domain/model/Destination.js';
export type { RunCounts, RunReport } from './domain/model/RunReport.js';

// Errors
export type { EtlErrorCode } from './domain/errors/EtlErrors.js';
export {
  EtlError,
  SchemaViolation,
  ValidationFailure,
  LockContention,
  LeaseExpired,
  PartialChunkFailure,
  ResourceUnavailable,
  LoadCancelled,
  ConfigError,
  UnknownDestination,
  isRetryable,
  errorMessage,
} from './domain/errors/EtlErrors.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RunStartedEvent,
  ValidationCompletedEvent,
  TransformCompletedEvent,
  LeaseAcquiredEvent,
  LeaseReleasedEvent,
  LeaseContendedEvent,
  ChunkCommittedEvent,
  ChunkFailedEvent,
  ChunkRetriedEvent,
  LoadCompletedEvent,
  RunCompletedEvent,
  RunFailedEvent,
} from './domain/events/DomainEvents.js';
export { isEventOf } from './domain/events/DomainEvents.js';

// Ports
export type { LeaseStore } from './domain/ports/LeaseStore.js';
export type { Warehouse, WarehouseSession } from './domain/ports/Warehouse.js';
export type { RunLogSink, RunLogEntry, QualityLogEntry } from './domain/ports/RunLogSink.js';

// Domain services
export { ChunkSplitter } from './domain/services/ChunkSplitter.js';

// Application
export { EventBus } from './application/EventBus.js';
export { LockManager } from './application/LockManager.js';
export type { LockManagerOptions } from './application/LockManager.js';
export { ConnectionPool } from './application/ConnectionPool.js';
export type { ConnectionPoolOptions, PoolSettings, PoolStats, PoolSlot } from './application/ConnectionPool.js';
export { BulkLoader } from './application/BulkLoader.js';
export type { BulkLoaderOptions, LoadOptions } from './application/BulkLoader.js';
export { RunLogger, toRunLogEntry, toQualityLogEntries } from './application/RunLogger.js';

// Infrastructure
export { InMemoryLeaseStore } from './infrastructure/leases/InMemoryLeaseStore.js';
export { InMemoryWarehouse } from './infrastructure/warehouse/InMemoryWarehouse.js';
export type { InMemoryWarehouseOptions, WriteOperation } from './infrastructure/warehouse/InMemoryWarehouse.js';
export { InMemoryRunLogSink } from './infrastructure/runlog/InMemoryRunLogSink.js';
export { loadEtlConfig } from './infrastructure/config/EtlConfig.js';
export type { EtlConfig, EnvSource, LogLevel } from './infrastructure/config/EtlConfig.js';
export { createLogger, silentLogger } from './infrastructure/logging/logger.js';
export type { Logger, CreateLoggerOptions } from './infrastructure/logging/logger.js';
