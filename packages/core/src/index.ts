// Main entry point
export { BatchRunner } from './BatchRunner.js';
export type { BatchRunnerConfig } from './BatchRunner.js';

// Configuration
export { BatchOptionsSchema, parseBatchOptions, loadBatchOptionsFromEnv } from './config/BatchOptions.js';
export type { BatchOptions, BatchOptionsInput, EnvBatchConfig } from './config/BatchOptions.js';
export { createFileStores } from './config/fileStores.js';
export type { FileStores } from './config/fileStores.js';

// Domain model
export type { WorkItem, ItemPayload } from './domain/model/WorkItem.js';
export { createWorkItem } from './domain/model/WorkItem.js';
export type { JobOutcome, SuccessOutcome, FailureOutcome, FatalOutcome } from './domain/model/JobOutcome.js';
export { success, failure, fatal, isFatal } from './domain/model/JobOutcome.js';
export type { Loaded } from './domain/model/Loaded.js';
export { loadedOk, loadedMissing, loadedDegraded } from './domain/model/Loaded.js';
export type { RegistryRecord, RegistryStatus, RegistryFile, ParsedRegistry } from './domain/model/RegistryRecord.js';
export {
  REGISTRY_FORMAT_VERSION,
  MAX_ERROR_LENGTH,
  RegistryFileSchema,
  parseRegistryDocument,
  toRegistryDocument,
  compact,
} from './domain/model/RegistryRecord.js';
export type { RunEvent, RunEventKind } from './domain/model/RunEvent.js';
export { isTerminal } from './domain/model/RunEvent.js';
export type { CostEntry, CostLedger, PriceTable } from './domain/model/CostLedger.js';
export { COST_EPSILON, emptyLedger, budgetUsedPercent } from './domain/model/CostLedger.js';
export type {
  Checkpoint,
  CheckpointReason,
  CheckpointResults,
  ItemResult,
  SkippedItem,
} from './domain/model/Checkpoint.js';
export { CHECKPOINT_FORMAT_VERSION, CheckpointSchema, parseCheckpoint } from './domain/model/Checkpoint.js';
export { BatchStatus, canTransition, isTerminalStatus } from './domain/model/BatchStatus.js';
export type { BatchProgress, BatchSummary, ChunkInfo, StopReason } from './domain/model/Batch.js';

// Errors
export {
  BatchError,
  BudgetExceededError,
  FatalJobError,
  BatchAbortedError,
  InvalidTransitionError,
  ConfigError,
  describeError,
} from './domain/errors.js';
export type { BatchErrorCode } from './domain/errors.js';

// Domain services
export { ChunkSplitter } from './domain/services/ChunkSplitter.js';
export { canonicalHash, canonicalize } from './domain/services/canonicalHash.js';
export { makeRunId, sanitizeIdentity, formatBatchTimestamp } from './domain/services/runId.js';
export { formatSummary } from './domain/services/formatSummary.js';

// Components (usable on their own)
export { EventBus } from './application/EventBus.js';
export type { EventHandler, WildcardHandler } from './application/EventBus.js';
export { Mutex } from './application/Mutex.js';
export { RateLimiter } from './application/RateLimiter.js';
export type {
  RateLimitSettings,
  RateLimiterOptions,
  RateLimiterState,
  RateLimiterStats,
} from './application/RateLimiter.js';
export { RateLimiterPool } from './application/RateLimiterPool.js';
export { CostMeter } from './application/CostMeter.js';
export type { CostMeterOptions } from './application/CostMeter.js';
export { ItemRegistry } from './application/ItemRegistry.js';
export type {
  ItemRegistryOptions,
  ProcessingDecision,
  ProcessingReason,
  RegistryStats,
} from './application/ItemRegistry.js';
export { RunLogger } from './application/RunLogger.js';
export type { RunLoggerOptions, RunLogSummary } from './application/RunLogger.js';
export { CheckpointWriter } from './application/CheckpointWriter.js';
export type { CheckpointInput, CheckpointWrite } from './application/CheckpointWriter.js';
export type { BatchStatusResult } from './application/usecases/GetBatchStatus.js';

// Ports (for custom implementations)
export type { JobSource } from './domain/ports/JobSource.js';
export type { JobFunction, JobContext } from './domain/ports/JobFunction.js';
export type { RegistryStore, RegistryChange } from './domain/ports/RegistryStore.js';
export type { CheckpointStore } from './domain/ports/CheckpointStore.js';
export type { RunLogSink } from './domain/ports/RunLogSink.js';
export type { Logger, LogLevel } from './domain/ports/Logger.js';
export { silentLogger } from './domain/ports/Logger.js';
export type { Clock } from './domain/ports/Clock.js';
export { systemClock } from './domain/ports/Clock.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  BatchStartedEvent,
  BatchCompletedEvent,
  BatchAbortedEvent,
  ChunkStartedEvent,
  ChunkCompletedEvent,
  ItemSkippedEvent,
  ItemStartedEvent,
  ItemSucceededEvent,
  ItemFailedEvent,
  ItemRetriedEvent,
  CheckpointSavedEvent,
  BudgetExceededEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { FileRegistryStore } from './infrastructure/registry/FileRegistryStore.js';
export type { FileRegistryStoreOptions } from './infrastructure/registry/FileRegistryStore.js';
export { InMemoryRegistryStore } from './infrastructure/registry/InMemoryRegistryStore.js';
export { FileCheckpointStore } from './infrastructure/checkpoint/FileCheckpointStore.js';
export type { FileCheckpointStoreOptions } from './infrastructure/checkpoint/FileCheckpointStore.js';
export { InMemoryCheckpointStore } from './infrastructure/checkpoint/InMemoryCheckpointStore.js';
export { DailyTextLogSink, formatRunLogLine } from './infrastructure/logging/DailyTextLogSink.js';
export type { DailyTextLogSinkOptions } from './infrastructure/logging/DailyTextLogSink.js';
export { JsonLinesLogSink } from './infrastructure/logging/JsonLinesLogSink.js';
export type { JsonLinesLogSinkOptions } from './infrastructure/logging/JsonLinesLogSink.js';
export { InMemoryRunLogSink } from './infrastructure/logging/InMemoryRunLogSink.js';
export { createConsoleLogger, isLogLevel } from './infrastructure/logging/ConsoleLogger.js';
export type { ConsoleLoggerOptions } from './infrastructure/logging/ConsoleLogger.js';
export { ArrayItemSource } from './infrastructure/sources/ArrayItemSource.js';
