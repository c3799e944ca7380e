// Main entry point
export { ImportEngine } from './ImportEngine.js';
export type { ImportEngineConfig } from './ImportEngine.js';

// Domain model
export type { TrackObject, PartitionedBatch } from './domain/model/TrackObject.js';
export { isTrackObject, isPurchase, partitionBatch } from './domain/model/TrackObject.js';
export type { TrackBatch, DispatchRound } from './domain/model/Batch.js';
export { DEFAULT_BATCH_SIZE, DEFAULT_CONCURRENCY, createBatch, countRoundObjects } from './domain/model/Batch.js';
export type { InvocationResult, ImportRunSummary } from './domain/model/InvocationResult.js';
export type { ImportCheckpoint } from './domain/model/ImportCheckpoint.js';
export { ImportStatus, isImportStatus } from './domain/model/ImportCheckpoint.js';

// Errors
export { DispatchError, RetryableDispatchError, FatalDispatchError } from './domain/errors/DispatchError.js';
export type { DispatchErrorOptions } from './domain/errors/DispatchError.js';
export { MalformedSourceError } from './domain/errors/MalformedSourceError.js';

// Domain services (for building custom pipelines)
export { ObjectExtractor } from './domain/services/ObjectExtractor.js';
export type { ObjectExtractorOptions } from './domain/services/ObjectExtractor.js';
export { BatchScheduler } from './domain/services/BatchScheduler.js';
export { TimeBudgetGuard, DEFAULT_TIME_RESERVE_MS } from './domain/services/TimeBudgetGuard.js';
export { ProgressTracker } from './domain/services/ProgressTracker.js';

// Use case request types
export type { InvocationRequest } from './application/usecases/RunInvocation.js';
export type { RunUntilFinishedRequest } from './application/usecases/RunUntilFinished.js';

// Application internals
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorReporter } from './application/EventBus.js';

// Ports (for custom implementations)
export type { ByteSource, SourceMetadata } from './domain/ports/ByteSource.js';
export type { BatchSender, SendReceipt } from './domain/ports/BatchSender.js';
export type { ContinuationTrigger, ContinuationRequest } from './domain/ports/ContinuationTrigger.js';
export type { CheckpointStore } from './domain/ports/CheckpointStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ImportStartedEvent,
  RoundStartedEvent,
  RoundCompletedEvent,
  BatchRetriedEvent,
  BatchPartialEvent,
  BatchFailedEvent,
  ProgressAdvancedEvent,
  BudgetExhaustedEvent,
  ImportContinuedEvent,
  ImportCompletedEvent,
  ImportStalledEvent,
  ImportFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources and checkpoint stores)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { rechunk, DEFAULT_CHUNK_SIZE } from './infrastructure/sources/rechunk.js';
export { InMemoryCheckpointStore } from './infrastructure/state/InMemoryCheckpointStore.js';
export { FileCheckpointStore } from './infrastructure/state/FileCheckpointStore.js';
export type { FileCheckpointStoreOptions } from './infrastructure/state/FileCheckpointStore.js';
