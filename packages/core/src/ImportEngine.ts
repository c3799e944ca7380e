import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import type { ImportCheckpoint } from './domain/model/ImportCheckpoint.js';
import type { ImportRunSummary, InvocationResult } from './domain/model/InvocationResult.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_CONCURRENCY } from './domain/model/Batch.js';
import type { CheckpointStore } from './domain/ports/CheckpointStore.js';
import type { HandlerErrorReporter } from './application/EventBus.js';
import { ImportContext } from './application/ImportContext.js';
import { RunInvocation } from './application/usecases/RunInvocation.js';
import type { InvocationRequest } from './application/usecases/RunInvocation.js';
import { RunUntilFinished } from './application/usecases/RunUntilFinished.js';
import type { RunUntilFinishedRequest } from './application/usecases/RunUntilFinished.js';

/** Configuration of an import engine. */
export interface ImportEngineConfig {
  /** Objects per remote call. Default: `75`. */
  readonly batchSize?: number;
  /** Batches sent concurrently in one round. Default: `15`. */
  readonly concurrency?: number;
  /** Total attempts per batch, first one included. Default: `5`. */
  readonly maxAttempts?: number;
  /**
   * Base delay before a retry. Uses exponential backoff:
   * `retryDelayMs * 2^(attempt - 1)`. Default: `5000`.
   */
  readonly retryDelayMs?: number;
  /** Where progress is persisted. Default: none, the offset only travels with the continuation. */
  readonly checkpointStore?: CheckpointStore;
  /** Receives errors thrown by event subscribers. Default: ignored. */
  readonly onHandlerError?: HandlerErrorReporter;
}

/**
 * Facade over the import pipeline: read → extract → batch → send → confirm.
 *
 * Delegates each operation to a dedicated use case in `application/usecases/`.
 *
 * @example
 * ```typescript
 * const engine = new ImportEngine({ concurrency: 10 });
 * engine.on('batch:retried', (e) => console.warn(e.error));
 * const result = await engine.run({
 *   source: new FilePathSource('./events.json'),
 *   sender,
 *   guard: TimeBudgetGuard.fromDeadline(Date.now() + 60_000),
 * });
 * ```
 */
export class ImportEngine {
  private readonly ctx: ImportContext;

  constructor(config: ImportEngineConfig = {}) {
    this.ctx = new ImportContext(
      {
        batchSize: config.batchSize ?? DEFAULT_BATCH_SIZE,
        concurrency: config.concurrency ?? DEFAULT_CONCURRENCY,
        maxAttempts: config.maxAttempts ?? 5,
        retryDelayMs: config.retryDelayMs ?? 5000,
      },
      config.checkpointStore,
      config.onHandlerError,
    );
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run one bounded-time invocation.
   *
   * When the budget runs low before the source is exhausted, the invocation
   * stops between rounds, hands the confirmed offset to `request.continuation`
   * and returns `isFinished: false`.
   *
   * @throws FatalDispatchError, RetryableDispatchError (retries exhausted) or
   *   MalformedSourceError. No continuation is scheduled in that case.
   */
  async run(request: InvocationRequest): Promise<InvocationResult> {
    return new RunInvocation(this.ctx).execute(request);
  }

  /** Chain invocations in the current process until the import is finished. */
  async runUntilFinished(request: RunUntilFinishedRequest): Promise<ImportRunSummary> {
    return new RunUntilFinished(this.ctx).execute(request);
  }

  /** Last checkpoint persisted for `importId`, or `null` without a store or a record. */
  async getCheckpoint(importId: string): Promise<ImportCheckpoint | null> {
    return this.ctx.checkpointStore ? this.ctx.checkpointStore.get(importId) : null;
  }
}
