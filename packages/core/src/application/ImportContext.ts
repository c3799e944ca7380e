import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { HandlerErrorReporter } from './EventBus.js';
import { EventBus } from './EventBus.js';

/** Resolved engine settings shared by every use case. */
export interface ImportSettings {
  readonly batchSize: number;
  readonly concurrency: number;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
}

/**
 * State shared across the use cases of one engine.
 *
 * Internal class, not exported from the public API. Per-invocation state
 * (progress, extractor, scheduler) lives in the use case that owns it.
 */
export class ImportContext {
  readonly eventBus: EventBus;
  readonly batchSize: number;
  readonly concurrency: number;
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly checkpointStore: CheckpointStore | null;

  constructor(settings: ImportSettings, checkpointStore?: CheckpointStore | null, onHandlerError?: HandlerErrorReporter) {
    assertPositiveInteger('batchSize', settings.batchSize);
    assertPositiveInteger('concurrency', settings.concurrency);
    assertPositiveInteger('maxAttempts', settings.maxAttempts);
    if (settings.retryDelayMs < 0) {
      throw new Error(`retryDelayMs must not be negative, got ${String(settings.retryDelayMs)}`);
    }

    this.batchSize = settings.batchSize;
    this.concurrency = settings.concurrency;
    this.maxAttempts = settings.maxAttempts;
    this.retryDelayMs = settings.retryDelayMs;
    this.checkpointStore = checkpointStore ?? null;
    this.eventBus = new EventBus(onHandlerError);
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${String(value)}`);
  }
}
