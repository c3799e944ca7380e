/** Emitted when an invocation starts reading the source. */
export interface ImportStartedEvent {
  readonly type: 'import:started';
  readonly importId: string;
  readonly startOffset: number;
  readonly totalBytes: number;
  readonly timestamp: number;
}

/** Emitted before the batches of a round are sent. Not emitted for an empty final round. */
export interface RoundStartedEvent {
  readonly type: 'round:started';
  readonly importId: string;
  readonly roundIndex: number;
  readonly batchCount: number;
  readonly objectCount: number;
  readonly timestamp: number;
}

/** Emitted once every batch of a round has been accepted. */
export interface RoundCompletedEvent {
  readonly type: 'round:completed';
  readonly importId: string;
  readonly roundIndex: number;
  /** Objects the remote API reported as processed in this round. */
  readonly objectsSent: number;
  readonly final: boolean;
  readonly timestamp: number;
}

/** Emitted when a batch is about to be sent again after a transient failure. */
export interface BatchRetriedEvent {
  readonly type: 'batch:retried';
  readonly importId: string;
  readonly batchIndex: number;
  /** Attempt that just failed (1-based). */
  readonly attempt: number;
  readonly maxAttempts: number;
  /** Wait before the next attempt. */
  readonly delayMs: number;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when an accepted batch carries per-record errors. */
export interface BatchPartialEvent {
  readonly type: 'batch:partial';
  readonly importId: string;
  readonly batchIndex: number;
  readonly processed: number;
  readonly errors: readonly unknown[];
  readonly timestamp: number;
}

/** Emitted when a batch fails for good (fatal error, or retries exhausted). */
export interface BatchFailedEvent {
  readonly type: 'batch:failed';
  readonly importId: string;
  readonly batchIndex: number;
  readonly attempts: number;
  readonly retryable: boolean;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after the resume offset moves forward. */
export interface ProgressAdvancedEvent {
  readonly type: 'progress:advanced';
  readonly importId: string;
  readonly confirmedOffset: number;
  readonly totalBytes: number;
  /** Objects sent so far in this invocation. */
  readonly objectsSent: number;
  readonly timestamp: number;
}

/** Emitted when the time budget stops the invocation before the source is consumed. */
export interface BudgetExhaustedEvent {
  readonly type: 'budget:exhausted';
  readonly importId: string;
  readonly remainingMs: number;
  readonly confirmedOffset: number;
  readonly timestamp: number;
}

/** Emitted after the next invocation has been scheduled. */
export interface ImportContinuedEvent {
  readonly type: 'import:continued';
  readonly importId: string;
  readonly byteOffset: number;
  readonly timestamp: number;
}

/** Emitted when an invocation ends the chain. */
export interface ImportCompletedEvent {
  readonly type: 'import:completed';
  readonly importId: string;
  readonly objectsSent: number;
  readonly bytesRead: number;
  readonly timestamp: number;
}

/**
 * Emitted alongside `import:completed` when the chain ends short of the end of
 * the source because an invocation sent no object.
 */
export interface ImportStalledEvent {
  readonly type: 'import:stalled';
  readonly importId: string;
  readonly confirmedOffset: number;
  readonly totalBytes: number;
  readonly timestamp: number;
}

/** Emitted when the invocation aborts on an unrecoverable error. No continuation follows. */
export interface ImportFailedEvent {
  readonly type: 'import:failed';
  readonly importId: string;
  readonly error: string;
  readonly confirmedOffset: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | ImportStartedEvent
  | RoundStartedEvent
  | RoundCompletedEvent
  | BatchRetriedEvent
  | BatchPartialEvent
  | BatchFailedEvent
  | ProgressAdvancedEvent
  | BudgetExhaustedEvent
  | ImportContinuedEvent
  | ImportCompletedEvent
  | ImportStalledEvent
  | ImportFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
