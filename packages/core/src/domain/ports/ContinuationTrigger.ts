/** Resume point handed to the next invocation. */
export interface ContinuationRequest {
  readonly importId: string;
  /** Confirmed offset the next invocation starts reading from. */
  readonly byteOffset: number;
}

/**
 * Port for scheduling the next invocation of the pipeline when the time budget
 * ran out before the source was fully consumed (asynchronous self-invocation,
 * a queue message, an orchestrator step).
 */
export interface ContinuationTrigger {
  trigger(request: ContinuationRequest): Promise<void>;
}
