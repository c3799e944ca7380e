/** Outcome of one bounded-time invocation. */
export interface InvocationResult {
  /** Objects the remote API reported as processed during this invocation. */
  readonly objectsSent: number;
  /**
   * Confirmed byte offset into the source. The next invocation resumes here;
   * it always sits between elements, never inside one.
   */
  readonly bytesRead: number;
  /** `true` when no continuation is needed. */
  readonly isFinished: boolean;
}

/** Totals of a chain of invocations driven in-process by `runUntilFinished()`. */
export interface ImportRunSummary {
  readonly importId: string;
  readonly invocations: number;
  readonly objectsSent: number;
  readonly bytesRead: number;
}
