import type { TrackBatch } from '../model/Batch.js';

/** What the remote API reported for an accepted batch. */
export interface SendReceipt {
  /** Objects the remote API processed. */
  readonly processed: number;
  /**
   * Per-record problems reported inside an otherwise accepted response. They do
   * not block progress.
   */
  readonly errors?: readonly unknown[];
}

/**
 * Port for one remote call carrying one batch.
 *
 * Implementations perform a single attempt. They signal transient failures by
 * throwing `RetryableDispatchError` and permanent ones with `FatalDispatchError`;
 * the dispatcher owns the retry loop.
 */
export interface BatchSender {
  send(batch: TrackBatch): Promise<SendReceipt>;
}
