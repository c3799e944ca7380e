import type { TrackObject } from './TrackObject.js';

/** Number of objects the bulk track endpoint accepts in one request. */
export const DEFAULT_BATCH_SIZE = 75;

/** Number of batches sent concurrently in one dispatch round. */
export const DEFAULT_CONCURRENCY = 15;

/** An ordered group of objects sent in a single remote call. */
export interface TrackBatch {
  /** Zero-based position of the batch within the invocation. */
  readonly index: number;
  readonly objects: readonly TrackObject[];
}

/**
 * Batches sent concurrently. Progress is only confirmed once a whole round
 * has completed.
 */
export interface DispatchRound {
  /** Zero-based position of the round within the invocation. */
  readonly index: number;
  readonly batches: readonly TrackBatch[];
  /** `true` for the round flushed when the source is exhausted. */
  readonly final: boolean;
}

/** Create a batch. */
export function createBatch(index: number, objects: readonly TrackObject[]): TrackBatch {
  return { index, objects };
}

/** Total objects carried by the round. */
export function countRoundObjects(round: DispatchRound): number {
  return round.batches.reduce((total, batch) => total + batch.objects.length, 0);
}
