import type { ImportCheckpoint } from '../model/ImportCheckpoint.js';

/**
 * Port for persisting import progress.
 *
 * The resume offset travels with the continuation itself, so a store is
 * optional. When configured, the engine writes a checkpoint every time the
 * confirmed offset advances and when an invocation ends.
 */
export interface CheckpointStore {
  /** Insert or replace the checkpoint of `checkpoint.importId`. */
  save(checkpoint: ImportCheckpoint): Promise<void>;
  /** Retrieve a checkpoint, or `null` when the import is unknown. */
  get(importId: string): Promise<ImportCheckpoint | null>;
}
