import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { ImportStatus } from '../domain/model/ImportCheckpoint.js';
import type { ProgressTracker } from '../domain/services/ProgressTracker.js';

/**
 * Writes the checkpoint of one invocation, carrying the totals of earlier
 * invocations of the same chain. A no-op without a store.
 */
export class CheckpointRecorder {
  private constructor(
    private readonly store: CheckpointStore | null,
    private readonly importId: string,
    private readonly priorObjectsSent: number,
    private readonly invocations: number,
  ) {}

  /**
   * A read from offset `0` starts a new chain. Any other offset continues the
   * chain recorded under `importId`, if there is one.
   */
  static async open(store: CheckpointStore | null, importId: string, startOffset: number): Promise<CheckpointRecorder> {
    if (!store) return new CheckpointRecorder(null, importId, 0, 1);

    const previous = startOffset > 0 ? await store.get(importId) : null;
    return new CheckpointRecorder(store, importId, previous?.objectsSent ?? 0, (previous?.invocations ?? 0) + 1);
  }

  async record(status: ImportStatus, tracker: ProgressTracker, error?: string): Promise<void> {
    if (!this.store) return;

    await this.store.save({
      importId: this.importId,
      status,
      confirmedOffset: tracker.confirmedOffset,
      totalBytes: tracker.totalBytes,
      objectsSent: this.priorObjectsSent + tracker.objectsSent,
      invocations: this.invocations,
      updatedAt: Date.now(),
      ...(error !== undefined ? { error } : {}),
    });
  }
}
