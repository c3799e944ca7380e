import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { ImportCheckpoint } from '../../domain/model/ImportCheckpoint.js';

/** Non-persistent checkpoint store. Suited to tests and to the in-process loop driver. */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, ImportCheckpoint>();

  save(checkpoint: ImportCheckpoint): Promise<void> {
    this.checkpoints.set(checkpoint.importId, checkpoint);
    return Promise.resolve();
  }

  get(importId: string): Promise<ImportCheckpoint | null> {
    return Promise.resolve(this.checkpoints.get(importId) ?? null);
  }
}
