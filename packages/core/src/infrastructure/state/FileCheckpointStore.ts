import { writeFile, readFile, mkdir, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { ImportCheckpoint } from '../../domain/model/ImportCheckpoint.js';
import { isImportStatus } from '../../domain/model/ImportCheckpoint.js';

export interface FileCheckpointStoreOptions {
  /** Directory where checkpoint files are stored. Default: `'.trackimport'`. */
  readonly directory?: string;
}

/**
 * File-based checkpoint store: one `{importId}.json` file per import, the id
 * URI-encoded so that `s3://bucket/key` style ids make valid file names.
 *
 * Writes go to a temporary file first and are renamed into place. Node.js only.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly directory: string;

  constructor(options?: FileCheckpointStoreOptions) {
    this.directory = options?.directory ?? '.trackimport';
  }

  async save(checkpoint: ImportCheckpoint): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const filePath = this.filePath(checkpoint.importId);
    const tempPath = `${filePath}.tmp`;
    await writeFile(tempPath, JSON.stringify(checkpoint, null, 2), 'utf-8');
    await rename(tempPath, filePath);
  }

  async get(importId: string): Promise<ImportCheckpoint | null> {
    let content: string;
    try {
      content = await readFile(this.filePath(importId), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    return parseCheckpoint(JSON.parse(content), importId);
  }

  private filePath(importId: string): string {
    return join(this.directory, `${encodeURIComponent(importId)}.json`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function readNumber(record: Record<string, unknown>, key: string, importId: string): number {
  const value = record[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Checkpoint file of ${importId} has an invalid "${key}"`);
  }
  return value;
}

function parseCheckpoint(value: unknown, importId: string): ImportCheckpoint {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Checkpoint file of ${importId} does not hold an object`);
  }
  const record: Record<string, unknown> = { ...value };

  const status = record['status'];
  if (!isImportStatus(status)) {
    throw new Error(`Checkpoint file of ${importId} has an invalid "status"`);
  }
  const error = record['error'];

  return {
    importId,
    status,
    confirmedOffset: readNumber(record, 'confirmedOffset', importId),
    totalBytes: readNumber(record, 'totalBytes', importId),
    objectsSent: readNumber(record, 'objectsSent', importId),
    invocations: readNumber(record, 'invocations', importId),
    updatedAt: readNumber(record, 'updatedAt', importId),
    ...(typeof error === 'string' ? { error } : {}),
  };
}
