import type { ImportCheckpoint } from '@trackimport/core';
import { isImportStatus } from '@trackimport/core';
import type { CheckpointRow } from '../models/CheckpointModel.js';

export function toRow(checkpoint: ImportCheckpoint): CheckpointRow {
  return {
    importId: checkpoint.importId,
    status: checkpoint.status,
    confirmedOffset: checkpoint.confirmedOffset,
    totalBytes: checkpoint.totalBytes,
    objectsSent: checkpoint.objectsSent,
    invocations: checkpoint.invocations,
    updatedAt: checkpoint.updatedAt,
    error: checkpoint.error ?? null,
  };
}

export function toDomain(row: CheckpointRow): ImportCheckpoint {
  if (!isImportStatus(row.status)) {
    throw new Error(`Checkpoint of ${row.importId} has an unknown status "${row.status}"`);
  }

  return {
    importId: row.importId,
    status: row.status,
    confirmedOffset: Number(row.confirmedOffset),
    totalBytes: Number(row.totalBytes),
    objectsSent: Number(row.objectsSent),
    invocations: row.invocations,
    updatedAt: Number(row.updatedAt),
    ...(row.error !== null ? { error: row.error } : {}),
  };
}
