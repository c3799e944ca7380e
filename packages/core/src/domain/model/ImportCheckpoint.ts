/** Lifecycle status of an import across its invocation chain. */
export const ImportStatus = {
  RUNNING: 'RUNNING',
  CONTINUING: 'CONTINUING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type ImportStatus = (typeof ImportStatus)[keyof typeof ImportStatus];

const STATUSES: readonly string[] = Object.values(ImportStatus);

export function isImportStatus(value: unknown): value is ImportStatus {
  return typeof value === 'string' && STATUSES.includes(value);
}

/** Serialisable progress of one source file, persisted through a `CheckpointStore`. */
export interface ImportCheckpoint {
  readonly importId: string;
  readonly status: ImportStatus;
  readonly confirmedOffset: number;
  readonly totalBytes: number;
  /** Objects sent across every invocation of the chain. */
  readonly objectsSent: number;
  /** Number of invocations that have worked on this import. */
  readonly invocations: number;
  readonly updatedAt: number;
  /** Failure message, set when `status` is `FAILED`. */
  readonly error?: string;
}
