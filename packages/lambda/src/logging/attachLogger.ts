import type { ImportEngine } from '@trackimport/core';
import type { Logger } from './logger.js';
import { formatBytes } from './formatBytes.js';

/** Write the lifecycle of an import to the logger. */
export function attachLogger(engine: ImportEngine, logger: Logger): void {
  engine
    .on('import:started', (e) => {
      logger.info(
        { importId: e.importId, startOffset: e.startOffset, totalBytes: e.totalBytes },
        `Starting at byte ${String(e.startOffset)} of ${formatBytes(e.totalBytes)}`,
      );
    })
    .on('round:completed', (e) => {
      if (e.objectsSent > 0) {
        logger.info({ roundIndex: e.roundIndex }, `Successfully sent ${String(e.objectsSent)} objects to Braze`);
      }
    })
    .on('batch:retried', (e) => {
      logger.warn(
        { batchIndex: e.batchIndex, error: e.error },
        `Retry attempt: ${String(e.attempt)}/${String(e.maxAttempts)}. Wait time: ${String(e.delayMs / 1000)}s`,
      );
    })
    .on('batch:partial', (e) => {
      logger.error(
        { batchIndex: e.batchIndex, processed: e.processed, errors: e.errors },
        'Encountered errors processing some users',
      );
    })
    .on('batch:failed', (e) => {
      logger.error(
        { batchIndex: e.batchIndex, attempts: e.attempts, retryable: e.retryable },
        `Batch ${String(e.batchIndex)} failed after ${String(e.attempts)} attempt(s): ${e.error}`,
      );
    })
    .on('progress:advanced', (e) => {
      logger.debug(
        { confirmedOffset: e.confirmedOffset, totalBytes: e.totalBytes, objectsSent: e.objectsSent },
        'Resume offset advanced',
      );
    })
    .on('budget:exhausted', (e) => {
      logger.info(
        { remainingMs: e.remainingMs, confirmedOffset: e.confirmedOffset },
        `Time budget nearly exhausted, stopping at byte ${String(e.confirmedOffset)}`,
      );
    })
    .on('import:continued', (e) => {
      logger.info({ byteOffset: e.byteOffset }, 'Invoked the function again to continue processing the file');
    })
    .on('import:stalled', (e) => {
      logger.warn(
        { confirmedOffset: e.confirmedOffset, totalBytes: e.totalBytes },
        `No objects were sent; the import ends at byte ${String(e.confirmedOffset)} of ${String(e.totalBytes)}`,
      );
    })
    .on('import:completed', (e) => {
      logger.info({ objectsSent: e.objectsSent, bytesRead: e.bytesRead }, `File ${e.importId} imported successfully`);
    })
    .on('import:failed', (e) => {
      logger.error({ confirmedOffset: e.confirmedOffset }, `Import failed: ${e.error}`);
    });
}
