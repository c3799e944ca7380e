import { S3Client } from '@aws-sdk/client-s3';
import { LambdaClient } from '@aws-sdk/client-lambda';
import type { Context } from 'aws-lambda';
import type { BatchSender, CheckpointStore } from '@trackimport/core';
import { ImportEngine, TimeBudgetGuard } from '@trackimport/core';
import { BrazeTrackSender } from '@trackimport/braze';
import type { ImportEnv } from './config/env.js';
import type { ImportTriggerEvent } from './event.js';
import { parseTriggerEvent } from './event.js';
import type { RangeReader } from './aws/S3RangeSource.js';
import { S3RangeSource, s3RangeReader } from './aws/S3RangeSource.js';
import type { AsyncInvoker } from './aws/LambdaContinuationTrigger.js';
import { LambdaContinuationTrigger, lambdaInvoker } from './aws/LambdaContinuationTrigger.js';
import type { Logger } from './logging/logger.js';
import { createLogger } from './logging/logger.js';
import { attachLogger } from './logging/attachLogger.js';
import { formatBytes } from './logging/formatBytes.js';

/** What the function returns to the Lambda runtime. */
export interface HandlerResult {
  readonly objects_sent: number;
  readonly bytes_read: number;
  readonly is_finished: boolean;
}

export type HandlerContext = Pick<Context, 'functionName' | 'getRemainingTimeInMillis'>;

export type ImportHandler = (event: ImportTriggerEvent, context: HandlerContext) => Promise<HandlerResult>;

export interface HandlerDependencies {
  readonly env: ImportEnv;
  /** Default: a pino logger at `env.logLevel`. */
  readonly logger?: Logger;
  /** Default: the S3 API with the runtime credentials. */
  readonly ranges?: RangeReader;
  /** Default: the Lambda API with the runtime credentials. */
  readonly invoke?: AsyncInvoker;
  /** Default: `BrazeTrackSender` configured from `env`. */
  readonly sender?: BatchSender;
  readonly checkpointStore?: CheckpointStore;
  /** Base delay between retries of a batch. Default: `5000`. */
  readonly retryDelayMs?: number;
  /** Time kept in reserve before the function timeout. Default: 3 minutes. */
  readonly timeReserveMs?: number;
}

/**
 * Build the Lambda handler. Clients are created once, when the module loads,
 * and shared by every invocation of the container.
 */
export function createHandler(deps: HandlerDependencies): ImportHandler {
  const { env } = deps;
  const logger = deps.logger ?? createLogger({ service: 'trackimport', level: env.logLevel });
  const ranges = deps.ranges ?? s3RangeReader(new S3Client({}));
  const invoke = deps.invoke ?? lambdaInvoker(new LambdaClient({}));
  const sender =
    deps.sender ??
    new BrazeTrackSender({ apiUrl: env.brazeApiUrl, apiKey: env.brazeApiKey, timeoutMs: env.requestTimeoutMs });

  return async (event, context) => {
    const target = parseTriggerEvent(event);
    const log = logger.child({ bucket: target.bucket, key: target.key });

    log.info(
      { byteOffset: target.byteOffset },
      `New Braze object import invocation. Starting at byte ${String(target.byteOffset)}`,
    );

    const engine = new ImportEngine({
      concurrency: env.threads,
      retryDelayMs: deps.retryDelayMs,
      checkpointStore: deps.checkpointStore,
      onHandlerError: (error, failedEvent) => {
        log.error({ err: error, eventType: failedEvent.type }, 'Event subscriber failed');
      },
    });
    attachLogger(engine, log);

    const result = await engine.run({
      source: new S3RangeSource(ranges, target.bucket, target.key),
      sender,
      guard: new TimeBudgetGuard(() => context.getRemainingTimeInMillis(), deps.timeReserveMs),
      startOffset: target.byteOffset,
      importId: `s3://${target.bucket}/${target.key}`,
      continuation: new LambdaContinuationTrigger(invoke, context.functionName, target.event),
    });

    log.info({ bytesRead: result.bytesRead }, `Processed ${formatBytes(result.bytesRead)} of the current file`);
    log.info({ objectsSent: result.objectsSent }, `Imported ${String(result.objectsSent)} objects`);

    return {
      objects_sent: result.objectsSent,
      bytes_read: result.bytesRead,
      is_finished: result.isFinished,
    };
  };
}
