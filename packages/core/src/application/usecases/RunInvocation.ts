import type { ByteSource } from '../../domain/ports/ByteSource.js';
import type { BatchSender } from '../../domain/ports/BatchSender.js';
import type { ContinuationTrigger } from '../../domain/ports/ContinuationTrigger.js';
import type { InvocationResult } from '../../domain/model/InvocationResult.js';
import { ImportStatus } from '../../domain/model/ImportCheckpoint.js';
import { ObjectExtractor } from '../../domain/services/ObjectExtractor.js';
import { BatchScheduler } from '../../domain/services/BatchScheduler.js';
import { ProgressTracker } from '../../domain/services/ProgressTracker.js';
import type { TimeBudgetGuard } from '../../domain/services/TimeBudgetGuard.js';
import { CheckpointRecorder } from '../CheckpointRecorder.js';
import type { ImportContext } from '../ImportContext.js';
import { SendRound } from './SendRound.js';

/** Everything one bounded-time invocation works with. */
export interface InvocationRequest {
  readonly source: ByteSource;
  readonly sender: BatchSender;
  readonly guard: TimeBudgetGuard;
  /** Confirmed offset handed over by the previous invocation. Default: `0`. */
  readonly startOffset?: number;
  /** Identifier of the import chain. Default: the source name. */
  readonly importId?: string;
  /** Scheduler of the next invocation. Without one, an unfinished result is only returned. */
  readonly continuation?: ContinuationTrigger;
}

/**
 * Use case: process the source from `startOffset` until it is exhausted or the
 * time budget runs low.
 *
 * Rounds are pulled one at a time: the extractor is suspended while a round is
 * in flight, and the resume offset only moves once the whole round has been
 * accepted. A failed round leaves the offset where the previous round put it.
 */
export class RunInvocation {
  constructor(private readonly ctx: ImportContext) {}

  async execute(request: InvocationRequest): Promise<InvocationResult> {
    const startOffset = request.startOffset ?? 0;
    const importId = request.importId ?? request.source.metadata().name;
    const totalBytes = await request.source.size();

    const tracker = new ProgressTracker(startOffset, totalBytes);
    const recorder = await CheckpointRecorder.open(this.ctx.checkpointStore, importId, startOffset);
    const sendRound = new SendRound(this.ctx, request.sender, importId);

    this.ctx.eventBus.emit({
      type: 'import:started',
      importId,
      startOffset,
      totalBytes,
      timestamp: Date.now(),
    });
    await recorder.record(ImportStatus.RUNNING, tracker);

    try {
      const extractor = new ObjectExtractor({ startOffset });
      const scheduler = new BatchScheduler(this.ctx.batchSize, this.ctx.concurrency);

      for await (const round of scheduler.rounds(extractor.extract(request.source.read(startOffset)))) {
        const sent = await sendRound.execute(round);
        tracker.recordSent(sent);
        tracker.advance(extractor.takeConfirmedBytes());

        this.ctx.eventBus.emit({
          type: 'progress:advanced',
          importId,
          confirmedOffset: tracker.confirmedOffset,
          totalBytes,
          objectsSent: tracker.objectsSent,
          timestamp: Date.now(),
        });
        await recorder.record(ImportStatus.RUNNING, tracker);

        if (!round.final && request.guard.shouldStop()) {
          this.ctx.eventBus.emit({
            type: 'budget:exhausted',
            importId,
            remainingMs: request.guard.remainingMs(),
            confirmedOffset: tracker.confirmedOffset,
            timestamp: Date.now(),
          });
          break;
        }
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.ctx.eventBus.emit({
        type: 'import:failed',
        importId,
        error: message,
        confirmedOffset: tracker.confirmedOffset,
        timestamp: Date.now(),
      });
      await recorder.record(ImportStatus.FAILED, tracker, message);
      throw error;
    }

    const result: InvocationResult = {
      objectsSent: tracker.objectsSent,
      bytesRead: tracker.confirmedOffset,
      isFinished: tracker.isFinished(),
    };

    if (result.isFinished) {
      if (tracker.isStalled()) {
        this.ctx.eventBus.emit({
          type: 'import:stalled',
          importId,
          confirmedOffset: tracker.confirmedOffset,
          totalBytes,
          timestamp: Date.now(),
        });
      }
      await recorder.record(ImportStatus.COMPLETED, tracker);
      this.ctx.eventBus.emit({
        type: 'import:completed',
        importId,
        objectsSent: result.objectsSent,
        bytesRead: result.bytesRead,
        timestamp: Date.now(),
      });
      return result;
    }

    await recorder.record(ImportStatus.CONTINUING, tracker);
    if (request.continuation) {
      await request.continuation.trigger({ importId, byteOffset: result.bytesRead });
      this.ctx.eventBus.emit({
        type: 'import:continued',
        importId,
        byteOffset: result.bytesRead,
        timestamp: Date.now(),
      });
    }

    return result;
  }
}
