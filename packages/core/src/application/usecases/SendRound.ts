import type { DispatchRound, TrackBatch } from '../../domain/model/Batch.js';
import { countRoundObjects } from '../../domain/model/Batch.js';
import type { BatchSender } from '../../domain/ports/BatchSender.js';
import { RetryableDispatchError } from '../../domain/errors/DispatchError.js';
import type { ImportContext } from '../ImportContext.js';

type BatchOutcome = { readonly ok: true; readonly sent: number } | { readonly ok: false; readonly error: unknown };

/**
 * Use case: send every batch of a round through a bounded worker pool.
 *
 * Each batch retries transient failures on its own. The round waits for all of
 * its batches to settle, then either returns the sum of the processed counts or
 * rethrows the failure of the lowest-indexed failed batch. Counts of batches that
 * succeeded alongside a failure are dropped: the whole round is re-read by the
 * next invocation.
 */
export class SendRound {
  constructor(
    private readonly ctx: ImportContext,
    private readonly sender: BatchSender,
    private readonly importId: string,
  ) {}

  async execute(round: DispatchRound): Promise<number> {
    if (round.batches.length === 0) return 0;

    this.ctx.eventBus.emit({
      type: 'round:started',
      importId: this.importId,
      roundIndex: round.index,
      batchCount: round.batches.length,
      objectCount: countRoundObjects(round),
      timestamp: Date.now(),
    });

    const outcomes = await this.sendAll(round.batches);

    let sent = 0;
    for (const outcome of outcomes) {
      if (!outcome.ok) throw outcome.error;
      sent += outcome.sent;
    }

    this.ctx.eventBus.emit({
      type: 'round:completed',
      importId: this.importId,
      roundIndex: round.index,
      objectsSent: sent,
      final: round.final,
      timestamp: Date.now(),
    });

    return sent;
  }

  private async sendAll(batches: readonly TrackBatch[]): Promise<readonly BatchOutcome[]> {
    const outcomes: BatchOutcome[] = [];
    const active = new Set<Promise<void>>();

    for (const [position, batch] of batches.entries()) {
      while (active.size >= this.ctx.concurrency) {
        await Promise.race(active);
      }

      const task: Promise<void> = this.sendWithRetry(batch)
        .then(
          (sent) => {
            outcomes[position] = { ok: true, sent };
          },
          (error: unknown) => {
            outcomes[position] = { ok: false, error };
          },
        )
        .then(() => {
          active.delete(task);
        });
      active.add(task);
    }

    await Promise.all([...active]);
    return outcomes;
  }

  private async sendWithRetry(batch: TrackBatch): Promise<number> {
    if (batch.objects.length === 0) return 0;

    const maxAttempts = this.ctx.maxAttempts;

    for (let attempt = 1; ; attempt++) {
      try {
        const receipt = await this.sender.send(batch);

        if (receipt.errors !== undefined) {
          this.ctx.eventBus.emit({
            type: 'batch:partial',
            importId: this.importId,
            batchIndex: batch.index,
            processed: receipt.processed,
            errors: receipt.errors,
            timestamp: Date.now(),
          });
        }

        return receipt.processed;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        const retryable = error instanceof RetryableDispatchError;

        if (!retryable || attempt >= maxAttempts) {
          this.ctx.eventBus.emit({
            type: 'batch:failed',
            importId: this.importId,
            batchIndex: batch.index,
            attempts: attempt,
            retryable,
            error: message,
            timestamp: Date.now(),
          });
          throw error;
        }

        const delayMs = this.ctx.retryDelayMs * Math.pow(2, attempt - 1);
        this.ctx.eventBus.emit({
          type: 'batch:retried',
          importId: this.importId,
          batchIndex: batch.index,
          attempt,
          maxAttempts,
          delayMs,
          error: message,
          timestamp: Date.now(),
        });

        await this.sleep(delayMs);
      }
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
