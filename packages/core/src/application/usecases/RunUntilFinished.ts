import type { ByteSource } from '../../domain/ports/ByteSource.js';
import type { BatchSender } from '../../domain/ports/BatchSender.js';
import type { ContinuationRequest, ContinuationTrigger } from '../../domain/ports/ContinuationTrigger.js';
import type { ImportRunSummary } from '../../domain/model/InvocationResult.js';
import { TimeBudgetGuard } from '../../domain/services/TimeBudgetGuard.js';
import type { ImportContext } from '../ImportContext.js';
import { RunInvocation } from './RunInvocation.js';

export interface RunUntilFinishedRequest {
  readonly source: ByteSource;
  readonly sender: BatchSender;
  readonly startOffset?: number;
  readonly importId?: string;
  /** Builds the time budget of each invocation. Default: an unbounded budget. */
  readonly createGuard?: () => TimeBudgetGuard;
  /** Upper bound on the number of invocations. Default: unlimited. */
  readonly maxInvocations?: number;
}

/** Continuation that queues the next offset for the local loop instead of scheduling a remote call. */
class QueuedContinuation implements ContinuationTrigger {
  private next: ContinuationRequest | null = null;

  trigger(request: ContinuationRequest): Promise<void> {
    this.next = request;
    return Promise.resolve();
  }

  take(): ContinuationRequest | null {
    const next = this.next;
    this.next = null;
    return next;
  }
}

/**
 * Use case: drive invocations one after another in the current process until one
 * of them reports a finished result.
 */
export class RunUntilFinished {
  constructor(private readonly ctx: ImportContext) {}

  async execute(request: RunUntilFinishedRequest): Promise<ImportRunSummary> {
    const createGuard = request.createGuard ?? (() => TimeBudgetGuard.unbounded());
    const maxInvocations = request.maxInvocations ?? Number.POSITIVE_INFINITY;
    const importId = request.importId ?? request.source.metadata().name;
    const continuation = new QueuedContinuation();
    const invocation = new RunInvocation(this.ctx);

    let offset = request.startOffset ?? 0;
    let invocations = 0;
    let objectsSent = 0;

    for (;;) {
      if (invocations >= maxInvocations) {
        throw new Error(
          `Import ${importId} not finished after ${String(invocations)} invocations (offset ${String(offset)})`,
        );
      }

      const result = await invocation.execute({
        source: request.source,
        sender: request.sender,
        guard: createGuard(),
        startOffset: offset,
        importId,
        continuation,
      });
      invocations++;
      objectsSent += result.objectsSent;

      const next = continuation.take();
      if (result.isFinished || !next) {
        return { importId, invocations, objectsSent, bytesRead: result.bytesRead };
      }
      offset = next.byteOffset;
    }
  }
}
