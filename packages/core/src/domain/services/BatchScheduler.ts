import type { TrackObject } from '../model/TrackObject.js';
import type { DispatchRound, TrackBatch } from '../model/Batch.js';
import { createBatch } from '../model/Batch.js';

/**
 * Domain service that groups a stream of objects into fixed-size batches and
 * the batches into dispatch rounds.
 *
 * Pure logic, no I/O. A round is yielded as soon as its last batch fills, before
 * another object is pulled from the source, so the consumer can dispatch it and
 * stop without leaving objects read but unsent. At most one round is held in
 * memory.
 */
export class BatchScheduler {
  constructor(
    private readonly batchSize: number,
    private readonly roundWidth: number,
  ) {
    if (batchSize < 1) {
      throw new Error('Batch size must be at least 1');
    }
    if (roundWidth < 1) {
      throw new Error('Round width must be at least 1');
    }
  }

  /**
   * Split a stream of objects into rounds of up to `roundWidth` batches.
   *
   * Every round but the last holds exactly `roundWidth` full batches. The last
   * round is flagged `final` once the source is exhausted; it may hold a partial
   * batch, or no batch at all.
   */
  async *rounds(objects: AsyncIterable<TrackObject>): AsyncGenerator<DispatchRound, void, undefined> {
    let buffer: TrackObject[] = [];
    let batches: TrackBatch[] = [];
    let batchIndex = 0;
    let roundIndex = 0;

    for await (const object of objects) {
      buffer.push(object);

      if (buffer.length >= this.batchSize) {
        batches.push(createBatch(batchIndex, buffer));
        buffer = [];
        batchIndex++;
      }

      if (batches.length >= this.roundWidth) {
        yield { index: roundIndex, batches, final: false };
        batches = [];
        roundIndex++;
      }
    }

    if (buffer.length > 0) {
      batches.push(createBatch(batchIndex, buffer));
    }

    yield { index: roundIndex, batches, final: true };
  }
}
