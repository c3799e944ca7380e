import { describe, it, expect } from 'vitest';
import { BatchScheduler } from '../../../../src/domain/services/BatchScheduler.js';
import type { DispatchRound } from '../../../../src/domain/model/Batch.js';
import type { TrackObject } from '../../../../src/domain/model/TrackObject.js';
import { buildTrackObjects } from '../../../helpers/fixtures.js';

async function* stream(objects: readonly TrackObject[]): AsyncGenerator<TrackObject> {
  for (const object of objects) {
    await Promise.resolve();
    yield object;
  }
}

async function collectRounds(scheduler: BatchScheduler, count: number): Promise<DispatchRound[]> {
  const rounds: DispatchRound[] = [];
  for await (const round of scheduler.rounds(stream(buildTrackObjects(count)))) {
    rounds.push(round);
  }
  return rounds;
}

function shape(rounds: readonly DispatchRound[]): { final: boolean; sizes: number[] }[] {
  return rounds.map((round) => ({ final: round.final, sizes: round.batches.map((b) => b.objects.length) }));
}

describe('BatchScheduler', () => {
  it('should group 200 objects into a full round and a partial final round', async () => {
    const rounds = await collectRounds(new BatchScheduler(75, 2), 200);

    expect(shape(rounds)).toEqual([
      { final: false, sizes: [75, 75] },
      { final: true, sizes: [50] },
    ]);
    expect(rounds.map((r) => r.index)).toEqual([0, 1]);
    expect(rounds.flatMap((r) => r.batches.map((b) => b.index))).toEqual([0, 1, 2]);
  });

  it('should yield an empty final round when the last round is exactly full', async () => {
    const rounds = await collectRounds(new BatchScheduler(75, 2), 150);

    expect(shape(rounds)).toEqual([
      { final: false, sizes: [75, 75] },
      { final: true, sizes: [] },
    ]);
  });

  it('should yield a single empty final round for an empty stream', async () => {
    const rounds = await collectRounds(new BatchScheduler(75, 15), 0);
    expect(shape(rounds)).toEqual([{ final: true, sizes: [] }]);
  });

  it('should keep objects in source order across batches', async () => {
    const rounds = await collectRounds(new BatchScheduler(3, 2), 10);
    const ids = rounds.flatMap((r) => r.batches.flatMap((b) => b.objects.map((o) => o['id'])));

    expect(ids).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(shape(rounds)).toEqual([
      { final: false, sizes: [3, 3] },
      { final: true, sizes: [3, 1] },
    ]);
  });

  it('should not pull another object before the yielded round is consumed', async () => {
    let pulled = 0;
    async function* counting(): AsyncGenerator<TrackObject> {
      for (const object of buildTrackObjects(10)) {
        pulled++;
        await Promise.resolve();
        yield object;
      }
    }

    const rounds = new BatchScheduler(2, 2).rounds(counting());
    const first = await rounds.next();

    expect(first.done).toBe(false);
    expect(pulled).toBe(4);
    await rounds.return(undefined);
  });

  it('should reject sizes below 1', () => {
    expect(() => new BatchScheduler(0, 1)).toThrow('Batch size must be at least 1');
    expect(() => new BatchScheduler(1, 0)).toThrow('Round width must be at least 1');
  });
});
