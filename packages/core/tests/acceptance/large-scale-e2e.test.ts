import { describe, it, expect } from 'vitest';
import { ImportEngine } from '../../src/ImportEngine.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { TimeBudgetGuard } from '../../src/domain/services/TimeBudgetGuard.js';
import { partitionBatch } from '../../src/domain/model/TrackObject.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { buildTrackObjects, FakeSender, toJsonArray } from '../helpers/fixtures.js';

describe('End-to-end import', () => {
  it('should send 200 objects in three calls over two rounds', async () => {
    const text = toJsonArray(buildTrackObjects(200));
    const engine = new ImportEngine({ batchSize: 75, concurrency: 2, retryDelayMs: 0 });
    const sender = new FakeSender();
    const events: DomainEvent[] = [];
    engine.onAny((e) => events.push(e));

    const result = await engine.run({ source: new BufferSource(text), sender, guard: TimeBudgetGuard.unbounded() });

    expect(result).toEqual({ objectsSent: 200, bytesRead: text.length, isFinished: true });
    expect(sender.calls.map((b) => b.objects.length)).toEqual([75, 75, 50]);
    expect(sender.sentIds()).toEqual(Array.from({ length: 200 }, (_, i) => i));
    expect(events.map((e) => e.type)).toEqual([
      'import:started',
      'round:started',
      'round:completed',
      'progress:advanced',
      'round:started',
      'round:completed',
      'progress:advanced',
      'import:completed',
    ]);
  });

  it('should import a single-line array and stop each round right after its last object', async () => {
    const objects = buildTrackObjects(200);
    const text = JSON.stringify(objects);
    const engine = new ImportEngine({ batchSize: 75, concurrency: 2, retryDelayMs: 0 });
    const sender = new FakeSender();
    const offsets: number[] = [];
    engine.on('progress:advanced', (e) => offsets.push(e.confirmedOffset));

    const result = await engine.run({ source: new BufferSource(text), sender, guard: TimeBudgetGuard.unbounded() });

    expect(result).toEqual({ objectsSent: 200, bytesRead: text.length, isFinished: true });
    expect(sender.calls.map((b) => b.objects.length)).toEqual([75, 75, 50]);
    expect(sender.sentIds()).toEqual(objects.map((o) => o['id']));
    // `[` plus the first 150 objects and the commas between them.
    expect(offsets).toEqual([JSON.stringify(objects.slice(0, 150)).length - 1, text.length]);
  });

  it('should give the sender batches that split into events and purchases', async () => {
    const text = toJsonArray(buildTrackObjects(8));
    const sender = new FakeSender();

    await new ImportEngine().run({ source: new BufferSource(text), sender, guard: TimeBudgetGuard.unbounded() });

    const [batch] = sender.calls;
    const { events, purchases } = partitionBatch(batch?.objects ?? []);
    expect(events.map((o) => o['id'])).toEqual([0, 1, 2, 4, 5, 6]);
    expect(purchases.map((o) => o['id'])).toEqual([3, 7]);
  });

  it('should process a large file read in small chunks', async () => {
    const objects = buildTrackObjects(1500);
    const text = toJsonArray(objects);
    const engine = new ImportEngine({ retryDelayMs: 0 });
    const sender = new FakeSender();

    const result = await engine.run({
      source: new BufferSource(text, { chunkSize: 333 }),
      sender,
      guard: TimeBudgetGuard.unbounded(),
    });

    expect(result).toEqual({ objectsSent: 1500, bytesRead: text.length, isFinished: true });
    expect(sender.calls).toHaveLength(20);
    expect(sender.sentIds()).toEqual(objects.map((o) => o['id']));
  });

  it('should count what the remote API reports, and surface partial errors', async () => {
    const text = toJsonArray(buildTrackObjects(10));
    const engine = new ImportEngine({ retryDelayMs: 0 });
    const partial: unknown[][] = [];
    engine.on('batch:partial', (e) => partial.push([...e.errors]));
    const sender = new FakeSender((batch) => ({
      processed: batch.objects.length - 1,
      errors: [{ type: "'external_id' is required", input_array: 'events', index: 0 }],
    }));

    const result = await engine.run({ source: new BufferSource(text), sender, guard: TimeBudgetGuard.unbounded() });

    expect(result.objectsSent).toBe(9);
    expect(partial).toEqual([[{ type: "'external_id' is required", input_array: 'events', index: 0 }]]);
  });
});
