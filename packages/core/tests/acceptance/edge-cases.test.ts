import { describe, it, expect, vi } from 'vitest';
import { ImportEngine } from '../../src/ImportEngine.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { TimeBudgetGuard } from '../../src/domain/services/TimeBudgetGuard.js';
import { MalformedSourceError } from '../../src/domain/errors/MalformedSourceError.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import { FakeSender } from '../helpers/fixtures.js';

function run(engine: ImportEngine, text: string, sender = new FakeSender()) {
  return engine.run({ source: new BufferSource(text), sender, guard: TimeBudgetGuard.unbounded() });
}

describe('Edge cases', () => {
  it('should finish an empty source without calling the sender', async () => {
    const sender = new FakeSender();
    const events: DomainEvent[] = [];
    const engine = new ImportEngine().onAny((e) => events.push(e));

    expect(await run(engine, '', sender)).toEqual({ objectsSent: 0, bytesRead: 0, isFinished: true });
    expect(sender.calls).toHaveLength(0);
    expect(events.map((e) => e.type)).toEqual(['import:started', 'progress:advanced', 'import:completed']);
  });

  it('should finish an empty array without calling the sender', async () => {
    const sender = new FakeSender();
    expect(await run(new ImportEngine(), '[\n]\n', sender)).toEqual({ objectsSent: 0, bytesRead: 4, isFinished: true });
    expect(sender.calls).toHaveLength(0);
  });

  it('should accept a compact single-line array', async () => {
    const text = '[{"external_id":"a","name":"x"},{"external_id":"b","price":1,"currency":"EUR","product_id":"p"}]';
    expect(await run(new ImportEngine(), text)).toEqual({ objectsSent: 2, bytesRead: text.length, isFinished: true });
  });

  it('should abort on a malformed source', async () => {
    const failed = vi.fn();
    const engine = new ImportEngine().on('import:failed', failed);

    await expect(run(engine, '[{"a":1},"oops"]')).rejects.toThrow(MalformedSourceError);
    expect(failed).toHaveBeenCalledOnce();
  });

  it('should use the given import id instead of the source name', async () => {
    const events: DomainEvent[] = [];
    const engine = new ImportEngine().onAny((e) => events.push(e));

    await engine.run({
      source: new BufferSource('[]'),
      sender: new FakeSender(),
      guard: TimeBudgetGuard.unbounded(),
      importId: 'import-42',
    });

    expect(new Set(events.map((e) => e.importId))).toEqual(new Set(['import-42']));
  });

  it('should keep importing when a subscriber throws', async () => {
    const reporter = vi.fn();
    const engine = new ImportEngine({ onHandlerError: reporter }).on('round:completed', () => {
      throw new Error('subscriber failed');
    });

    const result = await run(engine, '[{"a":1}]');

    expect(result.objectsSent).toBe(1);
    expect(reporter).toHaveBeenCalledOnce();
  });

  it('should reject invalid settings', () => {
    expect(() => new ImportEngine({ batchSize: 0 })).toThrow('batchSize must be a positive integer, got 0');
    expect(() => new ImportEngine({ concurrency: 1.5 })).toThrow('concurrency must be a positive integer, got 1.5');
    expect(() => new ImportEngine({ retryDelayMs: -1 })).toThrow('retryDelayMs must not be negative, got -1');
  });
});
