import type { TrackObject } from '../../src/domain/model/TrackObject.js';
import type { TrackBatch } from '../../src/domain/model/Batch.js';
import type { BatchSender, SendReceipt } from '../../src/domain/ports/BatchSender.js';
import type { ContinuationRequest, ContinuationTrigger } from '../../src/domain/ports/ContinuationTrigger.js';

/** Every fourth object is a purchase, the others are custom events. */
export function buildTrackObjects(count: number): TrackObject[] {
  return Array.from({ length: count }, (_, id) =>
    id % 4 === 3
      ? { id, external_id: `user-${String(id)}`, product_id: 'sku-1', currency: 'USD', price: 9.99 }
      : { id, external_id: `user-${String(id)}`, name: 'app_open', time: '2024-01-01T00:00:00Z' },
  );
}

/** Pretty-printed JSON array, the layout of a typical export file. */
export function toJsonArray(objects: readonly TrackObject[]): string {
  return JSON.stringify(objects, null, 2);
}

/** Yield the UTF-8 bytes of `text` in chunks of `size` bytes. */
export async function* chunked(text: string | Uint8Array, size: number): AsyncGenerator<Uint8Array> {
  const bytes = typeof text === 'string' ? Buffer.from(text, 'utf-8') : text;
  for (let start = 0; start < bytes.length; start += size) {
    await Promise.resolve();
    yield bytes.subarray(start, start + size);
  }
}

type Responder = (batch: TrackBatch, call: number) => SendReceipt | Promise<SendReceipt>;

/** Batch sender that records every call and accepts everything unless told otherwise. */
export class FakeSender implements BatchSender {
  readonly calls: TrackBatch[] = [];

  constructor(private readonly respond: Responder = (batch) => ({ processed: batch.objects.length })) {}

  async send(batch: TrackBatch): Promise<SendReceipt> {
    this.calls.push(batch);
    return await this.respond(batch, this.calls.length);
  }

  sentIds(): unknown[] {
    return this.calls.flatMap((batch) => batch.objects.map((object) => object['id']));
  }
}

/** Continuation that only records the requests it receives. */
export class RecordingContinuation implements ContinuationTrigger {
  readonly requests: ContinuationRequest[] = [];

  trigger(request: ContinuationRequest): Promise<void> {
    this.requests.push(request);
    return Promise.resolve();
  }
}
