import type { BatchSender, SendReceipt, TrackBatch } from '@trackimport/core';
import { partitionBatch, RetryableDispatchError } from '@trackimport/core';
import { interpretTrackResponse } from './TrackResponse.js';

export interface BrazeTrackSenderOptions {
  /** REST endpoint of the Braze instance, e.g. `https://rest.iad-01.braze.com`. */
  readonly apiUrl: string;
  /** REST API key with the `users.track` permission. */
  readonly apiKey: string;
  /** Request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeoutMs?: number;
}

/**
 * Sends each batch to `POST /users/track` as a single bulk request, events and
 * purchases in their own lists.
 *
 * One attempt per call: connection failures and timeouts surface as
 * `RetryableDispatchError`, responses are classified by `interpretTrackResponse`.
 * Requires a runtime with global `fetch` (Node.js >= 18).
 */
export class BrazeTrackSender implements BatchSender {
  private readonly endpoint: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeoutMs: number;

  constructor(options: BrazeTrackSenderOptions) {
    this.endpoint = `${options.apiUrl.replace(/\/+$/, '')}/users/track`;
    this.headers = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${options.apiKey}`,
      'X-Braze-Bulk': 'true',
    };
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async send(batch: TrackBatch): Promise<SendReceipt> {
    if (batch.objects.length === 0) return { processed: 0 };

    const { events, purchases } = partitionBatch(batch.objects);
    const payload = {
      ...(events.length > 0 ? { events } : {}),
      ...(purchases.length > 0 ? { purchases } : {}),
    };

    const { status, text } = await this.postWithTimeout(JSON.stringify(payload), batch.index);
    return interpretTrackResponse(status, text, batch.index);
  }

  private async postWithTimeout(body: string, batchIndex: number): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body,
        signal: controller.signal,
      });
      return { status: response.status, text: await response.text() };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${String(this.timeoutMs)}ms`
        : `failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new RetryableDispatchError(`Request to ${this.endpoint} ${reason}`, { batchIndex, cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
