import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { TrackBatch } from '@trackimport/core';
import { FatalDispatchError, RetryableDispatchError } from '@trackimport/core';
import { BrazeTrackSender } from '../../src/BrazeTrackSender.js';

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  mockFetch.mockReset();
  vi.unstubAllGlobals();
});

function respondWith(status: number, body: unknown): void {
  mockFetch.mockImplementation(() =>
    Promise.resolve(new Response(typeof body === 'string' ? body : JSON.stringify(body), { status })),
  );
}

function requestBody(call = 0): unknown {
  const init = mockFetch.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

const event = { external_id: 'user-1', name: 'app_open', time: '2024-01-01T00:00:00Z' };
const purchase = { external_id: 'user-2', product_id: 'sku-1', currency: 'USD', price: 9.99, time: '2024-01-01T00:00:00Z' };

function batchOf(...objects: TrackBatch['objects']): TrackBatch {
  return { index: 3, objects };
}

const sender = new BrazeTrackSender({ apiUrl: 'https://rest.example.braze.com/', apiKey: 'test-secret' });

describe('BrazeTrackSender', () => {
  it('should post the batch to the bulk track endpoint', async () => {
    respondWith(201, { message: 'success', events_processed: 1, purchases_processed: 1 });

    const receipt = await sender.send(batchOf(event, purchase));

    expect(receipt).toEqual({ processed: 2 });
    expect(mockFetch).toHaveBeenCalledOnce();
    expect(mockFetch).toHaveBeenCalledWith(
      'https://rest.example.braze.com/users/track',
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-secret',
          'X-Braze-Bulk': 'true',
        },
      }),
    );
    expect(requestBody()).toEqual({ events: [event], purchases: [purchase] });
  });

  it('should omit an empty list from the payload', async () => {
    respondWith(201, { message: 'success', events_processed: 1 });

    await sender.send(batchOf(event));

    expect(requestBody()).toEqual({ events: [event] });
  });

  it('should not call the API for an empty batch', async () => {
    expect(await sender.send(batchOf())).toEqual({ processed: 0 });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should pass per-record errors through', async () => {
    const errors = [{ type: "'time' is required", input_array: 'events', index: 0 }];
    respondWith(201, { message: 'success', events_processed: 0, errors });

    expect(await sender.send(batchOf(event))).toEqual({ processed: 0, errors });
  });

  it('should reject with a retryable error on 503', async () => {
    respondWith(503, 'Service Unavailable');

    const result = sender.send(batchOf(event));

    await expect(result).rejects.toThrow(RetryableDispatchError);
    await expect(result).rejects.toMatchObject({ status: 503, batchIndex: 3 });
  });

  it('should reject with a fatal error on 401', async () => {
    respondWith(401, { message: 'Invalid API key' });

    await expect(sender.send(batchOf(event))).rejects.toThrow(FatalDispatchError);
  });

  it('should turn a network failure into a retryable error', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    const result = sender.send(batchOf(event));

    await expect(result).rejects.toThrow(RetryableDispatchError);
    await expect(result).rejects.toThrow('Request to https://rest.example.braze.com/users/track failed: fetch failed');
  });

  it('should abort a request that exceeds the timeout', async () => {
    mockFetch.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(new Error('This operation was aborted'));
          });
        }),
    );
    const impatient = new BrazeTrackSender({
      apiUrl: 'https://rest.example.braze.com',
      apiKey: 'test-secret',
      timeoutMs: 10,
    });

    await expect(impatient.send(batchOf(event))).rejects.toThrow(
      'Request to https://rest.example.braze.com/users/track timed out after 10ms',
    );
  });
});
