import type { SendReceipt } from '@trackimport/core';
import { FatalDispatchError, RetryableDispatchError } from '@trackimport/core';

type ResponseBody = Readonly<Record<string, unknown>>;

function parseBody(text: string): ResponseBody {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return {};
  }
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function count(body: ResponseBody, key: string): number {
  const value = body[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Classify a `/users/track` response.
 *
 * | status            | outcome                                                |
 * |-------------------|--------------------------------------------------------|
 * | 400               | `FatalDispatchError`, message is the response text     |
 * | 429, 5xx          | `RetryableDispatchError`                               |
 * | other 4xx         | `FatalDispatchError` with the server `message`         |
 * | anything else     | receipt counting `events_processed + purchases_processed` |
 *
 * A `201` carrying an `errors` list is still a success; the list travels in the
 * receipt. A body that is not JSON counts as nothing processed.
 */
export function interpretTrackResponse(status: number, text: string, batchIndex?: number): SendReceipt {
  const body = parseBody(text);

  if (status === 400) {
    throw new FatalDispatchError(text.length > 0 ? text : 'Bad request (HTTP 400)', { status, batchIndex });
  }

  if (status === 429 || status >= 500) {
    throw new RetryableDispatchError(`Server error: HTTP ${String(status)}`, { status, batchIndex });
  }

  if (status > 400) {
    const message = body['message'];
    throw new FatalDispatchError(
      typeof message === 'string' ? message : text.length > 0 ? text : `HTTP ${String(status)}`,
      { status, batchIndex },
    );
  }

  const processed = count(body, 'events_processed') + count(body, 'purchases_processed');
  const errors = body['errors'];

  if (status === 201 && Array.isArray(errors)) {
    const reported: readonly unknown[] = errors;
    return { processed, errors: reported };
  }

  return { processed };
}
