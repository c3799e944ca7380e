import type { S3Event } from 'aws-lambda';

/** S3 notification, optionally carrying the offset handed over by a previous invocation. */
export type ImportTriggerEvent = S3Event & { readonly byte_offset?: number };

/** Where an invocation reads from. */
export interface ImportTarget {
  readonly bucket: string;
  /** Object key, URL-decoded. */
  readonly key: string;
  readonly byteOffset: number;
  /** The event as received, forwarded to the next invocation. */
  readonly event: Readonly<Record<string, unknown>>;
}

/** The invocation payload is not an S3 notification this function can process. */
export class InvalidTriggerEventError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = 'InvalidTriggerEventError';
  }
}

type Json = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, path: readonly string[]): unknown {
  let current = value;
  for (const segment of path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function decodeKey(raw: string): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch (error) {
    throw new InvalidTriggerEventError(`Object key is not a valid URL-encoded string: ${raw}`, { cause: error });
  }
}

/**
 * Extract the bucket, key and resume offset of the first record of an S3 event.
 *
 * @throws InvalidTriggerEventError
 */
export function parseTriggerEvent(event: unknown): ImportTarget {
  if (!isRecord(event)) {
    throw new InvalidTriggerEventError('Trigger event must be an object');
  }

  const records = event['Records'];
  const first: unknown = Array.isArray(records) ? records[0] : undefined;
  const bucket = field(first, ['s3', 'bucket', 'name']);
  const key = field(first, ['s3', 'object', 'key']);

  if (typeof bucket !== 'string' || bucket.length === 0) {
    throw new InvalidTriggerEventError('Trigger event has no Records[0].s3.bucket.name');
  }
  if (typeof key !== 'string' || key.length === 0) {
    throw new InvalidTriggerEventError('Trigger event has no Records[0].s3.object.key');
  }

  const byteOffset = event['byte_offset'] ?? 0;
  if (typeof byteOffset !== 'number' || !Number.isInteger(byteOffset) || byteOffset < 0) {
    throw new InvalidTriggerEventError(`byte_offset must be a non-negative integer, got ${JSON.stringify(byteOffset)}`);
  }

  return { bucket, key: decodeKey(key), byteOffset, event };
}
