import type { TrackObject } from '../model/TrackObject.js';
import { isTrackObject } from '../model/TrackObject.js';
import { MalformedSourceError } from '../errors/MalformedSourceError.js';

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const COMMA = 0x2c;

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

export interface ObjectExtractorOptions {
  /**
   * Absolute offset of the first byte the stream delivers. A non-zero offset
   * means the read resumes inside the enclosing array. Default: `0`.
   */
  readonly startOffset?: number;
}

/**
 * Incremental extractor of whole JSON objects from an arbitrarily chunked byte
 * stream.
 *
 * Element boundaries are found with a tokenizer over raw bytes that tracks
 * string and escape state, so braces inside string values are ignored and a
 * multi-byte character split between two chunks is decoded only once the
 * element is complete.
 *
 * Alongside the objects, the extractor counts *confirmed* bytes: bytes that
 * belong to elements already emitted or to the structural content between them
 * (whitespace, commas, the enclosing `[` and `]`). Bytes of an element still
 * being assembled stay pending. Re-reading the source from the previous resume
 * point plus the confirmed count therefore never re-emits nor skips an object.
 *
 * @example
 * ```typescript
 * const extractor = new ObjectExtractor({ startOffset: cursor });
 * for await (const object of extractor.extract(source.read(cursor))) {
 *   send(object);
 *   cursor += extractor.takeConfirmedBytes();
 * }
 * ```
 */
export class ObjectExtractor {
  private readonly startOffset: number;
  private confirmedBytes = 0;
  private consumed = false;

  constructor(options?: ObjectExtractorOptions) {
    this.startOffset = options?.startOffset ?? 0;
  }

  /** Return the bytes confirmed since the previous call and reset the counter. */
  takeConfirmedBytes(): number {
    const confirmed = this.confirmedBytes;
    this.confirmedBytes = 0;
    return confirmed;
  }

  /**
   * Lazily yield every object of the stream in source order.
   *
   * A stream that ends inside an element drops that element: its bytes are
   * never confirmed, so they are the first bytes the next read fetches.
   *
   * @throws MalformedSourceError when the bytes are not an array (or sequence)
   *   of JSON objects.
   */
  async *extract(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<TrackObject, void, undefined> {
    if (this.consumed) {
      throw new Error('ObjectExtractor: the stream has already been consumed. Create one extractor per read.');
    }
    this.consumed = true;

    let arrayOpen = this.startOffset > 0;
    let depth = 0;
    let inString = false;
    let escaped = false;
    let parts: Uint8Array[] = [];
    let pendingBytes = 0;
    let position = this.startOffset;

    for await (const chunk of chunks) {
      let elementStart = depth > 0 ? 0 : -1;

      for (let i = 0; i < chunk.length; i++) {
        const byte = chunk[i];
        if (byte === undefined) break;
        if (depth === 0) {
          if (byte === OPEN_BRACE || (byte === OPEN_BRACKET && arrayOpen)) {
            depth = 1;
            elementStart = i;
          } else if (byte === OPEN_BRACKET) {
            arrayOpen = true;
            this.confirmedBytes++;
          } else if (byte === CLOSE_BRACKET && arrayOpen) {
            arrayOpen = false;
            this.confirmedBytes++;
          } else if (byte === COMMA || isWhitespace(byte)) {
            this.confirmedBytes++;
          } else {
            const offset = position + i;
            throw new MalformedSourceError(
              `Unexpected character '${String.fromCharCode(byte)}' between elements at byte ${String(offset)}`,
              offset,
            );
          }
          continue;
        }

        if (inString) {
          if (escaped) {
            escaped = false;
          } else if (byte === BACKSLASH) {
            escaped = true;
          } else if (byte === QUOTE) {
            inString = false;
          }
          continue;
        }

        if (byte === QUOTE) {
          inString = true;
        } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
          depth++;
        } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
          depth--;
          if (depth === 0) {
            parts.push(chunk.subarray(elementStart, i + 1));
            const elementLength = pendingBytes + (i + 1 - elementStart);
            const objects = this.decode(parts, position + i + 1 - elementLength);
            parts = [];
            pendingBytes = 0;
            elementStart = -1;
            yield* this.emit(objects, elementLength);
          }
        }
      }

      if (depth > 0) {
        // Pending parts must not alias the chunk buffer.
        parts.push(chunk.slice(elementStart));
        pendingBytes += chunk.length - elementStart;
      }
      position += chunk.length;
    }
  }

  /** Bytes of an element that holds several objects are confirmed with its last object. */
  private *emit(objects: readonly TrackObject[], elementLength: number): Generator<TrackObject, void, undefined> {
    if (objects.length === 0) {
      this.confirmedBytes += elementLength;
      return;
    }

    for (const [index, object] of objects.entries()) {
      if (index === objects.length - 1) {
        this.confirmedBytes += elementLength;
      }
      yield object;
    }
  }

  private decode(parts: readonly Uint8Array[], offset: number): readonly TrackObject[] {
    const text = Buffer.concat(parts).toString('utf-8');
    let value: unknown;

    try {
      value = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedSourceError(`Invalid JSON element at byte ${String(offset)}: ${reason}`, offset, {
        cause: error,
      });
    }

    if (isTrackObject(value)) return [value];

    if (Array.isArray(value)) {
      const items: readonly unknown[] = value;
      const objects: TrackObject[] = [];
      for (const item of items) {
        if (!isTrackObject(item)) {
          throw new MalformedSourceError(`Array element at byte ${String(offset)} must contain only objects`, offset);
        }
        objects.push(item);
      }
      return objects;
    }

    throw new MalformedSourceError(`Element at byte ${String(offset)} is not an object`, offset);
  }
}
