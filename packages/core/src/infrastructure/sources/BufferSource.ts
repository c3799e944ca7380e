import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';
import { DEFAULT_CHUNK_SIZE } from './rechunk.js';

export interface BufferSourceOptions {
  /** Name reported in metadata. Default: `'buffer-input'`. */
  readonly name?: string;
  /** Bytes per yielded chunk. Default: 1 MiB. */
  readonly chunkSize?: number;
}

/** Byte source over an in-memory string (UTF-8 encoded) or byte array. */
export class BufferSource implements ByteSource {
  private readonly bytes: Uint8Array;
  private readonly name: string;
  private readonly chunkSize: number;

  constructor(data: string | Uint8Array, options?: BufferSourceOptions) {
    this.bytes = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    this.name = options?.name ?? 'buffer-input';
    this.chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new Error(`Chunk size must be a positive integer, got ${String(this.chunkSize)}`);
    }
  }

  size(): Promise<number> {
    return Promise.resolve(this.bytes.length);
  }

  async *read(offset: number): AsyncIterable<Uint8Array> {
    for (let start = offset; start < this.bytes.length; start += this.chunkSize) {
      yield this.bytes.subarray(start, Math.min(start + this.chunkSize, this.bytes.length));
    }
  }

  metadata(): SourceMetadata {
    return { name: this.name };
  }
}
