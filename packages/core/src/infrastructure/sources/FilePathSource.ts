import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { ByteSource, SourceMetadata } from '../../domain/ports/ByteSource.js';
import { DEFAULT_CHUNK_SIZE } from './rechunk.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 1 MiB. */
  readonly highWaterMark?: number;
}

/** Byte source that range-reads a local file with `createReadStream`. Node.js only. */
export class FilePathSource implements ByteSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? DEFAULT_CHUNK_SIZE;
  }

  async size(): Promise<number> {
    const stats = await stat(this.filePath);
    return stats.size;
  }

  async *read(offset: number): AsyncIterable<Uint8Array> {
    if (offset >= (await this.size())) return;

    const stream = createReadStream(this.filePath, {
      start: offset,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      if (Buffer.isBuffer(chunk)) yield chunk;
    }
  }

  metadata(): SourceMetadata {
    return { name: this.filePath };
  }
}
