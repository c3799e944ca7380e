import { GetObjectCommand, HeadObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import type { ByteSource, SourceMetadata } from '@trackimport/core';
import { DEFAULT_CHUNK_SIZE, rechunk } from '@trackimport/core';

/** Range-read access to objects in a bucket. */
export interface RangeReader {
  contentLength(bucket: string, key: string): Promise<number>;
  /** Stream the object from `offset` to its end. */
  openRange(bucket: string, key: string, offset: number): AsyncIterable<Uint8Array>;
}

/** `RangeReader` over the S3 API: `HeadObject` for the length, a `Range` header on `GetObject`. */
export function s3RangeReader(client: S3Client): RangeReader {
  return {
    async contentLength(bucket, key) {
      const head = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      if (head.ContentLength === undefined) {
        throw new Error(`S3 did not report a content length for s3://${bucket}/${key}`);
      }
      return head.ContentLength;
    },

    async *openRange(bucket, key, offset) {
      const response = await client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key, Range: `bytes=${String(offset)}-` }),
      );
      if (!response.Body) return;

      const reader = response.Body.transformToWebStream().getReader();
      let open = true;
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) {
            open = false;
            break;
          }
          if (value instanceof Uint8Array) yield value;
        }
      } catch (error) {
        open = false;
        throw error;
      } finally {
        // A consumer that stops early must not leave the body, and its socket, half read.
        if (open) await reader.cancel();
        reader.releaseLock();
      }
    },
  };
}

export interface S3RangeSourceOptions {
  /** Bytes per chunk handed to the extractor. Default: 1 MiB. */
  readonly chunkSize?: number;
}

/** Byte source over one S3 object. */
export class S3RangeSource implements ByteSource {
  private readonly chunkSize: number;
  private length: Promise<number> | null = null;

  constructor(
    private readonly ranges: RangeReader,
    private readonly bucket: string,
    private readonly key: string,
    options?: S3RangeSourceOptions,
  ) {
    this.chunkSize = options?.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  size(): Promise<number> {
    this.length ??= this.ranges.contentLength(this.bucket, this.key);
    return this.length;
  }

  async *read(offset: number): AsyncIterable<Uint8Array> {
    // A range starting at or past the end is answered with 416 by S3.
    if (offset >= (await this.size())) return;
    yield* rechunk(this.ranges.openRange(this.bucket, this.key, offset), this.chunkSize);
  }

  metadata(): SourceMetadata {
    return { name: `s3://${this.bucket}/${this.key}` };
  }
}
