/** Metadata about the source blob (for logging and checkpoint identifiers). */
export interface SourceMetadata {
  /** Human-readable name of the blob, e.g. `s3://bucket/key` or a file path. */
  readonly name: string;
}

/**
 * Port for range-reading the immutable source blob.
 *
 * `read(offset)` must yield the bytes from `offset` to the end of the blob, in
 * order, as a sequence of chunks. Chunk boundaries carry no meaning: they may
 * fall inside an object, inside whitespace or exactly between two objects.
 */
export interface ByteSource {
  /** Total length of the blob in bytes. */
  size(): Promise<number>;
  /** Stream the blob from `offset` (inclusive) to its end. */
  read(offset: number): AsyncIterable<Uint8Array>;
  metadata(): SourceMetadata;
}
