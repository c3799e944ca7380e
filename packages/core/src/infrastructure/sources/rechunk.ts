/** Default chunk size of the built-in byte sources. */
export const DEFAULT_CHUNK_SIZE = 1024 * 1024;

/**
 * Regroup a byte stream into chunks of exactly `size` bytes (the last one may be
 * shorter). Input chunks are copied, never aliased.
 */
export async function* rechunk(chunks: AsyncIterable<Uint8Array>, size: number): AsyncGenerator<Uint8Array, void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Chunk size must be a positive integer, got ${String(size)}`);
  }

  let buffer = new Uint8Array(size);
  let filled = 0;

  for await (const chunk of chunks) {
    let read = 0;
    while (read < chunk.length) {
      const take = Math.min(size - filled, chunk.length - read);
      buffer.set(chunk.subarray(read, read + take), filled);
      filled += take;
      read += take;

      if (filled === size) {
        yield buffer;
        buffer = new Uint8Array(size);
        filled = 0;
      }
    }
  }

  if (filled > 0) {
    yield buffer.slice(0, filled);
  }
}
