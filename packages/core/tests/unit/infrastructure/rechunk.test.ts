import { describe, it, expect } from 'vitest';
import { rechunk } from '../../../src/infrastructure/sources/rechunk.js';

async function* pieces(...texts: string[]): AsyncGenerator<Uint8Array> {
  for (const text of texts) {
    await Promise.resolve();
    yield Buffer.from(text, 'utf-8');
  }
}

async function collect(chunks: AsyncIterable<Uint8Array>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of chunks) {
    out.push(Buffer.from(chunk).toString('utf-8'));
  }
  return out;
}

describe('rechunk', () => {
  it('should regroup uneven input into fixed-size chunks', async () => {
    expect(await collect(rechunk(pieces('ab', 'cdefg', 'h'), 3))).toEqual(['abc', 'def', 'gh']);
  });

  it('should emit nothing for an empty stream', async () => {
    expect(await collect(rechunk(pieces(), 3))).toEqual([]);
  });

  it('should not leave a trailing empty chunk on an exact multiple', async () => {
    expect(await collect(rechunk(pieces('abcd', 'ef'), 2))).toEqual(['ab', 'cd', 'ef']);
  });

  it('should reject an invalid size', async () => {
    await expect(collect(rechunk(pieces('a'), 0))).rejects.toThrow('Chunk size must be a positive integer, got 0');
  });
});
