import { describe, expect, it, vi } from 'vitest';

import { createDuplexPair } from '@/transport/duplex-pair.js';

// larger than the default high-water mark on every supported Node release
const CHUNK_BYTES = 256 * 1024;

function writeChunks(count: number, write: (chunk: Buffer, done: () => void) => void): () => number {
  let acknowledged = 0;
  for (let index = 0; index < count; index += 1) {
    write(Buffer.alloc(CHUNK_BYTES, index), () => {
      acknowledged += 1;
    });
  }
  return () => acknowledged;
}

describe('createDuplexPair', () => {
  it('holds writes back while the reader is paused', async () => {
    const [left, right] = createDuplexPair();

    const acknowledged = writeChunks(4, (chunk, done) => left.write(chunk, done));
    await new Promise((resolve) => setImmediate(resolve));

    expect(acknowledged()).toBe(0);
    expect(right.readableLength).toBe(CHUNK_BYTES);
    expect(left.writableLength).toBe(4 * CHUNK_BYTES);

    left.destroy();
  });

  it('delivers every byte once the reader resumes', async () => {
    const [left, right] = createDuplexPair();

    const acknowledged = writeChunks(4, (chunk, done) => left.write(chunk, done));
    let received = 0;
    right.on('data', (chunk: Buffer) => {
      received += chunk.length;
    });

    await vi.waitFor(() => expect(acknowledged()).toBe(4));
    expect(received).toBe(4 * CHUNK_BYTES);

    left.destroy();
  });

  it('destroys the peer along with either end', () => {
    const [left, right] = createDuplexPair();
    left.destroy();
    expect(right.destroyed).toBe(true);
  });
});
