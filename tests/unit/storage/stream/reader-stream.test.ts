import { describe, it, expect } from 'vitest';

import { storageErrorKind } from '@/storage/errors.js';
import { ChunkBuffer, readerStream, type ByteSource } from '@/storage/stream/reader-stream.js';
import { collect } from '../../../helpers/streams.js';

interface MemorySource extends ByteSource {
  closed: boolean;
  reads: number;
}

function memorySource(data: Buffer, maxRead = Number.POSITIVE_INFINITY): MemorySource {
  let offset = 0;
  const source: MemorySource = {
    closed: false,
    reads: 0,
    async read(target) {
      source.reads++;
      const count = Math.min(target.length, data.length - offset, maxRead);
      data.copy(target, 0, offset, offset + count);
      offset += count;
      return count;
    },
    async close() {
      source.closed = true;
    },
  };
  return source;
}

describe('readerStream()', () => {
  it('should allocate a fresh buffer once the remainder drops below the minimum', async () => {
    const source = memorySource(Buffer.alloc(25, 7));

    const chunks = await collect(readerStream(source, { initialSize: 10, minimumSize: 4 }));

    expect(chunks.map((chunk) => chunk.length)).toEqual([10, 10, 5]);
    expect(source.closed).toBe(true);
  });

  it('should hand out short reads without clobbering earlier chunks', async () => {
    const source = memorySource(Buffer.from('abcdefghijkl'), 3);

    const chunks = await collect(readerStream(source, { initialSize: 10, minimumSize: 4 }));

    expect(chunks.map((chunk) => chunk.toString())).toEqual(['abc', 'def', 'ghi', 'jkl']);
  });

  it('should end without chunks on empty input', async () => {
    const source = memorySource(Buffer.alloc(0));

    expect(await collect(readerStream(source, { initialSize: 8, minimumSize: 2 }))).toEqual([]);
    expect(source.reads).toBe(1);
    expect(source.closed).toBe(true);
  });

  it('should map read failures and close the source', async () => {
    let closed = false;
    const source: ByteSource = {
      read: async () => {
        throw new Error('EIO');
      },
      close: async () => {
        closed = true;
      },
    };

    const error: unknown = await collect(readerStream(source)).catch((e: unknown) => e);

    expect(storageErrorKind(error)).toBe('OtherError');
    expect(error).toHaveProperty('message', 'Storage error: read: EIO');
    expect(closed).toBe(true);
  });

  it('should reject a minimum larger than the initial size and still close', async () => {
    const source = memorySource(Buffer.from('data'));

    const error: unknown = await collect(readerStream(source, { initialSize: 4, minimumSize: 8 })).catch(
      (e: unknown) => e
    );

    expect(storageErrorKind(error)).toBe('InvalidSettings');
    expect(source.reads).toBe(0);
    expect(source.closed).toBe(true);
  });

  it('should close the source when the consumer stops early', async () => {
    const source = memorySource(Buffer.alloc(100), 10);

    for await (const chunk of readerStream(source, { initialSize: 16, minimumSize: 4 })) {
      expect(chunk.length).toBe(10);
      break;
    }

    expect(source.reads).toBe(1);
    expect(source.closed).toBe(true);
  });
});

describe('ChunkBuffer', () => {
  it('should move the filled boundary on take', () => {
    const buffer = new ChunkBuffer(8);

    buffer.unfilled().write('abc');
    expect(buffer.take(3).toString()).toBe('abc');
    expect(buffer.remaining).toBe(5);
    expect(buffer.unfilled().length).toBe(5);
  });

  it('should refuse to take more than remains', () => {
    const buffer = new ChunkBuffer(4);

    expect(() => buffer.take(5)).toThrow(RangeError);
    expect(() => buffer.take(-1)).toThrow(RangeError);
  });
});
