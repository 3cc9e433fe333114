// Adaptive buffered reads.
//
// Reads go into one reusable buffer. Each read fills as much of the
// unfilled region as the source provides; the filled part is handed to the
// consumer as a view (no copy) and the rest of the buffer is kept for the
// next read. Once the remaining region drops below the minimum size a fresh
// buffer is allocated, so reads are never issued into a sliver of memory.

import { StorageInvalidSettingsError, toStorageError } from '../errors.js';

export const DEFAULT_INITIAL_BUFFER_SIZE = 20 * 1024 * 1024;
export const DEFAULT_MINIMUM_BUFFER_SIZE = 1024 * 1024;

/** A sequential byte source such as an open file. */
export interface ByteSource {
  /** Read into `target`, resolving with the byte count; 0 means end of data. */
  read(target: Uint8Array): Promise<number>;
  close(): Promise<void>;
}

export interface ReaderStreamOptions {
  /** Size of each freshly allocated buffer (default 20 MiB). */
  initialSize?: number;
  /** Remaining capacity below which a new buffer is allocated (default 1 MiB). */
  minimumSize?: number;
  /** Maps read failures into storage errors. */
  mapError?: (error: unknown) => Error;
}

/** A buffer with an explicit boundary between handed-out and unfilled bytes. */
export class ChunkBuffer {
  readonly size: number;
  private buffer: Buffer;
  private filled = 0;

  constructor(size: number) {
    this.size = size;
    this.buffer = Buffer.alloc(size);
  }

  get remaining(): number {
    return this.buffer.length - this.filled;
  }

  /** The region the next read should fill. */
  unfilled(): Buffer {
    return this.buffer.subarray(this.filled);
  }

  /**
   * Hand out the next `count` bytes of the unfilled region. The returned
   * view is never written to again.
   */
  take(count: number): Buffer {
    if (count < 0 || count > this.remaining) {
      throw new RangeError(`Cannot take ${count} bytes with ${this.remaining} remaining`);
    }
    const chunk = this.buffer.subarray(this.filled, this.filled + count);
    this.filled += count;
    return chunk;
  }

  /** Replace the buffer with a new zeroed one of the same size. */
  renew(): void {
    this.buffer = Buffer.alloc(this.size);
    this.filled = 0;
  }
}

export function resolveBufferSizes(options: ReaderStreamOptions = {}): {
  initialSize: number;
  minimumSize: number;
} {
  const initialSize = options.initialSize ?? DEFAULT_INITIAL_BUFFER_SIZE;
  const minimumSize = options.minimumSize ?? DEFAULT_MINIMUM_BUFFER_SIZE;

  if (!Number.isInteger(initialSize) || initialSize <= 0) {
    throw new StorageInvalidSettingsError(`initial buffer size must be a positive integer`);
  }
  if (!Number.isInteger(minimumSize) || minimumSize <= 0) {
    throw new StorageInvalidSettingsError(`minimum buffer size must be a positive integer`);
  }
  if (minimumSize > initialSize) {
    throw new StorageInvalidSettingsError(
      `minimum buffer size ${minimumSize} exceeds initial buffer size ${initialSize}`
    );
  }
  return { initialSize, minimumSize };
}

/**
 * Stream the content of `source` in chunks. The source is closed when the
 * stream ends, fails, or the consumer stops iterating.
 */
export async function* readerStream(
  source: ByteSource,
  options: ReaderStreamOptions = {}
): AsyncGenerator<Buffer, void, undefined> {
  const mapError = options.mapError ?? ((error: unknown) => toStorageError(error, 'read'));

  try {
    const { initialSize, minimumSize } = resolveBufferSizes(options);
    const buffer = new ChunkBuffer(initialSize);

    while (true) {
      let count: number;
      try {
        count = await source.read(buffer.unfilled());
      } catch (error) {
        throw mapError(error);
      }

      if (count === 0) {
        return;
      }

      const chunk = buffer.take(count);
      if (buffer.remaining < minimumSize) {
        buffer.renew();
      }
      yield chunk;
    }
  } finally {
    await source.close();
  }
}
