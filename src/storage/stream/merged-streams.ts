// Dynamic fan-in over async iterables of one item type.
//
// Sources can be pushed at any time, including while the consumer is still
// handling an item from this very merger. That is what lets a recursive
// listing add a subdirectory's stream the moment it sees the directory,
// keeping only the active frontier in memory.

import { StorageInternalError } from '../errors.js';

type Pulled<T> = { done: false; value: T } | { done: true } | { error: unknown };

interface Source<T> {
  iterator: AsyncIterator<T>;
  pending: Promise<void> | undefined;
  result: Pulled<T> | undefined;
}

export class MergedStreams<T> implements AsyncIterable<T> {
  private readonly sources: Source<T>[] = [];
  private cursor = 0;
  private consumed = false;

  constructor(streams: Iterable<AsyncIterable<T>> = []) {
    for (const stream of streams) {
      this.push(stream);
    }
  }

  /** Number of sources that have not finished yet. */
  get size(): number {
    return this.sources.length;
  }

  push(stream: AsyncIterable<T>): void {
    this.sources.push({
      iterator: stream[Symbol.asyncIterator](),
      pending: undefined,
      result: undefined,
    });
  }

  /**
   * Items from all sources. Each pull visits sources round-robin starting
   * at the one that produced the previous item and returns the first item
   * already available; otherwise it waits for whichever source answers
   * first. A failing source ends the merged stream with its error.
   *
   * A merger can be iterated once.
   */
  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    if (this.consumed) {
      throw new StorageInternalError('MergedStreams can only be iterated once');
    }
    this.consumed = true;

    try {
      while (this.sources.length > 0) {
        const index = this.nextReady();
        if (index === undefined) {
          await Promise.race(this.sources.map((source) => this.request(source)));
          continue;
        }

        const source = this.sources[index];
        const result = source?.result;
        if (!source || !result) {
          continue;
        }
        source.result = undefined;

        if ('error' in result) {
          this.sources.splice(index, 1);
          throw result.error;
        }
        if (result.done) {
          this.sources.splice(index, 1);
          if (this.cursor > index) {
            this.cursor--;
          }
          continue;
        }

        this.cursor = index;
        yield result.value;
      }
    } finally {
      await this.closeAll();
    }
  }

  private nextReady(): number | undefined {
    const count = this.sources.length;
    if (this.cursor >= count) {
      this.cursor = 0;
    }
    for (let offset = 0; offset < count; offset++) {
      const index = (this.cursor + offset) % count;
      if (this.sources[index]?.result) {
        return index;
      }
    }
    return undefined;
  }

  /** Start (or reuse) the single outstanding pull of a source. */
  private request(source: Source<T>): Promise<void> {
    if (source.result) {
      return Promise.resolve();
    }
    if (!source.pending) {
      source.pending = source.iterator.next().then(
        (next) => {
          source.pending = undefined;
          source.result = next.done ? { done: true } : { done: false, value: next.value };
        },
        (error: unknown) => {
          source.pending = undefined;
          source.result = { error };
        }
      );
    }
    return source.pending;
  }

  private async closeAll(): Promise<void> {
    const remaining = this.sources.splice(0, this.sources.length);
    await Promise.allSettled(
      remaining.map(async (source) => {
        // A source still busy with a pull must finish it before it can close.
        if (source.pending) {
          await source.pending;
        }
        await source.iterator.return?.();
      })
    );
  }
}
