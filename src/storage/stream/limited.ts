// Counting permit pool around a cloneable resource template.
//
// Used to cap concurrent outbound requests and open file handles. Each
// guard gets its own clone of the template, so nothing in the template is
// shared between holders.

import { StorageInvalidSettingsError } from '../errors.js';

/** A held permit plus the holder's own copy of the resource. */
export class InUse<T> {
  readonly value: T;
  private releaser: (() => void) | undefined;

  constructor(value: T, releaser: () => void) {
    this.value = value;
    this.releaser = releaser;
  }

  get released(): boolean {
    return this.releaser === undefined;
  }

  /** Return the permit to the pool. Safe to call more than once. */
  release(): void {
    const releaser = this.releaser;
    this.releaser = undefined;
    releaser?.();
  }
}

export class Limited<T> {
  readonly capacity: number;
  private readonly template: T;
  private readonly clone: (template: T) => T;
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(template: T, capacity: number, clone: (template: T) => T = structuredClone) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new StorageInvalidSettingsError(`concurrency limit must be at least 1, got ${capacity}`);
    }
    this.template = template;
    this.capacity = capacity;
    this.clone = clone;
    this.permits = capacity;
  }

  /** Permits currently free. */
  get available(): number {
    return this.permits;
  }

  /** Callers queued for a permit. */
  get waiting(): number {
    return this.waiters.length;
  }

  /** Wait (first come, first served) for a permit. */
  async take(): Promise<InUse<T>> {
    if (this.permits > 0 && this.waiters.length === 0) {
      this.permits--;
    } else {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
    return new InUse(this.clone(this.template), () => this.give());
  }

  /** Run `fn` while holding a permit; the permit is returned however `fn` ends. */
  async use<R>(fn: (value: T) => Promise<R>): Promise<R> {
    const guard = await this.take();
    try {
      return await fn(guard.value);
    } finally {
      guard.release();
    }
  }

  private give(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter.
      next();
    } else {
      this.permits++;
    }
  }
}
