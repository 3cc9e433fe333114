// Lazy single-value results.
//
// A StorageFuture does nothing until something awaits it (or calls then /
// catch / finally); the work then runs exactly once and every consumer sees
// the same outcome.

export class StorageFuture<T> implements PromiseLike<T> {
  private promise: Promise<T> | undefined;
  private readonly executor: () => Promise<T>;

  constructor(executor: () => Promise<T>) {
    this.executor = executor;
  }

  static resolve<T>(value: T): StorageFuture<T> {
    return new StorageFuture(async () => value);
  }

  static reject<T = never>(error: unknown): StorageFuture<T> {
    return new StorageFuture<T>(async () => {
      throw error;
    });
  }

  /** Whether the work has been started. */
  get started(): boolean {
    return this.promise !== undefined;
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    return this.start().then(onfulfilled, onrejected);
  }

  catch<R = never>(onrejected?: ((reason: unknown) => R | PromiseLike<R>) | null): Promise<T | R> {
    return this.start().catch(onrejected);
  }

  finally(onfinally?: (() => void) | null): Promise<T> {
    return this.start().finally(onfinally);
  }

  private start(): Promise<T> {
    if (!this.promise) {
      this.promise = this.executor();
    }
    return this.promise;
  }
}
