/**
 * A promise that is settled from the outside.
 *
 * Used for one-shot signals: "the first connect attempt finished", "the publisher was stopped".
 * Settling twice is a no-op, so racing event sources can all call `resolve`.
 */
export class Deferred<T> implements PromiseLike<T> {
  private readonly promise: Promise<T>;
  private resolveFn: (value: T) => void = () => {};
  private settledFlag = false;

  constructor() {
    this.promise = new Promise<T>((resolve) => {
      this.resolveFn = resolve;
    });
  }

  get settled() {
    return this.settledFlag;
  }

  resolve(value: T) {
    if (this.settledFlag) return;
    this.settledFlag = true;
    this.resolveFn(value);
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): PromiseLike<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }
}
