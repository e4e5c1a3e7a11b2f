/**
 * Single-assignment completion cell.
 *
 * Several producers (a notification listener, a timer, an exit watcher) race
 * to `resolve`; the first value sticks and later attempts report `false`.
 */
export class OneShotSignal<T> {
  readonly promise: Promise<T>;
  #resolve: (value: T) => void;
  #settled = false;
  #value: T | undefined;

  constructor() {
    let resolveFn: ((value: T) => void) | undefined;
    this.promise = new Promise<T>((resolve) => {
      resolveFn = resolve;
    });
    // The executor runs synchronously, so resolveFn is always assigned here.
    this.#resolve = resolveFn ?? (() => {});
  }

  get settled(): boolean {
    return this.#settled;
  }

  /** The winning value, or undefined while unsettled. */
  get value(): T | undefined {
    return this.#value;
  }

  resolve(value: T): boolean {
    if (this.#settled) return false;
    this.#settled = true;
    this.#value = value;
    this.#resolve(value);
    return true;
  }
}
