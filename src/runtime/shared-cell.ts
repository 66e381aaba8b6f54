import { observable, runInAction, type IObservableValue } from 'mobx';

export interface CellAccess<T> {
  get(): T;
  set(value: T): void;
}

export class CellLockedError extends Error {
  constructor() {
    super('SharedCell is already locked');
    this.name = 'CellLockedError';
  }
}

export class CellReleasedError extends Error {
  constructor() {
    super('SharedCell has been released by every holder');
    this.name = 'CellReleasedError';
  }
}

/**
 * Reference-counted handle to a value shared between host code and the sub-graph runtime.
 *
 * Every read or write goes through a scoped, exclusive acquisition. Acquiring while the
 * cell is already held (from inside another `withLock` callback) throws; `tryWithLock`
 * reports the contention instead. The value is a MobX observable box, so hosts can
 * observe it, but mutations only happen through the lock.
 */
export class SharedCell<T> {
  private readonly box: IObservableValue<T>;
  private locked = false;
  private holders = 1;

  constructor(initial: T, private readonly onRelease?: (value: T) => void) {
    this.box = observable.box(initial, { deep: false });
  }

  get refCount(): number {
    return this.holders;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  withLock<R>(fn: (access: CellAccess<T>) => R): R {
    if (this.holders === 0) throw new CellReleasedError();
    if (this.locked) throw new CellLockedError();
    this.locked = true;
    try {
      return fn({
        get: () => this.box.get(),
        set: value => runInAction(() => this.box.set(value)),
      });
    } finally {
      this.locked = false;
    }
  }

  tryWithLock<R>(fn: (access: CellAccess<T>) => R): { acquired: true; value: R } | { acquired: false } {
    if (this.locked || this.holders === 0) return { acquired: false };
    return { acquired: true, value: this.withLock(fn) };
  }

  read(): T {
    return this.withLock(a => a.get());
  }

  write(value: T) {
    this.withLock(a => a.set(value));
  }

  /** Observed by MobX reactions; does not take the lock. */
  peek(): T {
    return this.box.get();
  }

  retain(): this {
    if (this.holders === 0) throw new CellReleasedError();
    this.holders++;
    return this;
  }

  release() {
    if (this.holders === 0) throw new CellReleasedError();
    this.holders--;
    if (this.holders === 0) {
      this.onRelease?.(this.box.get());
    }
  }
}
