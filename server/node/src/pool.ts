/**
 * Free-list object pool.
 *
 * acquire() pops a released instance or lazily creates one; release() resets
 * the instance and pushes it back, dropping it once the free list holds
 * `maxSize` entries.
 *
 * Caller contract: an instance must not be used after it has been released.
 * The pool cannot detect a stale reference.
 */
export class Pool<T> {
  private free: T[] = [];
  private readonly create: () => T;
  private readonly resetFn?: (value: T) => void;
  private readonly maxSize: number;

  constructor(params: { create: () => T; reset?: (value: T) => void; maxSize?: number }) {
    this.create = params.create;
    this.resetFn = params.reset;
    this.maxSize = params.maxSize ?? 256;
  }

  acquire(): T {
    const value = this.free.pop();
    return value === undefined ? this.create() : value;
  }

  release(value: T): void {
    this.resetFn?.(value);
    if (this.free.length < this.maxSize) {
      this.free.push(value);
    }
  }

  /** Pre-allocate instances for warm start. */
  preallocate(count: number): void {
    const toCreate = Math.min(count, this.maxSize - this.free.length);
    for (let i = 0; i < toCreate; i++) {
      this.free.push(this.create());
    }
  }

  clear(): void {
    this.free.length = 0;
  }

  /** Number of idle instances. */
  get size(): number {
    return this.free.length;
  }
}
