import { InvalidArgumentError, InvalidOperationError } from "./errors";
import { bufferLogger as logger } from "../utils/logger";

/** Value types that are copied, never shared, when stored. */
export type Copyable = number | bigint | boolean | string;

/** Caller-owned destination: a plain array or any typed array. */
export interface WritableArrayLike<T> {
  readonly length: number;
  [index: number]: T;
}

const isCount = (value: number) => Number.isInteger(value) && value >= 0;

/**
 *  Fixed-capacity circular buffer.
 *
 *    • write(data)        – append, overwriting the oldest unread data when full
 *    • read / readInto    – copy out AND consume
 *    • peek / peekInto    – copy out, cursor untouched
 *    • skip(n)            – consume without copying (pairs with peek)
 *
 *  The array-returning calls throw on misuse; the *Into calls fill caller
 *  storage and report shortfall with `false` instead.
 */
export class RingBuffer<T extends Copyable = number> {
  private readonly storage: T[];
  private start = 0;           // first unread element
  private count = 0;           // unread elements, 0..capacity
  private _overrun = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidArgumentError("Capacity must be an integer greater than 0", { capacity });
    }
    this.storage = new Array<T>(capacity);
    logger.debug({ capacity }, "RingBuffer created");
  }

  get capacity(): number { return this.storage.length; }
  get available(): number { return this.count; }
  get free(): number { return this.capacity - this.count; }
  get isEmpty(): boolean { return this.count === 0; }
  get isFull(): boolean { return this.count === this.capacity; }

  /** Unread elements lost to overwriting writes since construction. */
  get overrun(): number { return this._overrun; }

  /* ────────────────────────────────────────────────────────── */

  /**
   * Copy `data` in at the write cursor. Anything not yet read that the write
   * runs over is dropped. Only input longer than the whole buffer is refused.
   */
  write(data: ArrayLike<T>): boolean {
    const len = data.length;
    if (len > this.capacity) {
      logger.trace({ length: len, capacity: this.capacity }, "Write rejected, larger than capacity");
      return false;
    }

    const end = this.wrap(this.start + this.count);
    const firstLen = Math.min(len, this.capacity - end);
    for (let i = 0; i < firstLen; i++) this.storage[end + i] = data[i];
    for (let i = firstLen; i < len; i++) this.storage[i - firstLen] = data[i];

    const dropped = Math.max(0, this.count + len - this.capacity);
    if (dropped > 0) {
      this.start = this.wrap(this.start + dropped);
      this._overrun += dropped;
      logger.trace({ dropped, overrun: this._overrun }, "Unread data overwritten");
    }
    this.count = Math.min(this.count + len, this.capacity);
    return true;
  }

  /* ── Consuming reads ────────────────────────────────────── */

  read(length: number = this.count): T[] {
    const out = this.peek(length);
    this.advance(length);
    return out;
  }

  readInto(target: WritableArrayLike<T>): boolean {
    if (target.length > this.count) return false;
    this.copyOut(target, target.length);
    this.advance(target.length);
    return true;
  }

  /* ── Non-consuming reads ────────────────────────────────── */

  peek(length: number = this.count): T[] {
    if (!isCount(length)) {
      throw new InvalidArgumentError("Length must be a non-negative integer", { length });
    }
    if (length > this.count) {
      throw new InvalidOperationError("Not enough data available to read requested length", {
        length,
        available: this.count,
      });
    }
    const out = new Array<T>(length);
    this.copyOut(out, length);
    return out;
  }

  peekInto(target: WritableArrayLike<T>): boolean {
    if (target.length > this.count) return false;
    this.copyOut(target, target.length);
    return true;
  }

  /**
   * Consume `count` elements without copying, typically once peeked data has
   * been processed. Skipping past the end empties the buffer.
   * @returns the number of elements actually skipped
   */
  skip(count: number): number {
    if (!isCount(count)) {
      throw new InvalidArgumentError("Skip count must be a non-negative integer", { count });
    }
    if (count > this.count) {
      const skipped = this.count;
      logger.trace({ requested: count, available: skipped }, "Skip past end, buffer emptied");
      this.clear();
      return skipped;
    }
    this.advance(count);
    return count;
  }

  /** Drop everything unread. The overrun tally survives. */
  clear(): void {
    this.start = 0;
    this.count = 0;
  }

  /* ── Internals ──────────────────────────────────────────── */

  // Callers keep index < 2 * capacity, so one modulo is enough.
  private wrap(index: number): number {
    return index % this.capacity;
  }

  private advance(length: number): void {
    this.start = this.wrap(this.start + length);
    this.count -= length;
  }

  /** Copy `length` elements from the read cursor; two segments when wrapped. */
  private copyOut(target: WritableArrayLike<T>, length: number): void {
    const firstLen = Math.min(length, this.capacity - this.start);
    for (let i = 0; i < firstLen; i++) target[i] = this.storage[this.start + i];
    for (let i = firstLen; i < length; i++) target[i] = this.storage[i - firstLen];
  }
}
