/**
 * Owned, growable byte buffer. Used for token carry-over between chunks, for
 * building job slabs and for staging sink output.
 */
export class GrowableBuffer {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 64) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  /** Backing storage; only the first `length` bytes are meaningful. */
  get bytes(): Uint8Array {
    return this.buf;
  }

  /** Makes room for `extra` more bytes and returns the backing storage. */
  reserve(extra: number): Uint8Array {
    const needed = this.len + extra;
    if (needed > this.buf.length) {
      let capacity = this.buf.length * 2;
      while (capacity < needed) capacity *= 2;
      const next = new Uint8Array(capacity);
      next.set(this.buf.subarray(0, this.len));
      this.buf = next;
    }
    return this.buf;
  }

  /** Sets the logical length after writing directly into `reserve()` storage. */
  setLength(length: number): void {
    if (length < 0 || length > this.buf.length) {
      throw new RangeError(`length ${length} outside capacity ${this.buf.length}`);
    }
    this.len = length;
  }

  append(src: Uint8Array, start: number, end: number): void {
    if (end <= start) return;
    this.reserve(end - start).set(src.subarray(start, end), this.len);
    this.len += end - start;
  }

  /** Live view of the contents. Invalidated by the next write. */
  view(): Uint8Array {
    return this.buf.subarray(0, this.len);
  }

  /** Copy of the contents. */
  toUint8Array(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  /**
   * Hands the current storage over to the caller and starts again on a fresh
   * buffer of the same capacity.
   */
  detach(): Uint8Array {
    const out = this.buf.subarray(0, this.len);
    this.buf = new Uint8Array(this.buf.length);
    this.len = 0;
    return out;
  }

  clear(): void {
    this.len = 0;
  }
}
