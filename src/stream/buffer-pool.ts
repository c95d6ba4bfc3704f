/**
 * Reusable buffer pools, keyed by what the buffers are for.
 *
 * A leased buffer has exactly one owner until it is released. Releasing a
 * buffer twice, or one that came from elsewhere, throws.
 */

export type BufferPurpose = 'chunk' | 'token' | 'batch';

/** Bytes of token input the pooled normalization scratch covers. */
export const TOKEN_SCRATCH_BYTES = 4096;

export class BufferPool<T extends { readonly length: number }> {
  private readonly idle: T[] = [];
  private readonly leased = new Set<T>();

  constructor(
    readonly purpose: BufferPurpose,
    readonly size: number,
    private readonly create: (size: number) => T,
    private readonly maxIdle = 16,
  ) {}

  /** Buffers handed out and not yet returned. */
  get outstanding(): number {
    return this.leased.size;
  }

  get idleCount(): number {
    return this.idle.length;
  }

  acquire(): T {
    const buf = this.idle.pop() ?? this.create(this.size);
    this.leased.add(buf);
    return buf;
  }

  release(buf: T): void {
    if (!this.leased.delete(buf)) {
      throw new Error(`buffer was not leased from the ${this.purpose} pool`);
    }
    if (this.idle.length < this.maxIdle) {
      this.idle.push(buf);
    }
  }

  /** Ends a lease without returning the buffer to the idle list. */
  discard(buf: T): void {
    if (!this.leased.delete(buf)) {
      throw new Error(`buffer was not leased from the ${this.purpose} pool`);
    }
  }

  /** Leases a buffer for the duration of `fn`; it is returned on every exit path. */
  async withBuffer<R>(fn: (buf: T) => Promise<R>): Promise<R> {
    const buf = this.acquire();
    try {
      return await fn(buf);
    } finally {
      this.release(buf);
    }
  }
}

/**
 * The three pools one computation draws from:
 * - chunk: read buffers, `chunkSize` bytes
 * - token: normalization scratch for sink output
 * - batch: token range tables for parallel jobs, two slots per token
 */
export class BufferPools {
  readonly chunk: BufferPool<Uint8Array>;
  readonly token: BufferPool<Uint8Array>;
  readonly batch: BufferPool<Uint32Array>;

  constructor(chunkSize: number, batchSize: number) {
    this.chunk = new BufferPool('chunk', chunkSize, (n) => new Uint8Array(n));
    this.token = new BufferPool('token', TOKEN_SCRATCH_BYTES * 3, (n) => new Uint8Array(n));
    this.batch = new BufferPool('batch', batchSize * 2, (n) => new Uint32Array(n));
  }

  get outstanding(): number {
    return this.chunk.outstanding + this.token.outstanding + this.batch.outstanding;
  }
}
