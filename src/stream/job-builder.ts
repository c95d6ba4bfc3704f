import type { StreamingMode } from '../shared/types.js';
import { isPunctOrSpace } from '../text/char-classes.js';
import { incompleteTailStart, lastCodePoint } from '../text/utf8.js';
import { GrowableBuffer } from './byte-buffer.js';
import type { BufferPool } from './buffer-pool.js';
import type { CountJob } from './jobs.js';

const NO_RANGES = new Uint32Array(0);

/**
 * Producer-side job assembly for parallel runs.
 *
 * Word and line tokens are copied into a slab together with their ranges and
 * cut into a job every `batchSize` tokens (and at the end of every chunk).
 * In chunk mode each chunk becomes one job; a code point split across chunks
 * is held back and prepended to the next one, and the collapse state the job
 * starts in is resolved here.
 */
export class JobBuilder {
  /** Jobs cut and not yet dispatched, oldest first. */
  readonly ready: CountJob[] = [];

  private readonly slab: GrowableBuffer;
  private ranges: Uint32Array | null = null;
  private rangeCount = 0;
  private sequence = 0;
  private lastWasSpace = false;

  constructor(
    private readonly mode: StreamingMode,
    private readonly rangePool: BufferPool<Uint32Array>,
    private readonly batchSize: number,
    private readonly emitOutput: boolean,
    initialCapacity: number,
  ) {
    this.slab = new GrowableBuffer(initialCapacity);
  }

  /** Jobs cut so far. */
  get jobCount(): number {
    return this.sequence;
  }

  addToken(buf: Uint8Array, start: number, end: number): void {
    this.ranges ??= this.rangePool.acquire();
    const offset = this.slab.length;
    this.slab.append(buf, start, end);
    this.ranges[2 * this.rangeCount] = offset;
    this.ranges[2 * this.rangeCount + 1] = this.slab.length;
    this.rangeCount++;
    if (this.rangeCount === this.batchSize) this.cut();
  }

  /** Cuts the tokens collected so far into a job. */
  cut(): void {
    if (!this.ranges || this.rangeCount === 0) return;
    this.ready.push({
      sequence: this.sequence++,
      mode: this.mode,
      bytes: this.slab.detach(),
      ranges: this.ranges,
      rangeCount: this.rangeCount,
      leadingSpace: false,
      emitOutput: this.emitOutput,
    });
    this.ranges = null;
    this.rangeCount = 0;
  }

  addChunk(chunk: Uint8Array, end: number): void {
    this.slab.append(chunk, 0, end);
    const tail = incompleteTailStart(this.slab.bytes, 0, this.slab.length);
    if (tail === 0) return;

    const all = this.slab.detach();
    this.slab.append(all, tail, all.length);
    this.pushChunkJob(all.subarray(0, tail));
  }

  /** Emits whatever chunk-mode bytes are still held at end of stream. */
  finishChunks(): void {
    if (this.slab.length > 0) {
      this.pushChunkJob(this.slab.detach());
    }
  }

  /** Returns the range tables of everything not handed to the pool. */
  discard(): void {
    for (const job of this.ready.splice(0)) {
      this.settle(job);
    }
    if (this.ranges) {
      this.rangePool.release(this.ranges);
      this.ranges = null;
      this.rangeCount = 0;
    }
  }

  /** Ends a job's ownership of pooled storage. */
  settle(job: CountJob): void {
    if (job.ranges !== NO_RANGES) {
      this.rangePool.release(job.ranges);
    }
  }

  private pushChunkJob(bytes: Uint8Array): void {
    this.ready.push({
      sequence: this.sequence++,
      mode: this.mode,
      bytes,
      ranges: NO_RANGES,
      rangeCount: 0,
      leadingSpace: this.lastWasSpace,
      emitOutput: this.emitOutput,
    });
    const last = lastCodePoint(bytes, 0, bytes.length);
    if (last !== -1) {
      this.lastWasSpace = isPunctOrSpace(last);
    }
  }
}
