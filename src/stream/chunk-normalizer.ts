import { ByteNormalizer, normalizedCapacity } from '../text/normalizer.js';
import { PendingSequence, incompleteTailStart } from '../text/utf8.js';
import type { GrowableBuffer } from './byte-buffer.js';

/**
 * Streaming normalizer for chunk mode. Carries the collapse state and any
 * code point split across chunks, so the total is the code point count of the
 * normalized stream no matter where the chunks are cut.
 */
export class ChunkNormalizer {
  private readonly normalizer = new ByteNormalizer();
  private readonly pending = new PendingSequence();

  /** Code points emitted since construction or the last reset. */
  total = 0;

  /**
   * Normalizes `chunk[0, end)`. Output is appended to `out` when given.
   * Returns the code points this call added.
   */
  push(chunk: Uint8Array, end: number, out: GrowableBuffer | null): number {
    let added = 0;
    let i = 0;

    if (!this.pending.isEmpty) {
      i = this.pending.fill(chunk, 0, end);
      if (!this.pending.isComplete && i === end) return 0;
      added += this.runRange(this.pending.bytes, 0, this.pending.length, out);
      this.pending.clear();
    }

    const tail = incompleteTailStart(chunk, i, end);
    added += this.runRange(chunk, i, tail, out);
    if (tail < end) {
      this.pending.hold(chunk, tail, end);
    }

    this.total += added;
    return added;
  }

  /** Flushes a held incomplete sequence as replacement characters. */
  finish(out: GrowableBuffer | null): number {
    if (this.pending.isEmpty) return 0;
    const added = this.runRange(this.pending.bytes, 0, this.pending.length, out);
    this.pending.clear();
    this.total += added;
    return added;
  }

  reset(): void {
    this.normalizer.reset();
    this.pending.clear();
    this.total = 0;
  }

  private runRange(src: Uint8Array, start: number, end: number, out: GrowableBuffer | null): number {
    if (end <= start) return 0;
    if (out) {
      const dst = out.reserve(normalizedCapacity(end - start));
      out.setLength(this.normalizer.run(src, start, end, dst, out.length));
    } else {
      this.normalizer.run(src, start, end, null, 0);
    }
    return this.normalizer.codePoints;
  }
}
