import { setImmediate as yieldToLoop } from 'node:timers/promises';

import type { StreamingMode } from '../shared/types.js';
import { ByteNormalizer, normalizedCapacity } from '../text/normalizer.js';
import { GrowableBuffer } from './byte-buffer.js';
import type { BufferPool } from './buffer-pool.js';

/**
 * One unit of parallel work. The producer copies the bytes out of its read
 * buffer, so a job owns its slab outright.
 *
 * Word and line jobs list their tokens in `ranges` as `[start, end)` pairs.
 * A chunk job is its whole slab plus the collapse state it starts in.
 */
export interface CountJob {
  sequence: number;
  mode: StreamingMode;
  bytes: Uint8Array;
  ranges: Uint32Array;
  rangeCount: number;
  leadingSpace: boolean;
  emitOutput: boolean;
}

export interface JobOutcome {
  count: number;
  tokens: number;
  output: Uint8Array | null;
}

const SPACE = 0x20;
const LF = 0x0a;

/** Output terminator written after each normalized token. */
export function tokenTerminator(mode: 'line' | 'word'): number {
  return mode === 'line' ? LF : SPACE;
}

/**
 * Normalizes single tokens, optionally appending each to an output buffer.
 * Tokens that fit go through the pooled scratch buffer first.
 */
export class TokenWriter {
  private readonly normalizer = new ByteNormalizer();

  constructor(
    private readonly scratch: Uint8Array | null,
    private readonly out: GrowableBuffer | null,
  ) {}

  /** Returns the code point count of the normalized token. */
  write(src: Uint8Array, start: number, end: number, terminator: number): number {
    const n = this.normalizer;
    n.reset();

    const out = this.out;
    if (!out) {
      n.run(src, start, end, null, 0);
      return n.codePoints;
    }

    const capacity = normalizedCapacity(end - start);
    if (this.scratch && capacity <= this.scratch.length) {
      const written = n.run(src, start, end, this.scratch, 0);
      out.append(this.scratch, 0, written);
    } else {
      const dst = out.reserve(capacity);
      out.setLength(n.run(src, start, end, dst, out.length));
    }

    const dst = out.reserve(1);
    dst[out.length] = terminator;
    out.setLength(out.length + 1);
    return n.codePoints;
  }
}

/**
 * Counts (and optionally normalizes) one job. Pure apart from writes into
 * `scratch`; safe to run on any thread.
 */
export function processJob(job: CountJob, scratch: Uint8Array | null): JobOutcome {
  const out = job.emitOutput ? new GrowableBuffer(Math.max(64, job.bytes.length + 16)) : null;

  if (job.mode === 'chunk') {
    const n = new ByteNormalizer();
    n.lastWasSpace = job.leadingSpace;
    if (out) {
      const dst = out.reserve(normalizedCapacity(job.bytes.length));
      out.setLength(n.run(job.bytes, 0, job.bytes.length, dst, 0));
    } else {
      n.run(job.bytes, 0, job.bytes.length, null, 0);
    }
    return { count: n.codePoints, tokens: 1, output: out ? out.toUint8Array() : null };
  }

  if (job.mode === 'word' && !out) {
    return { count: job.rangeCount, tokens: job.rangeCount, output: null };
  }

  const writer = new TokenWriter(scratch, out);
  const terminator = tokenTerminator(job.mode);
  let count = 0;
  for (let k = 0; k < job.rangeCount; k++) {
    const codePoints = writer.write(job.bytes, job.ranges[2 * k], job.ranges[2 * k + 1], terminator);
    count += job.mode === 'word' ? 1 : codePoints;
  }
  return { count, tokens: job.rangeCount, output: out ? out.toUint8Array() : null };
}

/**
 * Executes jobs. `run` may be called concurrently; each call settles with the
 * job's outcome or rejects with the reason it failed.
 */
export interface JobRunner {
  readonly kind: 'inline' | 'threads';
  start(): Promise<void>;
  run(job: CountJob): Promise<JobOutcome>;
  close(): Promise<void>;
}

/**
 * Runs jobs on the calling thread, yielding to the event loop before each one
 * so reads, timers and aborts interleave with the work.
 */
export class InlineJobRunner implements JobRunner {
  readonly kind = 'inline';

  constructor(private readonly scratchPool: BufferPool<Uint8Array> | null = null) {}

  async start(): Promise<void> {}

  async run(job: CountJob): Promise<JobOutcome> {
    await yieldToLoop();
    const pool = this.scratchPool;
    if (!job.emitOutput || !pool) return processJob(job, null);
    return pool.withBuffer(async (scratch) => processJob(job, scratch));
  }

  async close(): Promise<void> {}
}
