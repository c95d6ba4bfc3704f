import { setImmediate as yieldToLoop } from 'node:timers/promises';

import { WorkerError, errorMessage, throwIfAborted } from '../shared/errors.js';
import { noopLogger, type Logger } from '../shared/debug.js';
import type { StreamCount, StreamingConfig, StreamingMode } from '../shared/types.js';
import { normalizedLength } from '../text/normalizer.js';
import { GrowableBuffer } from './byte-buffer.js';
import { BufferPools } from './buffer-pool.js';
import type { ByteSink, ByteSource } from './byte-source.js';
import { ChunkNormalizer } from './chunk-normalizer.js';
import { ChunkReader } from './chunk-reader.js';
import { JobBuilder } from './job-builder.js';
import {
  InlineJobRunner,
  TokenWriter,
  tokenTerminator,
  type CountJob,
  type JobOutcome,
  type JobRunner,
} from './jobs.js';
import { createTokenizer, type TokenSink } from './tokenizer.js';
import { ThreadJobRunner } from './worker-bridge.js';
import { WorkerPool } from './worker-pool.js';

export interface ProcessOptions {
  signal?: AbortSignal;
  /** Receives the normalized stream. */
  sink?: ByteSink;
}

/**
 * Count for one stream plus the failure that ended it early, if any. On
 * failure the counts are what had been folded so far.
 */
export interface StreamRun extends StreamCount {
  error: Error | null;
}

export interface StreamProcessorDeps {
  logger?: Logger;
  pools?: BufferPools;
  /** Replaces the runner chosen by `config.runner`. */
  createRunner?: () => JobRunner;
}

interface Tally {
  count: number;
  tokens: number;
}

/**
 * Runs one byte stream through the reader, tokenizer and normalizer and
 * produces its length count, sequentially or over the worker pool.
 *
 * The source is closed when the run ends, however it ends.
 */
export class StreamProcessor {
  readonly pools: BufferPools;
  private readonly logger: Logger;

  constructor(
    readonly config: StreamingConfig,
    private readonly deps: StreamProcessorDeps = {},
  ) {
    this.logger = deps.logger ?? noopLogger;
    this.pools = deps.pools ?? new BufferPools(config.chunkSize, config.batchSize);
  }

  async process(source: ByteSource, options: ProcessOptions = {}): Promise<StreamRun> {
    const reader = new ChunkReader(source, {
      minChunkSize: this.config.minChunkSize,
      logger: this.logger,
    });
    const tally: Tally = { count: 0, tokens: 0 };
    let error: Error | null = null;

    try {
      if (this.config.parallel) {
        error = await this.runParallel(reader, tally, options);
      } else {
        await this.runSequential(reader, tally, options);
      }
    } catch (err) {
      error = err instanceof Error ? err : new Error(errorMessage(err));
    } finally {
      if (reader.abandoned) {
        this.closeInBackground(source);
      } else {
        await this.closeSource(source);
      }
    }

    if (error) {
      this.logger.debug('Stream run ended early', {
        reason: error.name,
        message: error.message,
        bytes: reader.bytesConsumed,
      });
    }

    return {
      count: tally.count,
      tokens: tally.tokens,
      bytesProcessed: reader.bytesConsumed,
      error,
    };
  }

  // ---------------------------------------------------------------------------
  // Sequential path
  // ---------------------------------------------------------------------------

  private async runSequential(reader: ChunkReader, tally: Tally, options: ProcessOptions): Promise<void> {
    const { mode, cancelCheckInterval } = this.config;
    const { signal, sink } = options;

    const chunk = this.pools.chunk.acquire();
    const scratch = sink && mode !== 'chunk' ? this.pools.token.acquire() : null;
    const out = sink ? new GrowableBuffer(chunk.length * 3 + 16) : null;
    let sinceCheck = 0;

    const flush = async (): Promise<void> => {
      if (sink && out && out.length > 0) {
        await sink.write(out.toUint8Array());
        out.clear();
      }
    };

    const checkpoint = async (): Promise<void> => {
      if (sinceCheck < cancelCheckInterval) return;
      sinceCheck = 0;
      await yieldToLoop();
      throwIfAborted(signal);
    };

    try {
      let buffer = chunk;

      if (mode === 'chunk') {
        const normalizer = new ChunkNormalizer();
        for (;;) {
          const read = await reader.read(buffer, signal);
          buffer = read.buffer;
          if (read.bytesRead > 0) {
            const added = normalizer.push(buffer, read.bytesRead, out);
            tally.count += added;
            tally.tokens++;
            sinceCheck += read.bytesRead;
            await flush();
            await checkpoint();
          }
          if (read.done) break;
        }
        tally.count += normalizer.finish(out);
        await flush();
        return;
      }

      const tokenizer = createTokenizer(mode);
      const writer = new TokenWriter(scratch, out);
      const terminator = tokenTerminator(mode);
      const emit: TokenSink = (buf, start, end) => {
        tally.tokens++;
        sinceCheck++;
        if (mode === 'word') {
          tally.count++;
          if (out) writer.write(buf, start, end, terminator);
        } else {
          tally.count += writer.write(buf, start, end, terminator);
        }
      };

      for (;;) {
        const read = await reader.read(buffer, signal);
        buffer = read.buffer;
        if (read.bytesRead > 0) {
          tokenizer.push(buffer, read.bytesRead, emit);
          // bytes count too, so input without delimiters still reaches a checkpoint
          sinceCheck += read.bytesRead;
          await flush();
          await checkpoint();
        }
        if (read.done) break;
      }
      tokenizer.finish(emit);
      await flush();
    } finally {
      this.returnChunk(reader, chunk);
      if (scratch) this.pools.token.release(scratch);
    }
  }

  // ---------------------------------------------------------------------------
  // Parallel path
  // ---------------------------------------------------------------------------

  private async runParallel(reader: ChunkReader, tally: Tally, options: ProcessOptions): Promise<Error | null> {
    const { mode, workers, queueCapacity, batchSize, chunkSize } = this.config;
    const { signal, sink } = options;

    const builder = new JobBuilder(mode, this.pools.batch, batchSize, sink !== undefined, chunkSize + 64);
    const runner = this.createRunner();

    try {
      await runner.start();
    } catch (err) {
      throw new WorkerError(null, errorMessage(err));
    }

    try {
      const pool = new WorkerPool<CountJob, JobOutcome>({
        workers,
        queueCapacity,
        signal,
        logger: this.logger,
        handler: (job) => runner.run(job),
        settle: (job) => builder.settle(job),
      });

      const outcome = await pool.run(
        (dispatch) => this.produce(reader, builder, dispatch, signal),
        async (result) => {
          tally.count += result.count;
          tally.tokens += result.tokens;
          if (sink && result.output && result.output.length > 0) {
            await sink.write(result.output);
          }
        },
      );

      this.logger.debug('Parallel run finished', {
        jobs: builder.jobCount,
        folded: outcome.folded,
        runner: runner.kind,
      });
      return outcome.error;
    } finally {
      await runner.close();
    }
  }

  /**
   * Single producer: reads, resolves token boundaries and dispatches jobs in
   * sequence order. Returns as soon as the pool stops accepting work.
   */
  private async produce(
    reader: ChunkReader,
    builder: JobBuilder,
    dispatch: (job: CountJob) => Promise<boolean>,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const { mode } = this.config;
    const chunk = this.pools.chunk.acquire();

    const dispatchReady = async (): Promise<boolean> => {
      for (;;) {
        const job = builder.ready.shift();
        if (!job) return true;
        if (!(await dispatch(job))) return false;
      }
    };

    try {
      let buffer = chunk;

      if (mode === 'chunk') {
        for (;;) {
          const read = await reader.read(buffer, signal);
          buffer = read.buffer;
          if (read.bytesRead > 0) builder.addChunk(buffer, read.bytesRead);
          if (!(await dispatchReady())) return;
          if (read.done) break;
        }
        builder.finishChunks();
        await dispatchReady();
        return;
      }

      const tokenizer = createTokenizer(mode);
      const emit: TokenSink = (buf, start, end) => builder.addToken(buf, start, end);

      for (;;) {
        const read = await reader.read(buffer, signal);
        buffer = read.buffer;
        if (read.bytesRead > 0) {
          tokenizer.push(buffer, read.bytesRead, emit);
          builder.cut();
        }
        if (!(await dispatchReady())) return;
        if (read.done) break;
      }
      tokenizer.finish(emit);
      builder.cut();
      await dispatchReady();
    } finally {
      builder.discard();
      this.returnChunk(reader, chunk);
    }
  }

  private createRunner(): JobRunner {
    if (this.deps.createRunner) return this.deps.createRunner();
    if (this.config.runner === 'threads') {
      return new ThreadJobRunner({ threads: this.config.workers, logger: this.logger });
    }
    return new InlineJobRunner(this.pools.token);
  }

  /** A buffer a stalled read may still fill is dropped rather than reused. */
  private returnChunk(reader: ChunkReader, chunk: Uint8Array): void {
    if (reader.abandoned === chunk) {
      this.pools.chunk.discard(chunk);
    } else {
      this.pools.chunk.release(chunk);
    }
  }

  /**
   * Closing a source whose read is still pending may wait on that read, so
   * the run does not wait for it.
   */
  private closeInBackground(source: ByteSource): void {
    this.closeSource(source).then(
      () => this.logger.debug('Abandoned source closed'),
      (err: unknown) => this.logger.warn('Closing source failed', { error: errorMessage(err) }),
    );
  }

  private async closeSource(source: ByteSource): Promise<void> {
    if (!source.close) return;
    try {
      await source.close();
    } catch (err) {
      this.logger.warn('Closing source failed', { error: errorMessage(err) });
    }
  }
}

/**
 * Whole-buffer count for `input` in `mode`. The streaming path produces the
 * same number for any chunking of the same bytes.
 */
export function countText(input: Uint8Array | string, mode: StreamingMode): number {
  const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;

  if (mode === 'chunk') {
    const normalizer = new ChunkNormalizer();
    return normalizer.push(bytes, bytes.length, null) + normalizer.finish(null);
  }

  let count = 0;
  const emit: TokenSink = (buf, start, end) => {
    count += mode === 'word' ? 1 : normalizedLength(buf, start, end);
  };
  const tokenizer = createTokenizer(mode);
  tokenizer.push(bytes, bytes.length, emit);
  tokenizer.finish(emit);
  return count;
}
