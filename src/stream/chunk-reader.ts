import { setImmediate as yieldToLoop } from 'node:timers/promises';

import { CancelledError, StreamReadError, errorMessage, throwIfAborted } from '../shared/errors.js';
import { noopLogger, type Logger } from '../shared/debug.js';
import type { ByteSource, SourceRead } from './byte-source.js';

export interface ChunkRead {
  /** Buffer holding the bytes; the caller's buffer unless it was below `minChunkSize`. */
  buffer: Uint8Array;
  bytesRead: number;
  done: boolean;
}

export interface ChunkReaderOptions {
  minChunkSize?: number;
  logger?: Logger;
}

/**
 * Pulls chunks from a byte source into caller-owned buffers.
 *
 * Zero-byte reads that are not end-of-stream are retried after yielding to the
 * event loop. Every attempt checks the abort signal first, and a read still in
 * flight when the signal fires is abandoned with CancelledError.
 */
export class ChunkReader {
  private consumed = 0;
  private emptyReads = 0;
  private abandonedBuffer: Uint8Array | null = null;
  private readonly minChunkSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly source: ByteSource,
    options: ChunkReaderOptions = {},
  ) {
    this.minChunkSize = Math.max(1, options.minChunkSize ?? 1);
    this.logger = options.logger ?? noopLogger;
  }

  /** Total bytes handed out so far. */
  get bytesConsumed(): number {
    return this.consumed;
  }

  /** Zero-byte reads that were retried. */
  get emptyReadCount(): number {
    return this.emptyReads;
  }

  /**
   * Buffer of a read that was abandoned on cancellation. The source may still
   * write into it, so it must not be reused.
   */
  get abandoned(): Uint8Array | null {
    return this.abandonedBuffer;
  }

  async read(buffer: Uint8Array, signal?: AbortSignal): Promise<ChunkRead> {
    let target = buffer;
    if (target.length < this.minChunkSize) {
      this.logger.debug('Replacing undersized read buffer', {
        size: target.length,
        minChunkSize: this.minChunkSize,
      });
      target = new Uint8Array(this.minChunkSize);
    }

    for (;;) {
      throwIfAborted(signal);

      let bytesRead: number;
      let done: boolean;
      try {
        ({ bytesRead, done } = await this.readOnce(target, signal));
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        throw new StreamReadError(`read failed: ${errorMessage(err)}`, { cause: err });
      }

      if (bytesRead < 0 || bytesRead > target.length) {
        throw new StreamReadError(`source reported ${bytesRead} bytes for a ${target.length}-byte buffer`);
      }

      if (bytesRead > 0 || done) {
        this.consumed += bytesRead;
        return { buffer: target, bytesRead, done };
      }

      this.emptyReads++;
      await yieldToLoop();
    }
  }

  private readOnce(target: Uint8Array, signal: AbortSignal | undefined): Promise<SourceRead> {
    const pending = this.source.read(target);
    if (!signal) return pending;

    return new Promise<SourceRead>((resolve, reject) => {
      const onAbort = (): void => {
        this.abandonedBuffer = target;
        this.logger.debug('Abandoning a read in flight', { size: target.length });
        reject(new CancelledError());
      };
      signal.addEventListener('abort', onAbort, { once: true });
      pending.then(
        (read) => {
          signal.removeEventListener('abort', onAbort);
          resolve(read);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }
}
