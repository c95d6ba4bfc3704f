import { open, type FileHandle } from 'node:fs/promises';
import type { Writable } from 'node:stream';

/**
 * Result of one read from a byte source. A read may return zero bytes without
 * being done; the chunk reader retries those.
 */
export interface SourceRead {
  bytesRead: number;
  done: boolean;
}

/**
 * Pull-based byte source. `read` fills `target` from index 0.
 */
export interface ByteSource {
  read(target: Uint8Array): Promise<SourceRead>;
  /** Releases the underlying resource. Called once reading has finished or failed. */
  close?(): Promise<void>;
}

/** Receives normalized output. The sink owns every buffer it is given. */
export interface ByteSink {
  write(bytes: Uint8Array): Promise<void>;
}

const encoder = new TextEncoder();

function toBytes(data: Uint8Array | string): Uint8Array {
  return typeof data === 'string' ? encoder.encode(data) : data;
}

/** Source over an in-memory buffer or string. */
export function bufferSource(data: Uint8Array | string): ByteSource {
  const bytes = toBytes(data);
  let offset = 0;

  return {
    async read(target) {
      const n = Math.min(bytes.length - offset, target.length);
      target.set(bytes.subarray(offset, offset + n));
      offset += n;
      return { bytesRead: n, done: offset >= bytes.length };
    },
  };
}

async function* each<T>(pieces: AsyncIterable<T> | Iterable<T>): AsyncGenerator<T> {
  yield* pieces;
}

/**
 * Source over a (possibly async) iterable of pieces. An empty piece produces a
 * zero-byte read that is not done.
 */
export function iterableSource(
  pieces: AsyncIterable<Uint8Array | string> | Iterable<Uint8Array | string>,
): ByteSource {
  const iterator = each(pieces);
  let current: Uint8Array = new Uint8Array(0);
  let finished = false;

  return {
    async read(target) {
      if (current.length === 0) {
        if (finished) return { bytesRead: 0, done: true };
        const next = await iterator.next();
        if (next.done) {
          finished = true;
          return { bytesRead: 0, done: true };
        }
        current = toBytes(next.value);
        if (current.length === 0) return { bytesRead: 0, done: false };
      }
      const n = Math.min(current.length, target.length);
      target.set(current.subarray(0, n));
      current = current.subarray(n);
      return { bytesRead: n, done: false };
    },

    async close() {
      if (!finished) {
        finished = true;
        await iterator.return(undefined);
      }
    },
  };
}

/** Source over a file, opened on first read. */
export function fileSource(path: string): ByteSource {
  let handle: FileHandle | null = null;
  let finished = false;

  return {
    async read(target) {
      if (finished) return { bytesRead: 0, done: true };
      handle ??= await open(path, 'r');
      const { bytesRead } = await handle.read(target, 0, target.length, null);
      if (bytesRead === 0) {
        finished = true;
        return { bytesRead: 0, done: true };
      }
      return { bytesRead, done: false };
    },

    async close() {
      finished = true;
      if (handle) {
        const h = handle;
        handle = null;
        await h.close();
      }
    },
  };
}

/** Sink writing to a Node writable; each write resolves once the stream has taken it. */
export function writableSink(stream: Writable): ByteSink {
  return {
    write(bytes) {
      return new Promise<void>((resolve, reject) => {
        stream.write(bytes, (err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

export interface CollectingSink extends ByteSink {
  bytes(): Uint8Array;
  text(): string;
}

/** In-memory sink, mostly for tests and the HTTP adapter. */
export function collectingSink(): CollectingSink {
  const parts: Uint8Array[] = [];

  return {
    async write(bytes) {
      parts.push(bytes);
    },
    bytes() {
      return Buffer.concat(parts);
    },
    text() {
      return Buffer.concat(parts).toString('utf-8');
    },
  };
}
