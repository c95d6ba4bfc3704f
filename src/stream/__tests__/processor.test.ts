import { describe, it, expect } from 'vitest';

import { parseStreamingConfig } from '../../config/streaming-config.js';
import { CancelledError, StreamReadError, WorkerError } from '../../shared/errors.js';
import type { StreamingConfigInput, StreamingMode } from '../../shared/types.js';
import { bufferSource, collectingSink, type SourceRead } from '../byte-source.js';
import { processJob, type JobRunner } from '../jobs.js';
import { StreamProcessor, countText, type StreamProcessorDeps } from '../processor.js';
import { CORPUS, endlessSource, failingSource, slicedSource, toBytes } from './test-utils.js';

const MODES: StreamingMode[] = ['chunk', 'line', 'word'];

function processor(config: StreamingConfigInput, deps?: StreamProcessorDeps): StreamProcessor {
  return new StreamProcessor(parseStreamingConfig(config), deps);
}

describe('countText', () => {
  it('counts words', () => {
    expect(countText('The quick brown fox jumps over the lazy dog.', 'word')).toBe(9);
  });

  it('sums normalized line lengths', () => {
    // "hello world " (12) + "foo" (3)
    expect(countText('Hello, World!\nfoo', 'line')).toBe(15);
  });

  it('counts code points of the normalized stream', () => {
    expect(countText('Hello, World!', 'chunk')).toBe(12);
  });

  it('counts one replacement character per byte of a malformed sequence', () => {
    // a, three U+FFFD, b
    expect(countText(Uint8Array.from([0x61, 0xe0, 0x80, 0x80, 0x62]), 'chunk')).toBe(5);
    expect(countText(Uint8Array.from([0x61, 0xc0, 0xaf, 0x62]), 'chunk')).toBe(4);
    expect(countText(Uint8Array.from([0x78, 0xc1, 0x81, 0x79]), 'word')).toBe(2);
  });

  it('returns 0 for empty input in every mode', () => {
    for (const mode of MODES) {
      expect(countText('', mode)).toBe(0);
    }
  });
});

describe('StreamProcessor (sequential)', () => {
  it.each(MODES)('%s mode gives the same count for every chunk size', async (mode) => {
    for (const input of CORPUS) {
      const bytes = toBytes(input);
      const expected = countText(bytes, mode);
      for (const size of [1, 7, 64, 8192]) {
        const run = await processor({ mode, chunkSize: size }).process(slicedSource(bytes, size));
        expect(run.error).toBeNull();
        expect(run.count).toBe(expected);
        expect(run.bytesProcessed).toBe(bytes.length);
      }
    }
  });

  it('writes word tokens followed by a space', async () => {
    const sink = collectingSink();
    await processor({ mode: 'word' }).process(bufferSource('Hello, World'), { sink });
    expect(sink.text()).toBe('hello world ');
  });

  it('writes one normalized line per line', async () => {
    const sink = collectingSink();
    await processor({ mode: 'line' }).process(bufferSource('A\nB'), { sink });
    expect(sink.text()).toBe('a\nb\n');
  });

  it('writes the normalized stream in chunk mode', async () => {
    const sink = collectingSink();
    const run = await processor({ mode: 'chunk', chunkSize: 2 }).process(bufferSource('A, B'), { sink });
    expect(sink.text()).toBe('a b');
    expect(run.count).toBe(3);
  });

  it('counts lines as tokens in line mode', async () => {
    const run = await processor({ mode: 'line' }).process(bufferSource('one\n\ntwo\n'));
    expect(run).toMatchObject({ count: 6, tokens: 3, error: null });
  });

  it('stops with CancelledError when the signal fires mid-stream', async () => {
    const controller = new AbortController();
    const source = endlessSource('word ', controller, 3);
    const p = processor({ mode: 'word', cancelCheckInterval: 1 });

    const run = await p.process(source, { signal: controller.signal });

    expect(run.error).toBeInstanceOf(CancelledError);
    expect(source.reads).toBe(3);
    expect(p.pools.outstanding).toBe(0);
  });

  it('reaches a cancellation check on input without delimiters', async () => {
    const bytes = new Uint8Array(8 << 20).fill(0x78);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 1);

    const run = await processor({ mode: 'word', chunkSize: 8192 }).process(slicedSource(bytes, 8192), {
      signal: controller.signal,
    });

    expect(run.error).toBeInstanceOf(CancelledError);
    expect(run.bytesProcessed).toBeLessThan(bytes.length);
  });

  it('drops the buffer of a read abandoned on cancellation', async () => {
    const controller = new AbortController();
    const p = processor({ mode: 'line' });
    setTimeout(() => controller.abort(), 20);

    const run = await p.process({ read: () => new Promise<SourceRead>(() => {}) }, { signal: controller.signal });

    expect(run.error).toBeInstanceOf(CancelledError);
    expect(p.pools.outstanding).toBe(0);
    expect(p.pools.chunk.idleCount).toBe(0);
  });

  it('keeps the partial count when the source fails', async () => {
    const p = processor({ mode: 'word' });
    const run = await p.process(failingSource('ab ', 2));

    expect(run.error).toBeInstanceOf(StreamReadError);
    expect(run.error?.message).toBe('read failed: disk on fire');
    expect(run.count).toBe(2);
    expect(run.bytesProcessed).toBe(6);
    expect(p.pools.outstanding).toBe(0);
  });

  it('closes the source however the run ends', async () => {
    let closed = 0;
    const source = {
      ...failingSource('x', 0),
      async close() {
        closed++;
      },
    };
    await processor({ mode: 'word' }).process(source);
    expect(closed).toBe(1);
  });

  it('does not fail the run when closing the source fails', async () => {
    const source = {
      ...bufferSource('a b'),
      async close() {
        throw new Error('close failed');
      },
    };
    const run = await processor({ mode: 'word' }).process(source);
    expect(run).toMatchObject({ count: 2, error: null });
  });
});

describe('StreamProcessor (parallel)', () => {
  it.each([1, 2, 8])('matches the sequential count with %i workers', async (workers) => {
    for (const mode of MODES) {
      for (const input of CORPUS) {
        const bytes = toBytes(input);
        const sequential = await processor({ mode, chunkSize: 7 }).process(slicedSource(bytes, 7));
        const p = processor({ mode, chunkSize: 7, batchSize: 2, parallel: true, workers });
        const parallel = await p.process(slicedSource(bytes, 7));

        expect(parallel.error).toBeNull();
        expect(parallel.count).toBe(sequential.count);
        expect(parallel.bytesProcessed).toBe(bytes.length);
        expect(p.pools.outstanding).toBe(0);
      }
    }
  });

  it('writes the same sink output as the sequential path', async () => {
    for (const mode of MODES) {
      for (const input of CORPUS) {
        const bytes = toBytes(input);
        const expected = collectingSink();
        await processor({ mode, chunkSize: 5 }).process(slicedSource(bytes, 5), { sink: expected });

        const actual = collectingSink();
        await processor({ mode, chunkSize: 5, batchSize: 3, parallel: true, workers: 4 }).process(
          slicedSource(bytes, 5),
          { sink: actual },
        );
        expect(actual.text()).toBe(expected.text());
      }
    }
  });

  it('reports the failing job and keeps the results folded before it', async () => {
    const failing: JobRunner = {
      kind: 'inline',
      async start() {},
      async run(job) {
        if (job.sequence === 1) throw new Error('boom');
        return processJob(job, null);
      },
      async close() {},
    };
    const p = processor(
      { mode: 'word', parallel: true, workers: 1, batchSize: 2, chunkSize: 64 },
      { createRunner: () => failing },
    );

    const run = await p.process(bufferSource('a b c d e f'));

    expect(run.error).toBeInstanceOf(WorkerError);
    expect(run.error?.message).toBe('job 1 failed: boom');
    expect(run.count).toBe(2);
    expect(p.pools.outstanding).toBe(0);
  });

  it('reports a runner that cannot start as a worker failure', async () => {
    const broken: JobRunner = {
      kind: 'threads',
      async start() {
        throw new Error('no threads');
      },
      async run() {
        throw new Error('unreachable');
      },
      async close() {},
    };
    const run = await processor(
      { mode: 'word', parallel: true, workers: 2 },
      { createRunner: () => broken },
    ).process(bufferSource('a b'));

    expect(run.error).toBeInstanceOf(WorkerError);
    expect(run.error?.message).toBe('workers failed: no threads');
    expect(run.count).toBe(0);
  });

  it('stops with CancelledError and returns every pooled buffer', async () => {
    const controller = new AbortController();
    const source = endlessSource('some words here ', controller, 4);
    const p = processor({ mode: 'word', parallel: true, workers: 2, batchSize: 2 });

    const run = await p.process(source, { signal: controller.signal });

    expect(run.error).toBeInstanceOf(CancelledError);
    expect(p.pools.outstanding).toBe(0);
  });
});
