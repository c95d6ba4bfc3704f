import { describe, it, expect, vi } from 'vitest';

import { ConfigError } from '../../shared/errors.js';
import { bufferSource, collectingSink, type SourceRead } from '../../stream/byte-source.js';
import { failingSource } from '../../stream/__tests__/test-utils.js';
import { StreamSimilarity } from '../stream-similarity.js';

const FOX = 'The quick brown fox jumps over the lazy dog.';
const CANINE = 'A quick brown canine leaps over one lazy dog.';

describe('StreamSimilarity', () => {
  it('scores texts with the same word count 1', async () => {
    const sim = new StreamSimilarity({ mode: 'word' });
    const result = await sim.computeText(FOX, CANINE);

    expect(result).toMatchObject({
      name: 'streaming_length_similarity',
      score: 1,
      passed: true,
      originalCount: 9,
      augmentedCount: 9,
      countRatio: 1,
      threshold: 0.7,
      mode: 'word',
    });
    expect(result.bytesProcessed).toBe(FOX.length + CANINE.length);
    expect(result.details).toMatchObject({ originalTokens: 9, augmentedTokens: 9, parallel: false });
  });

  it('scores two empty streams 1', async () => {
    const result = await new StreamSimilarity().computeText('', '');
    expect(result).toMatchObject({ score: 1, passed: true, originalCount: 0, augmentedCount: 0 });
    expect(result.details.note).toBe('both inputs are empty');
  });

  it('scores an empty original 0', async () => {
    const result = await new StreamSimilarity().computeText('', 'non-empty');
    expect(result).toMatchObject({ score: 0, passed: false, countRatio: 0 });
    expect(result.details.warning).toBe('original input is empty');
  });

  it('returns a frozen result', async () => {
    const result = await new StreamSimilarity().computeText('a', 'a');
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.details)).toBe(true);
  });

  it('does not read the augmented stream once the original was cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const read = vi.fn(async (_target: Uint8Array) => ({ bytesRead: 0, done: true }));
    const close = vi.fn(async () => {});

    const sim = new StreamSimilarity({ mode: 'word' });
    const result = await sim.compute(bufferSource(FOX), { read, close }, { signal: controller.signal });

    expect(result).toMatchObject({ score: 0, passed: false, originalCount: 0, augmentedCount: 0 });
    expect(result.details).toEqual({
      reason: 'cancelled',
      error: 'computation cancelled',
      stream: 'original',
      mode: 'word',
    });
    expect(read).not.toHaveBeenCalled();
    expect(close).toHaveBeenCalledTimes(1);
    expect(sim.pools.outstanding).toBe(0);
  });

  it('returns a cancelled result when a read stalls past the abort', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);
    const stalledClose = vi.fn(async () => {});
    const read = vi.fn(async (_target: Uint8Array) => ({ bytesRead: 0, done: true }));

    const sim = new StreamSimilarity({ mode: 'word' });
    const result = await sim.compute(
      { read: () => new Promise<SourceRead>(() => {}), close: stalledClose },
      { read },
      { signal: controller.signal },
    );

    expect(result.passed).toBe(false);
    expect(result.details).toMatchObject({ reason: 'cancelled', stream: 'original' });
    expect(read).not.toHaveBeenCalled();
    expect(stalledClose).toHaveBeenCalledTimes(1);
    expect(sim.pools.outstanding).toBe(0);
  });

  it('reports a failing augmented stream as an I/O error', async () => {
    const sim = new StreamSimilarity({ mode: 'word' });
    const result = await sim.compute(bufferSource('a b'), failingSource('x y ', 1));

    expect(result).toMatchObject({
      score: 0,
      passed: false,
      originalCount: 2,
      augmentedCount: 2,
      bytesProcessed: 7,
    });
    expect(result.details).toEqual({
      reason: 'io_error',
      error: 'read failed: disk on fire',
      stream: 'augmented',
      mode: 'word',
    });
  });

  it('gives the same counts in parallel mode', async () => {
    const original = `${FOX}\n`.repeat(50);
    const augmented = `${CANINE}\n`.repeat(45);

    for (const mode of ['chunk', 'line', 'word'] as const) {
      const sequential = await new StreamSimilarity({ mode, chunkSize: 16 }).computeText(original, augmented);
      const sim = new StreamSimilarity({ mode, chunkSize: 16, batchSize: 4, parallel: true, workers: 3 });
      const parallel = await sim.computeText(original, augmented);

      expect(parallel.originalCount).toBe(sequential.originalCount);
      expect(parallel.augmentedCount).toBe(sequential.augmentedCount);
      expect(parallel.score).toBe(sequential.score);
      expect(parallel.details.parallel).toBe(true);
      expect(sim.pools.outstanding).toBe(0);
    }
  });

  it('writes both normalized streams to their sinks', async () => {
    const originalSink = collectingSink();
    const augmentedSink = collectingSink();
    await new StreamSimilarity({ mode: 'word' }).computeText('Hello, World', 'HELLO there', {
      originalSink,
      augmentedSink,
    });

    expect(originalSink.text()).toBe('hello world ');
    expect(augmentedSink.text()).toBe('hello there ');
  });

  it('throws ConfigError for an invalid configuration', () => {
    expect(() => new StreamSimilarity({ chunkSize: 0 })).toThrow(ConfigError);
    expect(() => new StreamSimilarity({ threshold: 1.5 })).toThrow(/threshold/);
  });
});
