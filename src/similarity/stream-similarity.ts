import { parseStreamingConfig } from '../config/streaming-config.js';
import { noopLogger, type Logger } from '../shared/debug.js';
import { errorMessage, failureReason } from '../shared/errors.js';
import type { SimilarityResult, StreamingConfig, StreamingConfigInput } from '../shared/types.js';
import type { BufferPools } from '../stream/buffer-pool.js';
import { bufferSource, type ByteSink, type ByteSource } from '../stream/byte-source.js';
import type { JobRunner } from '../stream/jobs.js';
import { StreamProcessor, type StreamRun } from '../stream/processor.js';
import { scoreCounts } from './scorer.js';

export interface StreamSimilarityDeps {
  logger?: Logger;
  pools?: BufferPools;
  createRunner?: () => JobRunner;
}

export interface ComputeOptions {
  signal?: AbortSignal;
  /** Receive the normalized streams. */
  originalSink?: ByteSink;
  augmentedSink?: ByteSink;
}

/**
 * Length similarity of two byte streams, measured in the configured mode.
 *
 * The original stream is read to the end before the augmented one is opened.
 * `compute` never rejects: cancellation and read failures come back as a
 * failed result with `details.reason` set.
 */
export class StreamSimilarity {
  readonly name = 'streaming_length_similarity';
  readonly config: StreamingConfig;

  private readonly processor: StreamProcessor;
  private readonly logger: Logger;

  /**
   * @throws ConfigError when the configuration is invalid
   */
  constructor(config: StreamingConfigInput = {}, deps: StreamSimilarityDeps = {}) {
    this.config = parseStreamingConfig(config);
    this.logger = deps.logger ?? noopLogger;
    this.processor = new StreamProcessor(this.config, {
      logger: this.logger,
      pools: deps.pools,
      createRunner: deps.createRunner,
    });
  }

  /** Pools backing this instance; `outstanding` is 0 whenever no compute is running. */
  get pools(): BufferPools {
    return this.processor.pools;
  }

  async compute(
    original: ByteSource,
    augmented: ByteSource,
    options: ComputeOptions = {},
  ): Promise<SimilarityResult> {
    const start = performance.now();
    const { signal } = options;

    const orig = await this.processor.process(original, { signal, sink: options.originalSink });
    if (orig.error) {
      await this.closeUnread(augmented);
      return this.failed('original', orig.error, orig, null, start);
    }

    const aug = await this.processor.process(augmented, { signal, sink: options.augmentedSink });
    if (aug.error) {
      return this.failed('augmented', aug.error, orig, aug, start);
    }

    const { threshold, maxDiffRatio, precision, mode } = this.config;
    const outcome = scoreCounts(orig.count, aug.count, { threshold, maxDiffRatio, precision });

    const details: Record<string, unknown> = {
      mode,
      maxDiffRatio,
      originalTokens: orig.tokens,
      augmentedTokens: aug.tokens,
      originalBytes: orig.bytesProcessed,
      augmentedBytes: aug.bytesProcessed,
      parallel: this.config.parallel,
    };
    if (outcome.note) details.note = outcome.note;
    if (outcome.warning) details.warning = outcome.warning;

    const result = this.build({
      score: outcome.score,
      passed: outcome.passed,
      originalCount: orig.count,
      augmentedCount: aug.count,
      countRatio: outcome.ratio,
      bytesProcessed: orig.bytesProcessed + aug.bytesProcessed,
      start,
      details,
    });

    this.logger.info('Similarity computed', {
      mode,
      score: result.score,
      passed: result.passed,
      originalCount: result.originalCount,
      augmentedCount: result.augmentedCount,
      elapsedMs: result.elapsedMs,
    });
    return result;
  }

  /** Convenience wrapper over in-memory texts. */
  computeText(original: string, augmented: string, options: ComputeOptions = {}): Promise<SimilarityResult> {
    return this.compute(bufferSource(original), bufferSource(augmented), options);
  }

  private failed(
    stream: 'original' | 'augmented',
    error: Error,
    orig: StreamRun,
    aug: StreamRun | null,
    start: number,
  ): SimilarityResult {
    const reason = failureReason(error);
    const message = errorMessage(error);

    if (reason === 'cancelled') {
      this.logger.info('Similarity computation cancelled', { stream });
    } else {
      this.logger.warn('Similarity computation failed', { stream, reason, error: message });
    }

    return this.build({
      score: 0,
      passed: false,
      originalCount: orig.count,
      augmentedCount: aug?.count ?? 0,
      countRatio: 0,
      bytesProcessed: orig.bytesProcessed + (aug?.bytesProcessed ?? 0),
      start,
      details: { reason, error: message, stream, mode: this.config.mode },
    });
  }

  private build(fields: {
    score: number;
    passed: boolean;
    originalCount: number;
    augmentedCount: number;
    countRatio: number;
    bytesProcessed: number;
    start: number;
    details: Record<string, unknown>;
  }): SimilarityResult {
    return Object.freeze({
      name: this.name,
      score: fields.score,
      passed: fields.passed,
      originalCount: fields.originalCount,
      augmentedCount: fields.augmentedCount,
      countRatio: fields.countRatio,
      threshold: this.config.threshold,
      bytesProcessed: fields.bytesProcessed,
      elapsedMs: performance.now() - fields.start,
      mode: this.config.mode,
      details: Object.freeze(fields.details),
    });
  }

  /** The augmented source is never read after the original failed; release it all the same. */
  private async closeUnread(source: ByteSource): Promise<void> {
    if (!source.close) return;
    try {
      await source.close();
    } catch (err) {
      this.logger.warn('Closing unread source failed', { error: errorMessage(err) });
    }
  }
}
