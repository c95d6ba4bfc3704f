import { parseScoringConfig } from '../config/streaming-config.js';
import { noopLogger, type Logger } from '../shared/debug.js';
import type { ScoringConfig, ScoringConfigInput, SimilarityResult } from '../shared/types.js';
import { codePointLength, normalize } from '../text/normalizer.js';
import { scoreCounts } from './scorer.js';

/** Default decimal places for the character calculator. */
export const CHARACTER_PRECISION = 2;

export interface TextComputeOptions {
  signal?: AbortSignal;
}

/**
 * Whole-text length similarity. Subclasses decide what a unit of length is.
 * `compute` never throws; an aborted signal yields a failed result.
 */
export abstract class TextLengthSimilarity {
  abstract readonly name: string;
  protected abstract readonly unit: string;
  readonly config: ScoringConfig;

  /**
   * @throws ConfigError when the configuration is invalid
   */
  constructor(
    config: ScoringConfigInput,
    protected readonly logger: Logger = noopLogger,
  ) {
    this.config = parseScoringConfig(config);
  }

  /** Length of already normalized text. */
  protected abstract measure(normalized: string): number;

  compute(original: string, augmented: string, options: TextComputeOptions = {}): SimilarityResult {
    const start = performance.now();
    const bytesProcessed = Buffer.byteLength(original, 'utf-8') + Buffer.byteLength(augmented, 'utf-8');

    if (options.signal?.aborted) {
      this.logger.info('Similarity computation cancelled', { name: this.name });
      return Object.freeze({
        name: this.name,
        score: 0,
        passed: false,
        originalCount: 0,
        augmentedCount: 0,
        countRatio: 0,
        threshold: this.config.threshold,
        bytesProcessed: 0,
        elapsedMs: performance.now() - start,
        details: Object.freeze({ reason: 'cancelled', error: 'computation cancelled' }),
      });
    }

    const originalCount = this.measure(normalize(original));
    const augmentedCount = this.measure(normalize(augmented));
    const outcome = scoreCounts(originalCount, augmentedCount, this.config);

    const details: Record<string, unknown> = {
      unit: this.unit,
      maxDiffRatio: this.config.maxDiffRatio,
    };
    if (outcome.note) details.note = outcome.note;
    if (outcome.warning) details.warning = outcome.warning;

    return Object.freeze({
      name: this.name,
      score: outcome.score,
      passed: outcome.passed,
      originalCount,
      augmentedCount,
      countRatio: outcome.ratio,
      threshold: this.config.threshold,
      bytesProcessed,
      elapsedMs: performance.now() - start,
      details: Object.freeze(details),
    });
  }
}

/** Compares word counts of the normalized texts. */
export class WordLengthSimilarity extends TextLengthSimilarity {
  readonly name = 'length_similarity';
  protected readonly unit = 'words';

  constructor(config: ScoringConfigInput = {}, logger?: Logger) {
    super(config, logger);
  }

  protected measure(normalized: string): number {
    let words = 0;
    for (const part of normalized.split(' ')) {
      if (part.length > 0) words++;
    }
    return words;
  }
}

/**
 * Compares code point counts of the normalized texts. Scores are rounded to
 * two decimals unless another precision is configured.
 */
export class CharacterLengthSimilarity extends TextLengthSimilarity {
  readonly name = 'character_similarity';
  protected readonly unit = 'characters';

  constructor(config: ScoringConfigInput = {}, logger?: Logger) {
    super({ ...config, precision: config.precision ?? CHARACTER_PRECISION }, logger);
  }

  protected measure(normalized: string): number {
    return codePointLength(normalized);
  }
}
