import { z } from 'zod';

import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CANCEL_CHECK_INTERVAL,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_DIFF_RATIO,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_THRESHOLD,
  defaultWorkerCount,
} from './config.js';

// =============================================================================
// Streaming configuration
// =============================================================================

export const STREAMING_MODES = ['chunk', 'line', 'word'] as const;

/**
 * How a stream is measured:
 * - chunk: code points of the normalized stream
 * - line: code points of every normalized line, summed
 * - word: number of word tokens
 */
export type StreamingMode = (typeof STREAMING_MODES)[number];

export const StreamingModeSchema = z.enum(STREAMING_MODES);

export const JOB_RUNNERS = ['inline', 'threads'] as const;

/** Where parallel jobs execute: on the event loop, or on worker threads. */
export type JobRunnerKind = (typeof JOB_RUNNERS)[number];

export const ThresholdSchema = z.number().min(0).max(1);

export const MaxDiffRatioSchema = z.number().positive().finite();

export const PrecisionSchema = z.number().int().min(0).max(15);

/**
 * Input shape accepted by StreamSimilarity and the HTTP adapter.
 * Every field is optional; `parseStreamingConfig` fills in defaults.
 */
export const StreamingConfigSchema = z.object({
  chunkSize: z.number().int().min(1).default(DEFAULT_CHUNK_SIZE),
  batchSize: z.number().int().min(1).default(DEFAULT_BATCH_SIZE),
  mode: StreamingModeSchema.default('line'),
  parallel: z.boolean().default(false),
  workers: z.number().int().min(1).optional(),
  runner: z.enum(JOB_RUNNERS).default('inline'),
  threshold: ThresholdSchema.default(DEFAULT_THRESHOLD),
  maxDiffRatio: MaxDiffRatioSchema.default(DEFAULT_MAX_DIFF_RATIO),
  precision: PrecisionSchema.optional(),
  minChunkSize: z.number().int().min(1).default(1),
  cancelCheckInterval: z.number().int().min(1).default(DEFAULT_CANCEL_CHECK_INTERVAL),
  queueCapacity: z.number().int().min(1).default(DEFAULT_QUEUE_CAPACITY),
});

export type StreamingConfigInput = z.input<typeof StreamingConfigSchema>;

/** Validated, immutable streaming configuration. */
export type StreamingConfig = Readonly<
  Omit<z.output<typeof StreamingConfigSchema>, 'workers'> & { workers: number }
>;

/**
 * Scoring parameters shared by the streaming and non-streaming calculators.
 */
export const ScoringConfigSchema = z.object({
  threshold: ThresholdSchema.default(DEFAULT_THRESHOLD),
  maxDiffRatio: MaxDiffRatioSchema.default(DEFAULT_MAX_DIFF_RATIO),
  precision: PrecisionSchema.optional(),
});

export type ScoringConfigInput = z.input<typeof ScoringConfigSchema>;

export type ScoringConfig = Readonly<z.output<typeof ScoringConfigSchema>>;

// =============================================================================
// Results
// =============================================================================

/**
 * Outcome of one similarity computation. Frozen once built.
 *
 * `details` carries machine-readable context: `reason` (`cancelled`,
 * `io_error`, `worker_error`), `error`, `stream`, `note`, `warning`.
 */
export interface SimilarityResult {
  readonly name: string;
  readonly score: number;
  readonly passed: boolean;
  readonly originalCount: number;
  readonly augmentedCount: number;
  readonly countRatio: number;
  readonly threshold: number;
  readonly bytesProcessed: number;
  readonly elapsedMs: number;
  readonly mode?: StreamingMode;
  readonly details: Readonly<Record<string, unknown>>;
}

/** Count produced by one run of the stream processor over a single source. */
export interface StreamCount {
  /** Mode-dependent length: tokens (word) or normalized code points (line, chunk). */
  count: number;
  /** Tokens emitted by the tokenizer (lines in line mode, chunks in chunk mode). */
  tokens: number;
  bytesProcessed: number;
}
