// length-gate library entry point

export * from './shared/types.js';
export * from './shared/errors.js';
export { createLogger, noopLogger, type Logger, type LogLevel } from './shared/debug.js';
export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CANCEL_CHECK_INTERVAL,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_DIFF_RATIO,
  DEFAULT_PORT,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_THRESHOLD,
} from './shared/config.js';
export { loadStreamingConfig, parseScoringConfig, parseStreamingConfig } from './config/streaming-config.js';

export { normalize, normalizeInto, normalizedCapacity, normalizedLength } from './text/normalizer.js';

export {
  bufferSource,
  collectingSink,
  fileSource,
  iterableSource,
  writableSink,
  type ByteSink,
  type ByteSource,
  type CollectingSink,
  type SourceRead,
} from './stream/byte-source.js';
export { ChunkReader, type ChunkRead } from './stream/chunk-reader.js';
export { BufferPool, BufferPools, type BufferPurpose } from './stream/buffer-pool.js';
export { LineTokenizer, WordTokenizer, createTokenizer, tokenize } from './stream/tokenizer.js';
export type { Tokenizer, TokenizerState, TokenSink } from './stream/tokenizer.js';
export { StreamProcessor, countText, type StreamRun } from './stream/processor.js';
export { InlineJobRunner, type JobRunner } from './stream/jobs.js';
export { ThreadJobRunner } from './stream/worker-bridge.js';

export { scoreCounts, roundTo, type ScoreOutcome, type ScoreParams } from './similarity/scorer.js';
export { StreamSimilarity, type ComputeOptions } from './similarity/stream-similarity.js';
export { CharacterLengthSimilarity, WordLengthSimilarity } from './similarity/text-similarity.js';

export { createSimilarityServer, startWebServer } from './web/server.js';
