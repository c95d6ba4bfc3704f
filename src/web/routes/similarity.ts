/**
 * Similarity routes. Each one validates its JSON body, runs one calculator and
 * returns the result record in snake_case.
 *
 * @module web/routes/similarity
 */

import { Hono, type Context } from 'hono';
import { z } from 'zod';

import type { Logger } from '../../shared/debug.js';
import { ConfigError } from '../../shared/errors.js';
import {
  MaxDiffRatioSchema,
  StreamingModeSchema,
  ThresholdSchema,
  type SimilarityResult,
  type StreamingConfigInput,
} from '../../shared/types.js';
import { StreamSimilarity } from '../../similarity/stream-similarity.js';
import {
  CharacterLengthSimilarity,
  WordLengthSimilarity,
} from '../../similarity/text-similarity.js';

export type AppEnv = {
  Variables: {
    defaults: StreamingConfigInput;
    logger: Logger;
    requestTimeoutMs: number;
  };
};

/** Largest chunk size a request may ask for. */
const MAX_REQUEST_CHUNK_SIZE = 1 << 20;

const TextPairSchema = z.object({
  original: z.string(),
  augmented: z.string(),
  threshold: ThresholdSchema.optional(),
  max_diff_ratio: MaxDiffRatioSchema.optional(),
});

const StreamingRequestSchema = TextPairSchema.extend({
  chunk_size: z.number().int().min(1).max(MAX_REQUEST_CHUNK_SIZE).optional(),
  mode: StreamingModeSchema.optional(),
  parallel: z.boolean().optional(),
});

type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: Response };

async function readBody<S extends z.ZodTypeAny>(c: Context<AppEnv>, schema: S): Promise<ParsedBody<z.output<S>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ error: 'request body must be valid JSON', issues: [] }, 400) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, response: c.json({ error: 'invalid request body', issues: parsed.error.issues }, 400) };
  }
  return { ok: true, data: parsed.data };
}

function toResponseBody(result: SimilarityResult) {
  return {
    name: result.name,
    score: result.score,
    passed: result.passed,
    original_count: result.originalCount,
    augmented_count: result.augmentedCount,
    count_ratio: result.countRatio,
    threshold: result.threshold,
    bytes_processed: result.bytesProcessed,
    elapsed_ms: result.elapsedMs,
    mode: result.mode ?? null,
    details: result.details,
  };
}

function statusFor(result: SimilarityResult): 200 | 500 | 504 {
  const reason = result.details.reason;
  if (reason === 'cancelled') return 504;
  if (reason !== undefined) return 500;
  return 200;
}

export const similarityRoutes = new Hono<AppEnv>();

/**
 * POST /length
 *
 * Word-count similarity of two texts.
 */
similarityRoutes.post('/length', async (c) => {
  const body = await readBody(c, TextPairSchema);
  if (!body.ok) return body.response;

  const defaults = c.get('defaults');
  const calculator = new WordLengthSimilarity(
    {
      threshold: body.data.threshold ?? defaults.threshold,
      maxDiffRatio: body.data.max_diff_ratio ?? defaults.maxDiffRatio,
    },
    c.get('logger'),
  );
  const result = calculator.compute(body.data.original, body.data.augmented);
  return c.json(toResponseBody(result), statusFor(result));
});

/**
 * POST /character
 *
 * Character-count similarity of two texts, rounded to two decimals.
 */
similarityRoutes.post('/character', async (c) => {
  const body = await readBody(c, TextPairSchema);
  if (!body.ok) return body.response;

  const defaults = c.get('defaults');
  const calculator = new CharacterLengthSimilarity(
    {
      threshold: body.data.threshold ?? defaults.threshold,
      maxDiffRatio: body.data.max_diff_ratio ?? defaults.maxDiffRatio,
      precision: defaults.precision,
    },
    c.get('logger'),
  );
  const result = calculator.compute(body.data.original, body.data.augmented);
  return c.json(toResponseBody(result), statusFor(result));
});

/**
 * POST /streaming
 *
 * Streaming similarity; the request fields override the server defaults.
 * Computations running longer than the request timeout come back as 504.
 */
similarityRoutes.post('/streaming', async (c) => {
  const body = await readBody(c, StreamingRequestSchema);
  if (!body.ok) return body.response;

  const defaults = c.get('defaults');
  let calculator: StreamSimilarity;
  try {
    calculator = new StreamSimilarity(
      {
        ...defaults,
        threshold: body.data.threshold ?? defaults.threshold,
        maxDiffRatio: body.data.max_diff_ratio ?? defaults.maxDiffRatio,
        chunkSize: body.data.chunk_size ?? defaults.chunkSize,
        mode: body.data.mode ?? defaults.mode,
        parallel: body.data.parallel ?? defaults.parallel,
      },
      { logger: c.get('logger') },
    );
  } catch (err) {
    if (err instanceof ConfigError) {
      return c.json({ error: err.message, issues: err.issues }, 400);
    }
    throw err;
  }

  const signal = AbortSignal.timeout(c.get('requestTimeoutMs'));
  const result = await calculator.computeText(body.data.original, body.data.augmented, { signal });
  return c.json(toResponseBody(result), statusFor(result));
});
