// ---------------------------------------------------------------------------
// Streaming Configuration
// ---------------------------------------------------------------------------
// Validation of the streaming/scoring configuration objects, and the optional
// streaming.json file in the config directory that supplies defaults for the
// HTTP server.
// ---------------------------------------------------------------------------

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { z, ZodIssue } from 'zod';

import { debug } from '../shared/debug.js';
import { defaultWorkerCount, getConfigDir } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import {
  ScoringConfigSchema,
  StreamingConfigSchema,
  type ScoringConfig,
  type ScoringConfigInput,
  type StreamingConfig,
  type StreamingConfigInput,
} from '../shared/types.js';

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validates a streaming configuration and fills in defaults.
 *
 * @throws ConfigError carrying the zod issues
 */
export function parseStreamingConfig(input: StreamingConfigInput = {}): StreamingConfig {
  const parsed = StreamingConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      `invalid streaming configuration: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }
  return Object.freeze({
    ...parsed.data,
    workers: parsed.data.workers ?? defaultWorkerCount(),
  });
}

/**
 * @throws ConfigError carrying the zod issues
 */
export function parseScoringConfig(input: ScoringConfigInput = {}): ScoringConfig {
  const parsed = ScoringConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      `invalid scoring configuration: ${formatIssues(parsed.error.issues)}`,
      parsed.error.issues,
    );
  }
  return Object.freeze(parsed.data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field<S extends z.ZodTypeAny>(
  raw: Record<string, unknown>,
  key: string,
  schema: S,
): z.output<S> | undefined {
  if (!(key in raw)) return undefined;
  const parsed = schema.safeParse(raw[key]);
  if (!parsed.success) {
    debug('config', 'Ignoring invalid streaming setting', { key, issue: parsed.error.issues[0]?.message });
    return undefined;
  }
  return parsed.data;
}

/**
 * Loads streaming defaults from `<configDir>/streaming.json`.
 *
 * Every field is checked on its own; a missing or invalid field comes back
 * undefined so the built-in default applies. A missing or unreadable file
 * yields `{}`.
 */
export function loadStreamingConfig(): StreamingConfigInput {
  const configPath = join(getConfigDir(), 'streaming.json');

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    debug('config', 'Loaded streaming config', { path: configPath });
  } catch {
    // File doesn't exist or is invalid -- use all defaults
    debug('config', 'No streaming config found, using defaults');
    return {};
  }

  if (!isRecord(raw)) {
    debug('config', 'Streaming config is not an object, using defaults');
    return {};
  }

  const shape = StreamingConfigSchema.shape;
  return {
    chunkSize: field(raw, 'chunkSize', shape.chunkSize),
    batchSize: field(raw, 'batchSize', shape.batchSize),
    mode: field(raw, 'mode', shape.mode),
    parallel: field(raw, 'parallel', shape.parallel),
    workers: field(raw, 'workers', shape.workers),
    runner: field(raw, 'runner', shape.runner),
    threshold: field(raw, 'threshold', shape.threshold),
    maxDiffRatio: field(raw, 'maxDiffRatio', shape.maxDiffRatio),
    precision: field(raw, 'precision', shape.precision),
    minChunkSize: field(raw, 'minChunkSize', shape.minChunkSize),
    cancelCheckInterval: field(raw, 'cancelCheckInterval', shape.cancelCheckInterval),
    queueCapacity: field(raw, 'queueCapacity', shape.queueCapacity),
  };
}
