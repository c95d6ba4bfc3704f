import { availableParallelism, homedir } from 'node:os';
import { mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Cached debug-enabled flag.
 * Resolved once per process -- debug mode does not change at runtime.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `LENGTH_GATE_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `<configDir>/config.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.LENGTH_GATE_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  try {
    const configPath = join(getConfigDir(), 'config.json');
    const raw = readFileSync(configPath, 'utf-8');
    const config: unknown = JSON.parse(raw);
    if (typeof config === 'object' && config !== null && 'debug' in config && config.debug === true) {
      _debugCached = true;
      return true;
    }
  } catch {
    // Config file doesn't exist or is invalid -- debug stays off
  }

  _debugCached = false;
  return false;
}

/**
 * Returns the configuration directory.
 * Default: ~/.length-gate/
 *
 * `LENGTH_GATE_CONFIG_DIR` redirects it, which is how tests point the
 * loaders at a temp directory.
 */
export function getConfigDir(): string {
  const dir = process.env.LENGTH_GATE_CONFIG_DIR || join(homedir(), '.length-gate');
  mkdirSync(dir, { recursive: true });
  return dir;
}

/** Default bytes pulled from a source per read. */
export const DEFAULT_CHUNK_SIZE = 8192;

/** Default number of tokens copied into one parallel job. */
export const DEFAULT_BATCH_SIZE = 1000;

/** Tokens emitted plus bytes read between two cancellation checks on the sequential path. */
export const DEFAULT_CANCEL_CHECK_INTERVAL = 5000;

/** Maximum number of jobs waiting for a worker. */
export const DEFAULT_QUEUE_CAPACITY = 32;

export const DEFAULT_THRESHOLD = 0.7;

export const DEFAULT_MAX_DIFF_RATIO = 0.3;

/** Default HTTP port for the adapter server. */
export const DEFAULT_PORT = 37900;

/**
 * Number of worker tasks used in parallel mode when none is configured.
 */
export function defaultWorkerCount(): number {
  return Math.max(1, availableParallelism());
}
