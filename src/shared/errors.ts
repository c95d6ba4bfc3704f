/**
 * Error taxonomy for the similarity core.
 *
 * Only constructors throw (ConfigError). Everything raised while reading or
 * tokenizing a stream is caught by the orchestrator and attached to the
 * result record as a machine-readable reason.
 */

import type { ZodIssue } from 'zod';

export type FailureReason = 'cancelled' | 'io_error' | 'worker_error';

export class ConfigError extends Error {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class CancelledError extends Error {
  constructor(message = 'computation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class StreamReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamReadError';
  }
}

/**
 * A job failed in a worker, or the workers could not be started
 * (`sequence` is null then).
 */
export class WorkerError extends Error {
  readonly sequence: number | null;

  constructor(sequence: number | null, message: string) {
    super(sequence === null ? `workers failed: ${message}` : `job ${sequence} failed: ${message}`);
    this.name = 'WorkerError';
    this.sequence = sequence;
  }
}

/**
 * Maps any failure surfaced by a stream run to its reason code.
 */
export function failureReason(err: unknown): FailureReason {
  if (err instanceof CancelledError) return 'cancelled';
  if (err instanceof WorkerError) return 'worker_error';
  return 'io_error';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Throws CancelledError when the signal has fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
