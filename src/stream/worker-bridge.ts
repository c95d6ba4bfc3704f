/**
 * Main-thread bridge for the counting worker threads.
 *
 * ThreadJobRunner spreads jobs round-robin over a fixed set of worker threads
 * and resolves each `run` when the thread posts the outcome back. A thread
 * that errors or exits rejects every job it was holding.
 */

import { Worker } from 'node:worker_threads';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

import { noopLogger, type Logger } from '../shared/debug.js';
import type { CountJob, JobOutcome, JobRunner } from './jobs.js';

/** Timeout for a thread to report ready. */
const STARTUP_TIMEOUT_MS = 10_000;

/** Timeout for a single job. */
const JOB_TIMEOUT_MS = 30_000;

/** Grace period before a thread that ignores shutdown is terminated. */
const SHUTDOWN_TIMEOUT_MS = 5_000;

interface PendingJob {
  resolve: (outcome: JobOutcome) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  thread: Worker;
}

interface ReadyMessage {
  type: 'ready';
}

interface JobResultMessage {
  type: 'job_result';
  id: number;
  outcome: JobOutcome;
}

interface JobErrorMessage {
  type: 'job_error';
  id: number;
  message: string;
}

type WorkerResponse = ReadyMessage | JobResultMessage | JobErrorMessage;

export interface ThreadJobRunnerOptions {
  threads: number;
  /** Defaults to worker.js beside this module in dist/. */
  workerPath?: string;
  /** Node options for each thread, e.g. a loader for running from sources. */
  execArgv?: string[];
  logger?: Logger;
}

export class ThreadJobRunner implements JobRunner {
  readonly kind = 'threads';

  private readonly threads: Worker[] = [];
  private readonly pending = new Map<number, PendingJob>();
  private readonly workerPath: string;
  private readonly logger: Logger;
  private nextId = 0;
  private nextThread = 0;

  constructor(private readonly options: ThreadJobRunnerOptions) {
    if (options.workerPath) {
      this.workerPath = options.workerPath;
    } else {
      const thisDir = dirname(fileURLToPath(import.meta.url));
      this.workerPath = join(thisDir, 'worker.js');
    }
    this.logger = options.logger ?? noopLogger;
  }

  /** Threads started and ready. */
  get size(): number {
    return this.threads.length;
  }

  /**
   * Starts every thread and waits for each one's ready message. If any thread
   * fails to start, the ones already running are shut down again.
   */
  async start(): Promise<void> {
    const count = Math.max(1, this.options.threads);
    try {
      for (let i = 0; i < count; i++) {
        this.threads.push(await this.spawn());
      }
    } catch (err) {
      await this.close();
      throw err;
    }
    this.logger.debug('Worker threads ready', { threads: this.threads.length });
  }

  run(job: CountJob): Promise<JobOutcome> {
    if (this.threads.length === 0) {
      return Promise.reject(new Error('thread runner is not started'));
    }

    const thread = this.threads[this.nextThread++ % this.threads.length];
    const id = this.nextId++;

    return new Promise<JobOutcome>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`job ${job.sequence} timed out after ${JOB_TIMEOUT_MS}ms`));
      }, JOB_TIMEOUT_MS);

      this.pending.set(id, { resolve, reject, timer, thread });
      thread.postMessage({ type: 'job', id, job });
    });
  }

  /**
   * Sends shutdown to every thread and waits for them to exit.
   */
  async close(): Promise<void> {
    const threads = this.threads.splice(0);
    await Promise.all(threads.map((t) => this.shutdown(t)));
    this.rejectPending(null, new Error('thread runner closed'));
  }

  private spawn(): Promise<Worker> {
    return new Promise<Worker>((resolve, reject) => {
      let settled = false;
      const fail = (err: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(err);
      };

      const timer = setTimeout(() => {
        this.logger.warn('Worker thread startup timed out');
        fail(new Error('worker thread startup timed out'));
      }, STARTUP_TIMEOUT_MS);

      let thread: Worker;
      try {
        thread = new Worker(this.workerPath, { execArgv: this.options.execArgv });
      } catch (err) {
        fail(err instanceof Error ? err : new Error(String(err)));
        return;
      }

      thread.on('message', (msg: WorkerResponse) => {
        if (msg.type === 'ready') {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          resolve(thread);
          return;
        }
        this.handleMessage(msg);
      });

      thread.on('error', (err) => {
        this.logger.error('Worker thread error', { error: String(err) });
        fail(err);
        this.rejectPending(thread, err);
      });

      thread.on('exit', (code) => {
        this.logger.debug('Worker thread exited', { code });
        fail(new Error(`worker thread exited with code ${code} before it was ready`));
        this.rejectPending(thread, new Error(`worker thread exited with code ${code}`));
        const idx = this.threads.indexOf(thread);
        if (idx !== -1) this.threads.splice(idx, 1);
      });
    });
  }

  private shutdown(thread: Worker): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn('Worker thread shutdown timed out, terminating');
        thread.terminate().then(
          () => resolve(),
          (err: unknown) => {
            this.logger.error('Worker thread terminate failed', { error: String(err) });
            resolve();
          },
        );
      }, SHUTDOWN_TIMEOUT_MS);

      thread.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
      thread.postMessage({ type: 'shutdown' });
    });
  }

  private handleMessage(msg: JobResultMessage | JobErrorMessage): void {
    const req = this.pending.get(msg.id);
    if (!req) return;

    clearTimeout(req.timer);
    this.pending.delete(msg.id);

    if (msg.type === 'job_result') {
      req.resolve(msg.outcome);
    } else {
      req.reject(new Error(msg.message));
    }
  }

  /** Rejects the jobs held by `thread`, or every job when `thread` is null. */
  private rejectPending(thread: Worker | null, err: Error): void {
    for (const [id, req] of this.pending) {
      if (thread !== null && req.thread !== thread) continue;
      clearTimeout(req.timer);
      this.pending.delete(id);
      req.reject(err);
    }
  }
}
