import { CancelledError, WorkerError, errorMessage } from '../shared/errors.js';
import { noopLogger, type Logger } from '../shared/debug.js';
import { BoundedQueue } from './bounded-queue.js';
import { OrderedReassembler } from './reassembler.js';

export interface SequencedJob {
  readonly sequence: number;
}

type JobResult<R> =
  | { ok: true; sequence: number; value: R }
  | { ok: false; sequence: number; message: string };

export interface WorkerPoolOptions<J extends SequencedJob, R> {
  workers: number;
  queueCapacity: number;
  handler: (job: J) => Promise<R>;
  /**
   * Called exactly once per job handed to `dispatch`, after it ran or was
   * dropped. Ownership of the job's buffers ends here.
   */
  settle?: (job: J) => void;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface PoolOutcome {
  /** First failure: cancellation, a producer error or a WorkerError. */
  error: Error | null;
  /** Results folded, in order. */
  folded: number;
}

/**
 * Fixed set of worker tasks fed from a bounded job queue, with results folded
 * back in sequence order by the single consumer.
 *
 * On the first failure the pool stops accepting jobs, drops queued ones, lets
 * in-flight jobs finish and keeps folding whatever is still contiguous, so the
 * accumulated total is a best-effort partial.
 */
export class WorkerPool<J extends SequencedJob, R> {
  private readonly logger: Logger;

  constructor(private readonly options: WorkerPoolOptions<J, R>) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new RangeError(`workers must be a positive integer, got ${options.workers}`);
    }
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Runs `produce` as the only producer. `dispatch` resolves false once the
   * pool has stopped accepting work; the producer should return then.
   * `fold` sees every result in sequence order.
   */
  async run(
    produce: (dispatch: (job: J) => Promise<boolean>) => Promise<void>,
    fold: (value: R, sequence: number) => void | Promise<void>,
  ): Promise<PoolOutcome> {
    const { workers, queueCapacity, handler, settle, signal } = this.options;
    const jobs = new BoundedQueue<J>(queueCapacity);
    const results = new BoundedQueue<JobResult<R>>(workers * 2);
    const reassembler = new OrderedReassembler<R>();

    let stopped = false;
    let foldFailed = false;
    const failure: { error: Error | null } = { error: null };
    const stop = (err: Error): void => {
      if (failure.error === null) {
        failure.error = err;
        this.logger.debug('Worker pool stopping', { reason: err.name, message: err.message });
      }
      stopped = true;
    };

    const onAbort = (): void => stop(new CancelledError());
    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const dispatch = async (job: J): Promise<boolean> => {
      if (stopped) {
        settle?.(job);
        return false;
      }
      try {
        await jobs.push(job);
      } catch (err) {
        settle?.(job);
        throw err;
      }
      return true;
    };

    const producer = (async () => {
      try {
        await produce(dispatch);
      } catch (err) {
        stop(err instanceof Error ? err : new Error(errorMessage(err)));
      } finally {
        jobs.close();
      }
    })();

    const worker = async (): Promise<void> => {
      for (;;) {
        const next = await jobs.take();
        if (next.done) return;
        const job = next.value;
        if (stopped) {
          settle?.(job);
          continue;
        }
        let result: JobResult<R>;
        try {
          result = { ok: true, sequence: job.sequence, value: await handler(job) };
        } catch (err) {
          result = { ok: false, sequence: job.sequence, message: errorMessage(err) };
        } finally {
          settle?.(job);
        }
        await results.push(result);
      }
    };

    const tasks: Array<Promise<void>> = [];
    for (let i = 0; i < workers; i++) tasks.push(worker());
    const workersDone = Promise.all(tasks).finally(() => results.close());

    let folded = 0;
    try {
      for await (const result of results) {
        if (!result.ok) {
          stop(new WorkerError(result.sequence, result.message));
          continue;
        }
        for (const ready of reassembler.accept(result.sequence, result.value)) {
          if (foldFailed || failure.error instanceof CancelledError) break;
          try {
            await fold(ready.value, ready.sequence);
            folded++;
          } catch (err) {
            foldFailed = true;
            stop(err instanceof Error ? err : new Error(errorMessage(err)));
          }
        }
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await producer;
      await workersDone;
    }

    if (reassembler.pendingCount > 0) {
      this.logger.debug('Dropped results behind a gap', { pending: reassembler.pendingCount });
    }

    return { error: failure.error, folded };
  }
}
