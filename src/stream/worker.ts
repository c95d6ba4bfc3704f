/**
 * Worker thread entry point for parallel counting.
 *
 * Receives job/shutdown messages from the main thread via parentPort, runs the
 * same job function the inline runner uses, and posts the outcome back.
 *
 * Compiled as a separate tsdown entry point to dist/worker.js.
 */

import { parentPort } from 'node:worker_threads';

import { errorMessage } from '../shared/errors.js';
import { BufferPool, TOKEN_SCRATCH_BYTES } from './buffer-pool.js';
import { processJob, type CountJob } from './jobs.js';

if (!parentPort) {
  throw new Error('worker.ts must be run as a Worker thread');
}

const port = parentPort;

interface JobMessage {
  type: 'job';
  id: number;
  job: CountJob;
}

interface ShutdownMessage {
  type: 'shutdown';
}

type WorkerMessage = JobMessage | ShutdownMessage;

// Each thread keeps its own scratch; nothing is shared with the main thread.
const scratchPool = new BufferPool('token', TOKEN_SCRATCH_BYTES * 3, (n) => new Uint8Array(n), 2);

port.on('message', (msg: WorkerMessage) => {
  if (msg.type === 'job') {
    const scratch = msg.job.emitOutput ? scratchPool.acquire() : null;
    try {
      const outcome = processJob(msg.job, scratch);
      port.postMessage({ type: 'job_result', id: msg.id, outcome });
    } catch (err) {
      port.postMessage({ type: 'job_error', id: msg.id, message: errorMessage(err) });
    } finally {
      if (scratch) scratchPool.release(scratch);
    }
  } else if (msg.type === 'shutdown') {
    process.exit(0);
  }
});

port.postMessage({ type: 'ready' });
