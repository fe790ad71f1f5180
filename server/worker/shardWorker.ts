import { parentPort } from 'node:worker_threads';
import type { GenomeOutcome } from '../../src/protocol/messages.ts';
import { simulateShard, type ShardJob } from '../../src/shard.ts';

/** Worker simulate message payload. */
interface SimulateMessage {
  type: 'simulate';
  jobId: number;
  job: ShardJob;
}

/** Worker shutdown message payload. */
interface ShutdownMessage {
  type: 'shutdown';
}

/** Union of messages received by the worker. */
type WorkerMessage = SimulateMessage | ShutdownMessage;

interface ReadyMessage {
  type: 'ready';
}

interface ResultMessage {
  type: 'result';
  jobId: number;
  outcomes: GenomeOutcome[];
}

interface ErrorMessage {
  type: 'error';
  jobId: number | null;
  reason: string;
}

/**
 * Ensure the worker is running under worker_threads.
 */
function assertWorkerContext(): void {
  if (!parentPort) {
    throw new Error('shardWorker requires parentPort');
  }
}

function postMessage(msg: ReadyMessage | ResultMessage | ErrorMessage): void {
  parentPort?.postMessage(msg);
}

function handleSimulate(msg: SimulateMessage): void {
  const outcomes = simulateShard(msg.job);
  postMessage({ type: 'result', jobId: msg.jobId, outcomes });
}

assertWorkerContext();
parentPort?.on('message', (msg: WorkerMessage) => {
  try {
    if (msg.type === 'simulate') {
      handleSimulate(msg);
      return;
    }
    if (msg.type === 'shutdown') {
      process.exit(0);
    }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    postMessage({ type: 'error', jobId: msg.type === 'simulate' ? msg.jobId : null, reason: message });
  }
});
postMessage({ type: 'ready' });
