import os from 'node:os';
import { Worker } from 'node:worker_threads';
import type { GenomeOutcome } from '../src/protocol/messages.ts';
import type { ShardJob } from '../src/shard.ts';

/** Worker pool lifecycle states. */
export type PoolStatus = 'disabled' | 'starting' | 'ready' | 'failed';

interface WorkerReadyMessage {
  type: 'ready';
}

interface WorkerResultMessage {
  type: 'result';
  jobId: number;
  outcomes: GenomeOutcome[];
}

interface WorkerErrorMessage {
  type: 'error';
  jobId: number | null;
  reason: string;
}

/** Union of messages received from workers. */
type WorkerMessage = WorkerReadyMessage | WorkerResultMessage | WorkerErrorMessage;

interface PendingJob {
  resolve: (outcomes: GenomeOutcome[]) => void;
  reject: (err: Error) => void;
}

/** Bootstrap that registers the tsx loader before importing the TypeScript worker. */
export const SHARD_WORKER_URL = new URL('./worker/shardWorker.mjs', import.meta.url);

interface PendingInit {
  resolve: () => void;
  reject: (err: Error) => void;
}

/**
 * Worker threads that each play whole shards of a generation. One job per
 * worker at a time; the caller joins all shards before breeding.
 */
export class GenerationPool {
  status: PoolStatus = 'disabled';
  readonly workerCount: number;
  private readonly workerUrl: URL;
  private workers: Worker[] = [];
  private nextJobId = 1;
  private pendingJobs = new Map<number, PendingJob>();
  private pendingInit = new Map<Worker, PendingInit>();
  private shutdownRequested = false;

  /**
   * @param workerCount - Requested thread count; capped at the CPU count minus one.
   * @param workerUrl - Worker entry module.
   */
  constructor(workerCount: number, workerUrl: URL = SHARD_WORKER_URL) {
    this.workerCount = resolveWorkerCount(workerCount);
    this.workerUrl = workerUrl;
  }

  async start(): Promise<void> {
    this.status = 'starting';
    const readyTasks: Promise<void>[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      const worker = new Worker(this.workerUrl);
      readyTasks.push(this.awaitWorkerReady(worker));
      this.attachWorker(worker);
      this.workers.push(worker);
    }
    try {
      await Promise.all(readyTasks);
      this.status = 'ready';
    } catch (err) {
      this.status = 'failed';
      await this.shutdown();
      throw err;
    }
  }

  /**
   * Runs every job (at most one per worker) and joins the outcomes.
   */
  async runGeneration(jobs: readonly ShardJob[]): Promise<GenomeOutcome[]> {
    if (this.status !== 'ready') {
      throw new Error('generation pool not ready');
    }
    if (jobs.length > this.workers.length) {
      throw new Error(`generation pool has ${this.workers.length} workers for ${jobs.length} jobs`);
    }
    const tasks = jobs.map((job, i) => {
      const worker = this.workers[i];
      if (!worker) return Promise.reject(new Error('generation pool worker missing'));
      const jobId = this.nextJobId++;
      return new Promise<GenomeOutcome[]>((resolve, reject) => {
        this.pendingJobs.set(jobId, { resolve, reject });
        worker.postMessage({ type: 'simulate', jobId, job });
      });
    });
    const results = await Promise.all(tasks);
    return results.flat();
  }

  async shutdown(): Promise<void> {
    if (this.workers.length === 0) return;
    this.shutdownRequested = true;
    await Promise.all(this.workers.map(worker => worker.terminate()));
    this.workers = [];
    this.pendingInit.clear();
    this.failPending(new Error('generation pool shut down'));
    this.status = 'disabled';
    this.shutdownRequested = false;
  }

  private attachWorker(worker: Worker): void {
    worker.on('message', (msg: WorkerMessage) => {
      if (msg.type === 'ready') {
        this.pendingInit.get(worker)?.resolve();
        this.pendingInit.delete(worker);
        return;
      }
      if (msg.type === 'result') {
        this.pendingJobs.get(msg.jobId)?.resolve(msg.outcomes);
        this.pendingJobs.delete(msg.jobId);
        return;
      }
      this.failPool(new Error(msg.reason));
    });
    worker.on('error', (err) => {
      if (this.shutdownRequested) return;
      this.failPool(err);
    });
    worker.on('exit', (code) => {
      if (this.shutdownRequested) return;
      // Any unrequested exit strands the worker's job, whatever the code.
      this.failPool(new Error(`worker exited with code ${code}`));
    });
  }

  private awaitWorkerReady(worker: Worker): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.pendingInit.set(worker, { resolve, reject });
      setTimeout(() => {
        if (this.pendingInit.has(worker)) {
          this.pendingInit.delete(worker);
          reject(new Error('generation pool init timeout'));
        }
      }, 15000).unref();
    });
  }

  private failPending(err: Error): void {
    for (const pending of this.pendingJobs.values()) pending.reject(err);
    this.pendingJobs.clear();
  }

  private failPool(err: Error): void {
    if (this.status === 'failed') return;
    this.status = 'failed';
    this.failPending(err);
    for (const pending of this.pendingInit.values()) pending.reject(err);
    this.pendingInit.clear();
  }
}

/**
 * Resolve a worker count from a requested value and CPU availability.
 * @param requested - Requested worker count.
 * @returns Sanitized worker count to use.
 */
export function resolveWorkerCount(requested: number, cpuCount = os.cpus().length): number {
  const maxWorkers = Math.max(1, cpuCount - 1);
  const parsed = Number.isFinite(requested) ? Math.floor(requested) : 0;
  if (parsed <= 0) return 1;
  return Math.min(parsed, maxWorkers);
}
