import { performance } from 'node:perf_hooks';
import type { GenerationEvent, SimulationDriver } from '../src/driver.ts';
import { FrameSerializer } from '../src/frameSerializer.ts';
import type { GenerationSummary } from '../src/protocol/messages.ts';
import { splitIntoShards } from '../src/shard.ts';
import { fmtNumber } from '../src/utils.ts';
import type { ServerConfig } from './config.ts';
import type { GenerationPool } from './generationPool.ts';
import { hashConfig } from './hash.ts';
import type { Logger } from './logger.ts';
import { writeNetworkFile } from './networkFile.ts';
import type { Persistence, PopulationSnapshotPayload } from './persistence.ts';
import type { StatsMsg } from './protocol.ts';

/** SQLite error code indicating the database or disk is full. */
const SQLITE_FULL_CODE = 'SQLITE_FULL';

function isSqliteFullError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === SQLITE_FULL_CODE;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Where frames and stats go; the WS hub in production. */
export interface FrameSink {
  broadcastFrame: (buffer: Float32Array) => void;
  broadcastStats: (stats: StatsMsg) => void;
}

export interface SimRunnerOptions {
  config: ServerConfig;
  driver: SimulationDriver;
  logger: Logger;
  sink?: FrameSink | null;
  persistence?: Persistence | null;
  /** Used for low-detail runs when present. */
  pool?: GenerationPool | null;
  /** Defaults to the hash of the driver's config. */
  cfgHash?: string;
}

/**
 * Drives the simulation: paced per-step ticks with frames for the live view,
 * or back-to-back whole generations in low-detail mode. Stop requests are
 * honoured between generations.
 */
export class SimRunner {
  private readonly config: ServerConfig;
  private readonly driver: SimulationDriver;
  private readonly logger: Logger;
  private readonly sink: FrameSink | null;
  private persistence: Persistence | null;
  private readonly pool: GenerationPool | null;
  private readonly cfgHash: string;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextTickAt = 0;
  private lastFrameSentAt = 0;
  private lastSummary: GenerationSummary | null = null;
  private persistenceDisabledReason: string | null = null;
  private resolveDone: () => void = () => {};
  private rejectDone: (err: Error) => void = () => {};
  /** Settles when the run stops: resolved on a clean stop, rejected on failure. */
  readonly done: Promise<void>;

  constructor(opts: SimRunnerOptions) {
    this.config = opts.config;
    this.driver = opts.driver;
    this.logger = opts.logger;
    this.sink = opts.sink ?? null;
    this.persistence = opts.persistence ?? null;
    this.pool = opts.pool ?? null;
    this.cfgHash = opts.cfgHash ?? hashConfig(opts.driver.config);
    this.done = new Promise<void>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });
    this.driver.onGeneration(event => this.handleGenerationEnd(event));
  }

  get isRunning(): boolean {
    return this.running;
  }

  getLastSummary(): GenerationSummary | null {
    return this.lastSummary;
  }

  /** Number of generations completed so far. */
  get completedGenerations(): number {
    return this.driver.generation - 1;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    if (this.config.lowDetail) {
      this.runLowDetail().catch((err: unknown) => this.fail(err));
      return;
    }
    this.nextTickAt = performance.now();
    this.loop();
  }

  /** Halts immediately, mid-generation if need be. */
  stop(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (!this.running) return;
    this.running = false;
    this.resolveDone();
  }

  /** Stops at the next generation boundary. */
  requestStop(): void {
    this.driver.stop();
  }

  /**
   * Writes a checkpoint of the current population now.
   * @returns Snapshot id.
   */
  saveSnapshotNow(): number {
    if (!this.persistence) throw new Error('persistence disabled');
    return this.persistence.saveSnapshot(this.buildSnapshotPayload());
  }

  private shouldFinish(): boolean {
    if (this.driver.stopRequested) return true;
    const max = this.config.maxGenerations;
    return max > 0 && this.completedGenerations >= max;
  }

  private fail(err: unknown): void {
    this.logger.error('sim', `simulation failed: ${errorMessage(err)}`);
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.running = false;
    this.rejectDone(err instanceof Error ? err : new Error(String(err)));
  }

  /** Main timer loop for scheduling ticks. */
  private loop(): void {
    if (!this.running) return;
    const now = performance.now();
    if (now >= this.nextTickAt) {
      try {
        this.tick(now);
      } catch (err) {
        this.fail(err);
        return;
      }
      if (!this.running) return;
      this.nextTickAt += 1000 / this.config.tickRateHz;
    }
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  private tick(now: number): void {
    const summary = this.driver.step();
    if (summary && this.shouldFinish()) {
      this.stop();
      return;
    }
    if (this.sink && now - this.lastFrameSentAt >= 1000 / this.config.uiFrameRateHz) {
      this.sink.broadcastFrame(FrameSerializer.serialize(this.driver.snapshot()));
      this.lastFrameSentAt = now;
    }
  }

  private async runLowDetail(): Promise<void> {
    while (this.running && !this.shouldFinish()) {
      if (this.pool) {
        const jobs = splitIntoShards(
          this.driver.currentNetworks(),
          this.pool.workerCount,
          this.config.simulation,
          this.driver.shape,
          this.driver.generation
        );
        const outcomes = await this.pool.runGeneration(jobs);
        if (!this.running) return;
        this.driver.completeGeneration(outcomes);
      } else {
        this.driver.runGeneration();
      }
      // Yield so signals, HTTP and WS traffic get served between generations.
      await new Promise<void>(resolve => setImmediate(resolve));
    }
    this.stop();
  }

  private handleGenerationEnd(event: GenerationEvent): void {
    const s = event.summary;
    this.lastSummary = s;
    this.logger.info(
      'sim',
      `gen ${s.gen} best=${fmtNumber(s.best, 3)} avg=${fmtNumber(s.avg, 3)} min=${fmtNumber(s.min, 3)} ` +
        `score=${s.bestScore} bestEver=${s.bestScoreEver} deaths=${s.deaths.collision}/${s.deaths.starvation}/${s.deaths['board-full']}`
    );
    this.sink?.broadcastStats({ type: 'stats', summary: s, history: this.driver.getHistory() });

    if (event.improvedScore && this.config.saveBestPath && this.driver.bestNetwork) {
      try {
        writeNetworkFile(this.config.saveBestPath, this.driver.bestNetwork);
        this.logger.info('sim', `best network (score ${s.bestScoreEver}) saved to ${this.config.saveBestPath}`);
      } catch (err) {
        this.logger.warn('sim', `best network save failed: ${errorMessage(err)}`);
      }
    }

    this.persist(event);
  }

  /**
   * Disable persistence after a non-recoverable storage failure.
   */
  private disablePersistence(reason: string, err: unknown): void {
    if (this.persistenceDisabledReason) return;
    this.persistenceDisabledReason = reason;
    this.persistence = null;
    this.logger.warn('persistence', `disabled (${reason}): ${errorMessage(err)}`);
  }

  private persist(event: GenerationEvent): void {
    if (!this.persistence) return;
    try {
      this.persistence.saveHofEntry(event.hofEntry);
    } catch (err) {
      if (isSqliteFullError(err)) {
        this.disablePersistence('sqlite full during hall-of-fame save', err);
        return;
      }
      this.logger.warn('persistence', `hof save failed: ${errorMessage(err)}`);
    }

    const every = this.config.checkpointEveryGenerations;
    if (every <= 0 || event.summary.gen % every !== 0) return;
    try {
      this.persistence.saveSnapshot(this.buildSnapshotPayload());
    } catch (err) {
      if (isSqliteFullError(err)) {
        this.disablePersistence('sqlite full during snapshot save', err);
        return;
      }
      this.logger.warn('persistence', `snapshot save failed: ${errorMessage(err)}`);
    }
  }

  /**
   * Checkpoint of the population currently held by the driver. Called from
   * the generation listener this is the generation that just finished.
   */
  private buildSnapshotPayload(): PopulationSnapshotPayload {
    const networks = this.driver.currentNetworks();
    return {
      generation: this.driver.generation,
      topology: networks[0]?.key ?? '',
      cfgHash: this.cfgHash,
      seed: this.driver.config.seed,
      networks: networks.map(net => Array.from(net.params))
    };
  }
}
