import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { seedFromNetwork, SimulationDriver } from '../src/driver.ts';
import { networkToJSON } from '../src/networkSerializer.ts';
import { FRAME_HEADER_FLOATS } from '../src/protocol/frame.ts';
import { VISION_LABELS } from '../src/vision.ts';
import { parseConfig, type ServerConfig } from './config.ts';
import { GenerationPool } from './generationPool.ts';
import { hashConfig } from './hash.ts';
import { createHttpHandler } from './httpApi.ts';
import { createLogger, type Logger } from './logger.ts';
import { readNetworkFile } from './networkFile.ts';
import { createPersistence, initDb } from './persistence.ts';
import { PROTOCOL_VERSION, SERIALIZER_VERSION, type WelcomeMsg } from './protocol.ts';
import { SimRunner } from './simRunner.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  runner: SimRunner;
  close: () => Promise<void>;
}

/**
 * Builds the driver for a run, seeding the first generation from loadPath
 * when one is configured. A bad network file halts startup.
 */
export function createDriver(config: ServerConfig, logger: Logger): SimulationDriver {
  const sim = config.simulation;
  if (!config.loadPath) return new SimulationDriver({ config: sim });
  const base = readNetworkFile(config.loadPath);
  logger.info('server', `seeding generation 1 from ${config.loadPath} (${base.key})`);
  return new SimulationDriver({ config: sim, initialNetworks: seedFromNetwork(base, sim) });
}

export async function startServer(config: ServerConfig, logger: Logger = createLogger(config.logLevel)): Promise<RunningServer> {
  const driver = createDriver(config, logger);
  const cfgHash = hashConfig(config.simulation);
  const sessionId = Math.random().toString(36).slice(2, 10);
  const welcome: WelcomeMsg = {
    type: 'welcome',
    sessionId,
    protocolVersion: PROTOCOL_VERSION,
    serializerVersion: SERIALIZER_VERSION,
    boardSize: config.simulation.boardSize,
    populationSize: config.simulation.populationSize,
    seed: config.simulation.seed,
    cfgHash,
    visionLabels: VISION_LABELS.slice(),
    frameHeaderFloats: FRAME_HEADER_FLOATS,
    lowDetail: config.lowDetail
  };

  let db: ReturnType<typeof initDb> | null = null;
  try {
    db = initDb(config.dbPath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn('persistence', `disabled (cannot open ${config.dbPath}): ${message}`);
  }
  const persistence = db ? createPersistence(db) : null;

  let pool: GenerationPool | null = null;
  if (config.lowDetail && config.workers > 0) {
    pool = new GenerationPool(config.workers);
    await pool.start();
    logger.info('server', `generation pool ready with ${pool.workerCount} workers`);
  } else if (config.workers > 0) {
    logger.warn('server', 'workers are only used in low-detail mode; simulating in-process');
  }

  let runner: SimRunner | null = null;
  let wsHub: WsHub | null = null;
  const httpHandler = createHttpHandler({
    getStatus: () => ({
      generation: driver.generation,
      clients: wsHub?.getClientCount() ?? 0,
      alive: driver.population.aliveCount()
    }),
    getBest: () =>
      driver.bestNetwork ? { score: driver.bestScoreEver, network: networkToJSON(driver.bestNetwork) } : null,
    getLastSummary: () => runner?.getLastSummary() ?? null,
    getHallOfFame: () => driver.hallOfFame.getAll(),
    saveSnapshot: () => {
      if (!runner) throw new Error('simulation not ready');
      return runner.saveSnapshotNow();
    },
    persistence
  });

  const httpServer = createServer((req, res) => {
    httpHandler(req, res);
  });
  wsHub = new WsHub(httpServer, welcome);
  runner = new SimRunner({ config, driver, logger, sink: wsHub, persistence, pool, cfgHash });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      httpServer.off('error', onError);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen({ port: config.port, host: config.host }, () => {
      httpServer.off('error', onError);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  runner.start();

  const activeRunner = runner;
  const hub = wsHub;
  const close = async () => {
    activeRunner.stop();
    hub.closeAll();
    await pool?.shutdown();
    db?.close();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const wsHost =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${wsHost}:${port}`,
    runner: activeRunner,
    close
  };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const server = await startServer(config, logger);
  logger.info('server', `listening on :${server.port} (${config.lowDetail ? 'low-detail' : 'live'} mode)`);

  let signalled = false;
  const onSignal = () => {
    if (signalled) {
      logger.warn('server', 'second interrupt; stopping now');
      server.runner.stop();
      return;
    }
    signalled = true;
    logger.info('server', 'interrupt received; finishing the current generation');
    server.runner.requestStop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await server.runner.done;
  } finally {
    logger.info('server', `stopped after ${server.runner.completedGenerations} generations`);
    await server.close();
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
