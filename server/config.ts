import fs from 'node:fs';
import { parse as parseToml } from 'smol-toml';
import {
  normalizeSimulationConfig,
  type SimulationConfig,
  type SimulationConfigInput
} from '../src/config.ts';
import { coerceBool, coerceChoice, coerceInt, isRecord, type WarnFn } from '../src/utils.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  host: string;
  port: number;
  /** Simulation ticks per second when frames are streamed. */
  tickRateHz: number;
  uiFrameRateHz: number;
  /** Skip per-step frames and run whole generations as fast as possible. */
  lowDetail: boolean;
  /** Worker threads for low-detail runs; 0 simulates in-process. */
  workers: number;
  /** 0 runs until interrupted. */
  maxGenerations: number;
  dbPath: string;
  checkpointEveryGenerations: number;
  /** Best network is rewritten here whenever the best score improves; empty disables. */
  saveBestPath: string;
  /** Saved network used to seed the first generation; empty starts from random weights. */
  loadPath: string;
  logLevel: LogLevel;
  simulation: SimulationConfig;
}

/** Server fields as they arrive from TOML, env or flags, before validation. */
export type ServerConfigInput = {
  [K in Exclude<keyof ServerConfig, 'simulation'>]?: unknown;
} & { simulation?: SimulationConfigInput };

export const DEFAULT_CONFIG: Omit<ServerConfig, 'simulation'> = {
  host: '127.0.0.1',
  port: 5174,
  tickRateHz: 30,
  uiFrameRateHz: 30,
  lowDetail: false,
  workers: 0,
  maxGenerations: 0,
  dbPath: './data/snake.db',
  checkpointEveryGenerations: 1,
  saveBestPath: './data/net.json',
  loadPath: '',
  logLevel: 'info'
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const SERVER_KEYS = Object.keys(DEFAULT_CONFIG).filter(
  (key): key is Exclude<keyof ServerConfig, 'simulation'> => key in DEFAULT_CONFIG
);

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

function coerceString(name: string, value: unknown, fallback: string, allowEmpty: boolean, warn?: WarnFn): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string' || (!allowEmpty && !value.trim())) {
    warn?.(`${name} is invalid; using ${fallback || '(empty)'}.`);
    return fallback;
  }
  return value.trim();
}

export function normalizeConfig(input: ServerConfigInput, warn?: WarnFn): ServerConfig {
  const d = DEFAULT_CONFIG;
  const tickRateHz = coerceInt('tickRateHz', input.tickRateHz, d.tickRateHz, 1, 1000, warn);
  let uiFrameRateHz = coerceInt('uiFrameRateHz', input.uiFrameRateHz, d.uiFrameRateHz, 1, 240, warn);
  if (uiFrameRateHz > tickRateHz) {
    warn?.('uiFrameRateHz exceeded tickRateHz; clamping to tickRateHz.');
    uiFrameRateHz = tickRateHz;
  }
  return {
    host: coerceString('host', input.host, d.host, false, warn),
    port: coerceInt('port', input.port, d.port, 0, 65535, warn),
    tickRateHz,
    uiFrameRateHz,
    lowDetail: coerceBool('lowDetail', input.lowDetail, d.lowDetail, warn),
    workers: coerceInt('workers', input.workers, d.workers, 0, 64, warn),
    maxGenerations: coerceInt('maxGenerations', input.maxGenerations, d.maxGenerations, 0, 1e9, warn),
    dbPath: coerceString('dbPath', input.dbPath, d.dbPath, false, warn),
    checkpointEveryGenerations: coerceInt(
      'checkpointEveryGenerations',
      input.checkpointEveryGenerations,
      d.checkpointEveryGenerations,
      0,
      100000,
      warn
    ),
    saveBestPath: coerceString('saveBestPath', input.saveBestPath, d.saveBestPath, true, warn),
    loadPath: coerceString('loadPath', input.loadPath, d.loadPath, true, warn),
    logLevel: coerceChoice('logLevel', input.logLevel, LOG_LEVELS, d.logLevel, warn),
    simulation: normalizeSimulationConfig(input.simulation ?? {}, msg => warn?.(`simulation.${msg}`))
  };
}

/**
 * Reads a TOML config file: top-level keys are server settings, the
 * [simulation] table holds simulation settings.
 * @throws Error when the file cannot be read or parsed.
 */
export function loadTomlConfig(filePath: string): ServerConfigInput {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new Error(`cannot read config file ${filePath}`, { cause: err });
  }
  if (!raw.trim()) return {};
  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse ${filePath}: ${message}`, { cause: err });
  }
  const out: ServerConfigInput = {};
  for (const key of SERVER_KEYS) {
    if (key in parsed) out[key] = parsed[key];
  }
  const simulation = parsed['simulation'];
  if (isRecord(simulation)) out.simulation = simulation;
  return out;
}

/**
 * Overrides picked from the environment and command-line flags, flags last.
 */
function overridesFrom(argv: string[], env: Env): ServerConfigInput {
  const pick = (flag: string, envKey: string): string | undefined =>
    getArgValue(argv, flag) ?? env[envKey];
  const out: ServerConfigInput = {};
  const sim: { -readonly [K in keyof SimulationConfigInput]: SimulationConfigInput[K] } = {};
  const set = (key: Exclude<keyof ServerConfigInput, 'simulation'>, value: string | undefined) => {
    if (value !== undefined && value !== '') out[key] = value;
  };
  set('host', pick('--host', 'HOST'));
  set('port', pick('--port', 'PORT'));
  set('tickRateHz', pick('--tick', 'TICK_RATE'));
  set('uiFrameRateHz', pick('--ui-rate', 'UI_RATE'));
  set('workers', pick('--workers', 'WORKERS'));
  set('maxGenerations', pick('--max-generations', 'MAX_GENERATIONS'));
  set('dbPath', pick('--db-path', 'DB_PATH'));
  set('checkpointEveryGenerations', pick('--checkpoint-every', 'CHECKPOINT_EVERY'));
  set('saveBestPath', pick('--save-best', 'SAVE_BEST_PATH'));
  set('loadPath', pick('--load', 'LOAD_PATH'));
  set('logLevel', pick('--log', 'LOG_LEVEL'));
  if (hasFlag(argv, '--low-detail')) {
    out.lowDetail = true;
  } else if (env['LOW_DETAIL'] !== undefined) {
    out.lowDetail = env['LOW_DETAIL'];
  }
  const seed = pick('--seed', 'SNAKE_SEED');
  if (seed !== undefined) sim.seed = seed;
  const population = pick('--population', 'POPULATION_SIZE');
  if (population !== undefined) sim.populationSize = population;
  const board = pick('--board-size', 'BOARD_SIZE');
  if (board !== undefined) sim.boardSize = board;
  if (Object.keys(sim).length > 0) out.simulation = sim;
  return out;
}

/**
 * Merges defaults, an optional TOML file (--config or SNAKE_CONFIG),
 * environment variables and flags, in that order.
 */
export function parseConfig(argv: string[], env: Env, warn?: WarnFn): ServerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['SNAKE_CONFIG'];
  const fromFile: ServerConfigInput = configPath ? loadTomlConfig(configPath) : {};
  const overrides = overridesFrom(argv, env);
  const merged: ServerConfigInput = {
    ...fromFile,
    ...overrides,
    simulation: { ...fromFile.simulation, ...overrides.simulation }
  };
  return normalizeConfig(merged, warn ?? (msg => console.warn(`[config] ${msg}`)));
}
