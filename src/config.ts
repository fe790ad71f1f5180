// config.ts
// Simulation parameters. They are normalised once at startup and frozen:
// the core treats them as immutable for the lifetime of a run.

import { ACTION_COUNT } from './grid.ts';
import { ACTIVATIONS, type Activation, type NetworkShape } from './network.ts';
import { coerceBool, coerceChoice, coerceInt, coerceNumber, isRecord, type WarnFn } from './utils.ts';
import { VISION_SIZE } from './vision.ts';

export type CrossoverGranularity = 'weight' | 'neuron' | 'layer';
export type MutationMode = 'add' | 'replace';

export const CROSSOVER_GRANULARITIES: readonly CrossoverGranularity[] = ['weight', 'neuron', 'layer'];
export const MUTATION_MODES: readonly MutationMode[] = ['add', 'replace'];

/** Multiplies the starvation limit once the body reaches minLength cells. */
export interface StarvationTier {
  readonly minLength: number;
  readonly factor: number;
}

/**
 * fitness = scoreWeight * score + stepWeight * steps / (steps + stepScale).
 * stepWeight never exceeds scoreWeight, so one more food always wins.
 */
export interface FitnessWeights {
  readonly scoreWeight: number;
  readonly stepWeight: number;
  readonly stepScale: number;
}

export interface SimulationConfig {
  readonly boardSize: number;
  readonly populationSize: number;
  /** Hidden layer sizes; input and output sizes are fixed by vision and actions. */
  readonly hiddenLayers: readonly number[];
  readonly hiddenActivation: Activation;
  readonly outputActivation: Activation;
  /** Initial weights are drawn from [-initRange, initRange). */
  readonly initRange: number;
  readonly mutationRate: number;
  readonly mutationRange: number;
  readonly mutationMode: MutationMode;
  readonly crossover: CrossoverGranularity;
  readonly eliteCount: number;
  /** Fresh random networks injected every generation. */
  readonly immigrantCount: number;
  /** Top networks carried over as mutated copies. */
  readonly mutatedEliteCount: number;
  /** Slots filled by mutated tournament winners instead of roulette children. */
  readonly tournamentCount: number;
  readonly tournamentSize: number;
  /** Derive mutation rate and range from the generation's best score. */
  readonly adaptiveMutation: boolean;
  readonly starvationSteps: number;
  readonly starvationScaling: readonly StarvationTier[];
  readonly fitness: FitnessWeights;
  readonly initialLength: number;
  readonly seed: number;
  /** Generations kept in the fitness history exposed to renderers. */
  readonly historyLength: number;
}

/** Loosely typed input, as read from TOML, env or CLI flags. */
export type SimulationConfigInput = {
  [K in keyof SimulationConfig]?: unknown;
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  boardSize: 15,
  populationSize: 500,
  hiddenLayers: [16, 8],
  hiddenActivation: 'relu',
  outputActivation: 'linear',
  initRange: 1,
  mutationRate: 0.1,
  mutationRange: 0.5,
  mutationMode: 'add',
  crossover: 'weight',
  eliteCount: 2,
  immigrantCount: 0,
  mutatedEliteCount: 0,
  tournamentCount: 0,
  tournamentSize: 5,
  adaptiveMutation: false,
  starvationSteps: 15 * 15,
  starvationScaling: [],
  fitness: { scoreWeight: 1, stepWeight: 0.5, stepScale: 100 },
  initialLength: 3,
  seed: 1,
  historyLength: 45
};

/**
 * Full layer chain for a config: vision inputs, hidden layers, actions.
 */
export function networkShape(config: SimulationConfig): NetworkShape {
  return {
    layerSizes: [VISION_SIZE, ...config.hiddenLayers, ACTION_COUNT],
    hiddenActivation: config.hiddenActivation,
    outputActivation: config.outputActivation
  };
}

function normalizeHiddenLayers(value: unknown, warn?: WarnFn): number[] {
  if (value === undefined || value === null) return DEFAULT_SIMULATION_CONFIG.hiddenLayers.slice();
  const raw = typeof value === 'string'
    ? value.split(/[x,]/).map(part => part.trim()).filter(Boolean)
    : value;
  if (!Array.isArray(raw)) {
    warn?.('hiddenLayers is invalid; using defaults.');
    return DEFAULT_SIMULATION_CONFIG.hiddenLayers.slice();
  }
  const out: number[] = [];
  raw.forEach((entry, i) => {
    out.push(coerceInt(`hiddenLayers[${i}]`, entry, 8, 1, 1024, warn));
  });
  return out;
}

function normalizeTiers(value: unknown, warn?: WarnFn): StarvationTier[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    warn?.('starvationScaling is invalid; ignoring.');
    return [];
  }
  const tiers: StarvationTier[] = [];
  value.forEach((entry, i) => {
    if (!isRecord(entry)) {
      warn?.(`starvationScaling[${i}] is invalid; ignoring.`);
      return;
    }
    tiers.push({
      minLength: coerceInt(`starvationScaling[${i}].minLength`, entry['minLength'], 1, 1, 1 << 20, warn),
      factor: coerceNumber(`starvationScaling[${i}].factor`, entry['factor'], 1, 1, 1000, warn)
    });
  });
  return tiers.sort((a, b) => a.minLength - b.minLength);
}

function normalizeFitness(value: unknown, warn?: WarnFn): FitnessWeights {
  const defaults = DEFAULT_SIMULATION_CONFIG.fitness;
  const input = isRecord(value) ? value : {};
  if (value !== undefined && !isRecord(value)) warn?.('fitness is invalid; using defaults.');
  const scoreWeight = coerceNumber('fitness.scoreWeight', input['scoreWeight'], defaults.scoreWeight, 1e-6, 1e9, warn);
  let stepWeight = coerceNumber('fitness.stepWeight', input['stepWeight'], defaults.stepWeight, 0, 1e9, warn);
  if (stepWeight > scoreWeight) {
    warn?.('fitness.stepWeight exceeded fitness.scoreWeight; clamping so score dominates.');
    stepWeight = scoreWeight;
  }
  const stepScale = coerceNumber('fitness.stepScale', input['stepScale'], defaults.stepScale, 1e-6, 1e9, warn);
  return { scoreWeight, stepWeight, stepScale };
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null) deepFreeze(value);
  }
  Object.freeze(obj);
  return obj;
}

/**
 * Repairs and freezes a simulation config. Out-of-range values are clamped
 * and reported through warn.
 */
export function normalizeSimulationConfig(
  input: SimulationConfigInput = {},
  warn?: WarnFn
): SimulationConfig {
  const d = DEFAULT_SIMULATION_CONFIG;
  const boardSize = coerceInt('boardSize', input.boardSize, d.boardSize, 5, 64, warn);
  // The starting body trails left of the centre cell and must stay on the board.
  const maxInitialLength = Math.floor(boardSize / 2) + 1;
  const initialLength = coerceInt('initialLength', input.initialLength, d.initialLength, 1, maxInitialLength, warn);
  const populationSize = coerceInt('populationSize', input.populationSize, d.populationSize, 1, 100000, warn);
  const eliteCount = coerceInt('eliteCount', input.eliteCount, d.eliteCount, 0, populationSize, warn);
  const immigrantCount = coerceInt(
    'immigrantCount',
    input.immigrantCount,
    d.immigrantCount,
    0,
    populationSize - eliteCount,
    warn
  );
  const mutatedEliteCount = coerceInt(
    'mutatedEliteCount',
    input.mutatedEliteCount,
    d.mutatedEliteCount,
    0,
    populationSize - eliteCount - immigrantCount,
    warn
  );
  const tournamentCount = coerceInt(
    'tournamentCount',
    input.tournamentCount,
    d.tournamentCount,
    0,
    populationSize - eliteCount - immigrantCount - mutatedEliteCount,
    warn
  );
  const starvationSteps = coerceInt(
    'starvationSteps',
    input.starvationSteps,
    boardSize * boardSize,
    1,
    1 << 24,
    warn
  );
  let seed = d.seed;
  if (input.seed !== undefined && input.seed !== null) {
    const parsed = typeof input.seed === 'number' ? input.seed : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsed)) {
      seed = Math.floor(parsed) >>> 0;
    } else {
      warn?.('seed is invalid; using default.');
    }
  }

  const config: SimulationConfig = {
    boardSize,
    populationSize,
    hiddenLayers: normalizeHiddenLayers(input.hiddenLayers, warn),
    hiddenActivation: coerceChoice('hiddenActivation', input.hiddenActivation, ACTIVATIONS, d.hiddenActivation, warn),
    outputActivation: coerceChoice('outputActivation', input.outputActivation, ACTIVATIONS, d.outputActivation, warn),
    initRange: coerceNumber('initRange', input.initRange, d.initRange, 1e-6, 100, warn),
    mutationRate: coerceNumber('mutationRate', input.mutationRate, d.mutationRate, 0, 1, warn),
    mutationRange: coerceNumber('mutationRange', input.mutationRange, d.mutationRange, 0, 100, warn),
    mutationMode: coerceChoice('mutationMode', input.mutationMode, MUTATION_MODES, d.mutationMode, warn),
    crossover: coerceChoice('crossover', input.crossover, CROSSOVER_GRANULARITIES, d.crossover, warn),
    eliteCount,
    immigrantCount,
    mutatedEliteCount,
    tournamentCount,
    tournamentSize: coerceInt('tournamentSize', input.tournamentSize, d.tournamentSize, 1, 1000, warn),
    adaptiveMutation: coerceBool('adaptiveMutation', input.adaptiveMutation, d.adaptiveMutation, warn),
    starvationSteps,
    starvationScaling: normalizeTiers(input.starvationScaling, warn),
    fitness: normalizeFitness(input.fitness, warn),
    initialLength,
    seed,
    historyLength: coerceInt('historyLength', input.historyLength, d.historyLength, 1, 10000, warn)
  };
  return deepFreeze(config);
}
