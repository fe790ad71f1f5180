// genetics.ts
// Generational breeding over the flat parameter vectors. Slots are filled
// in order: elites, mutated elites, tournament winners, immigrants, then
// roulette-wheel children.

import type { CrossoverGranularity, MutationMode, SimulationConfig } from './config.ts';
import { NeuralNetwork, type NetworkShape } from './network.ts';
import { randomInt, randomRange, type RandomSource } from './rng.ts';

/** A finished genome's network and its score, as handed to evolve(). */
export interface Candidate {
  fitness: number;
  network: NeuralNetwork;
}

export interface GeneticSettings {
  shape: NetworkShape;
  eliteCount: number;
  immigrantCount: number;
  mutatedEliteCount: number;
  tournamentCount: number;
  tournamentSize: number;
  initRange: number;
  mutationRate: number;
  mutationRange: number;
  mutationMode: MutationMode;
  /** When set, rate and range follow scheduledMutation() instead. */
  adaptiveMutation: boolean;
  /** Board edge length; scales the adaptive schedule. */
  boardSize: number;
  crossover: CrossoverGranularity;
}

/** Per-parameter mutation probability and perturbation range. */
export interface MutationParams {
  rate: number;
  range: number;
}

export function geneticSettings(config: SimulationConfig, shape: NetworkShape): GeneticSettings {
  return {
    shape,
    eliteCount: config.eliteCount,
    immigrantCount: config.immigrantCount,
    mutatedEliteCount: config.mutatedEliteCount,
    tournamentCount: config.tournamentCount,
    tournamentSize: config.tournamentSize,
    initRange: config.initRange,
    mutationRate: config.mutationRate,
    mutationRange: config.mutationRange,
    mutationMode: config.mutationMode,
    adaptiveMutation: config.adaptiveMutation,
    boardSize: config.boardSize,
    crossover: config.crossover
  };
}

/** Weight a candidate gets on the roulette wheel. */
function wheelWeight(fitness: number): number {
  return Number.isFinite(fitness) && fitness > 0 ? fitness : 0;
}

/**
 * Sorts candidates best first. Equal fitness keeps the input order.
 */
export function rankCandidates<T extends Candidate>(candidates: readonly T[]): T[] {
  return candidates
    .map((c, i) => ({ c, i }))
    .sort((a, b) => {
      const fa = Number.isNaN(a.c.fitness) ? -Infinity : a.c.fitness;
      const fb = Number.isNaN(b.c.fitness) ? -Infinity : b.c.fitness;
      return fb === fa ? a.i - b.i : fb > fa ? 1 : -1;
    })
    .map(entry => entry.c);
}

/**
 * Roulette-wheel pick: probability proportional to fitness. Falls back to a
 * uniform pick when no candidate has positive fitness.
 */
export function selectParent<T extends Candidate>(candidates: readonly T[], total: number, rng: RandomSource): T {
  const first = candidates[0];
  if (!first) throw new RangeError('cannot select from an empty candidate list');
  if (!(total > 0)) return candidates[randomInt(rng, candidates.length)] ?? first;
  let r = rng() * total;
  let last = first;
  for (const c of candidates) {
    const w = wheelWeight(c.fitness);
    if (w <= 0) continue;
    last = c;
    r -= w;
    if (r < 0) return c;
  }
  // Rounding can leave a sliver at the end of the wheel.
  return last;
}

/**
 * Tournament pick: the fittest of `size` uniform draws (with replacement).
 * Ties keep the earlier draw.
 */
export function tournamentSelect<T extends Candidate>(candidates: readonly T[], size: number, rng: RandomSource): T {
  const first = candidates[0];
  if (!first) throw new RangeError('cannot select from an empty candidate list');
  let best = candidates[randomInt(rng, candidates.length)] ?? first;
  for (let i = 1; i < size; i++) {
    const c = candidates[randomInt(rng, candidates.length)] ?? first;
    if (c.fitness > best.fitness) best = c;
  }
  return best;
}

/**
 * Mutation schedule keyed on the generation's best score against the
 * reachable maximum of (boardSize - 1)^2. Strong generations get smaller
 * perturbations.
 */
export function scheduledMutation(bestScore: number, boardSize: number): MutationParams {
  const maxScore = (boardSize - 1) * (boardSize - 1);
  if (bestScore > 0.75 * maxScore) return { rate: 0.15, range: 0.1 };
  if (bestScore > 0.5 * maxScore) return { rate: 0.25, range: 0.1 };
  return { rate: 0.15, range: 0.5 };
}

/**
 * Mixes two parents of the same topology.
 * 'weight' flips a coin per parameter, 'neuron' per output row (weights and
 * bias together), 'layer' per whole layer.
 */
export function crossover(
  a: NeuralNetwork,
  b: NeuralNetwork,
  granularity: CrossoverGranularity,
  rng: RandomSource
): NeuralNetwork {
  const wa = a.params;
  const wb = b.params;
  const child = new Float32Array(a.paramCount);
  if (granularity === 'weight') {
    for (let i = 0; i < child.length; i++) child[i] = rng() < 0.5 ? (wa[i] ?? 0) : (wb[i] ?? 0);
    return new NeuralNetwork(a.shape(), child);
  }
  let idx = 0;
  for (let l = 0; l < a.layerCount; l++) {
    const ins = a.layerSizes[l] ?? 0;
    const outs = a.layerSizes[l + 1] ?? 0;
    const rowLen = ins + 1;
    if (granularity === 'layer') {
      const src = rng() < 0.5 ? wa : wb;
      const end = idx + outs * rowLen;
      child.set(src.subarray(idx, end), idx);
      idx = end;
      continue;
    }
    for (let o = 0; o < outs; o++) {
      const src = rng() < 0.5 ? wa : wb;
      child.set(src.subarray(idx, idx + rowLen), idx);
      idx += rowLen;
    }
  }
  return new NeuralNetwork(a.shape(), child);
}

/**
 * Perturbs parameters in place. Each parameter changes with probability rate.
 */
export function mutate(
  net: NeuralNetwork,
  rate: number,
  range: number,
  mode: MutationMode,
  rng: RandomSource
): NeuralNetwork {
  const w = net.params;
  for (let i = 0; i < w.length; i++) {
    if (rng() >= rate) continue;
    const delta = randomRange(rng, -range, range);
    w[i] = mode === 'add' ? (w[i] ?? 0) + delta : delta;
  }
  return net;
}

export class GeneticAlgorithm {
  readonly settings: GeneticSettings;

  constructor(settings: GeneticSettings) {
    this.settings = settings;
  }

  mutationFor(bestScore: number): MutationParams {
    const s = this.settings;
    return s.adaptiveMutation
      ? scheduledMutation(bestScore, s.boardSize)
      : { rate: s.mutationRate, range: s.mutationRange };
  }

  /**
   * Builds the next generation: exactly candidates.length networks.
   * @param bestScore - Top score of the evaluated generation, for the adaptive schedule.
   * @throws RangeError when candidates is empty.
   */
  evolve(candidates: readonly Candidate[], rng: RandomSource, bestScore = 0): NeuralNetwork[] {
    if (candidates.length === 0) throw new RangeError('evolve needs at least one candidate');
    const s = this.settings;
    const size = candidates.length;
    const ranked = rankCandidates(candidates);
    const { rate, range } = this.mutationFor(bestScore);
    const next: NeuralNetwork[] = [];

    const elites = Math.min(s.eliteCount, size);
    for (let i = 0; i < elites; i++) {
      const elite = ranked[i];
      if (elite) next.push(elite.network.clone());
    }

    const mutatedElites = Math.min(s.mutatedEliteCount, size - next.length);
    for (let i = 0; i < mutatedElites; i++) {
      const elite = ranked[i];
      if (elite) next.push(mutate(elite.network.clone(), rate, range, s.mutationMode, rng));
    }

    const winners = Math.min(s.tournamentCount, size - next.length);
    for (let i = 0; i < winners; i++) {
      const winner = tournamentSelect(ranked, s.tournamentSize, rng);
      next.push(mutate(winner.network.clone(), rate, range, s.mutationMode, rng));
    }

    const immigrants = Math.min(s.immigrantCount, size - next.length);
    for (let i = 0; i < immigrants; i++) {
      next.push(NeuralNetwork.random(s.shape, rng, s.initRange));
    }

    let total = 0;
    for (const c of ranked) total += wheelWeight(c.fitness);
    while (next.length < size) {
      const a = selectParent(ranked, total, rng);
      const b = selectParent(ranked, total, rng);
      const child = crossover(a.network, b.network, s.crossover, rng);
      next.push(mutate(child, rate, range, s.mutationMode, rng));
    }
    return next;
  }
}
