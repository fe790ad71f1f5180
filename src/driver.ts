// driver.ts
// Owns the running population and the generation counter. Renderers and the
// server read state through snapshot(); nothing here waits on them.

import { networkShape, type SimulationConfig } from './config.ts';
import { GeneticAlgorithm, geneticSettings, mutate, type Candidate } from './genetics.ts';
import { HallOfFame } from './hallOfFame.ts';
import { NeuralNetwork, type NetworkShape } from './network.ts';
import { assertTopology, networkToJSON } from './networkSerializer.ts';
import { countDeaths, Population } from './population.ts';
import type {
  FitnessHistoryEntry,
  GenerationSummary,
  HallOfFameEntry,
  GenomeOutcome,
  SimulationSnapshot
} from './protocol/messages.ts';
import { BREEDING_STREAM, createRng, genomeSeed, hashSeed, SEEDING_STREAM } from './rng.ts';

/** Everything a listener learns when a generation ends. */
export interface GenerationEvent {
  summary: GenerationSummary;
  outcomes: GenomeOutcome[];
  /** Network with the best fitness this generation. */
  best: NeuralNetwork;
  /** True when this generation set a new best score (always true for the first). */
  improvedScore: boolean;
  /** Record of the generation's best genome, as offered to the hall of fame. */
  hofEntry: HallOfFameEntry;
}

export type GenerationListener = (event: GenerationEvent) => void;

export interface SimulationDriverOptions {
  config: SimulationConfig;
  /** Networks for the first generation; random when omitted. */
  initialNetworks?: readonly NeuralNetwork[];
  hallOfFameSize?: number;
}

/**
 * First-generation networks grown from one saved network: slot 0 is the
 * network itself, every other slot a mutated copy.
 */
export function seedFromNetwork(base: NeuralNetwork, config: SimulationConfig): NeuralNetwork[] {
  assertTopology(base, networkShape(config).layerSizes);
  const rng = createRng(hashSeed(config.seed, SEEDING_STREAM, 1));
  const out = [base.clone()];
  while (out.length < config.populationSize) {
    out.push(mutate(base.clone(), config.mutationRate, config.mutationRange, config.mutationMode, rng));
  }
  return out;
}

export function randomNetworks(config: SimulationConfig, shape: NetworkShape = networkShape(config)): NeuralNetwork[] {
  const rng = createRng(hashSeed(config.seed, SEEDING_STREAM));
  const out: NeuralNetwork[] = [];
  for (let i = 0; i < config.populationSize; i++) out.push(NeuralNetwork.random(shape, rng, config.initRange));
  return out;
}

export class SimulationDriver {
  readonly config: SimulationConfig;
  readonly shape: NetworkShape;
  readonly ga: GeneticAlgorithm;
  readonly hallOfFame: HallOfFame;
  generation = 1;
  population: Population;
  bestFitnessEver = 0;
  bestScoreEver = 0;
  /** Network that set bestScoreEver. */
  bestNetwork: NeuralNetwork | null = null;
  private history: FitnessHistoryEntry[] = [];
  private listeners = new Set<GenerationListener>();
  private stopFlag = false;

  constructor(opts: SimulationDriverOptions) {
    this.config = opts.config;
    this.shape = networkShape(opts.config);
    this.ga = new GeneticAlgorithm(geneticSettings(opts.config, this.shape));
    this.hallOfFame = new HallOfFame(opts.hallOfFameSize);
    const initial = opts.initialNetworks ?? randomNetworks(opts.config, this.shape);
    if (initial.length !== opts.config.populationSize) {
      throw new RangeError(`expected ${opts.config.populationSize} initial networks, got ${initial.length}`);
    }
    for (const net of initial) assertTopology(net, this.shape.layerSizes);
    this.population = new Population(initial, this.config, this.generation);
  }

  get stopRequested(): boolean {
    return this.stopFlag;
  }

  /** Asks the runner to stop at the next generation boundary. */
  stop(): void {
    this.stopFlag = true;
  }

  onGeneration(listener: GenerationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * One tick of every live genome. Completes the generation when the last
   * game ends.
   * @returns The summary when this tick finished a generation, else null.
   */
  step(): GenerationSummary | null {
    if (this.population.stepAll()) return null;
    return this.completeGeneration(this.population.outcomes());
  }

  runGeneration(): GenerationSummary {
    this.population.runToCompletion();
    return this.completeGeneration(this.population.outcomes());
  }

  /** Networks of the current generation, in slot order. */
  currentNetworks(): NeuralNetwork[] {
    return this.population.genomes.map(g => g.network);
  }

  /**
   * Closes the current generation with the given results, breeds the next
   * one and advances the counter. Outcomes may come from worker shards in
   * any order but must cover every slot once.
   */
  completeGeneration(outcomes: readonly GenomeOutcome[]): GenerationSummary {
    const genomes = this.population.genomes;
    const ordered: GenomeOutcome[] = new Array<GenomeOutcome>(genomes.length);
    let filled = 0;
    for (const o of outcomes) {
      if (o.index < 0 || o.index >= genomes.length || ordered[o.index] !== undefined) {
        throw new RangeError(`outcome index ${o.index} is out of range or repeated`);
      }
      ordered[o.index] = o;
      filled++;
    }
    if (filled !== genomes.length) {
      throw new RangeError(`expected ${genomes.length} outcomes, got ${filled}`);
    }

    const candidates: Candidate[] = [];
    let bestIdx = 0;
    let sum = 0;
    let min = Infinity;
    let bestScore = 0;
    ordered.forEach((o, i) => {
      const network = genomes[i]?.network;
      if (!network) return;
      candidates.push({ fitness: o.fitness, network });
      sum += o.fitness;
      if (o.fitness < min) min = o.fitness;
      if (o.fitness > (ordered[bestIdx]?.fitness ?? -Infinity)) bestIdx = i;
      if (o.score > bestScore) bestScore = o.score;
    });
    const bestOutcome = ordered[bestIdx];
    const bestNet = genomes[bestIdx]?.network;
    if (!bestOutcome || !bestNet) throw new RangeError('generation has no genomes');

    const improvedScore = this.bestNetwork === null || bestScore > this.bestScoreEver;
    if (improvedScore) {
      const scorer = ordered.find(o => o.score === bestScore) ?? bestOutcome;
      this.bestScoreEver = bestScore;
      this.bestNetwork = (genomes[scorer.index]?.network ?? bestNet).clone();
    }
    if (bestOutcome.fitness > this.bestFitnessEver) this.bestFitnessEver = bestOutcome.fitness;

    const summary: GenerationSummary = {
      gen: this.generation,
      best: bestOutcome.fitness,
      avg: sum / ordered.length,
      min,
      bestScore,
      bestLength: bestOutcome.length,
      bestIndex: bestIdx,
      deaths: countDeaths(ordered),
      bestScoreEver: this.bestScoreEver,
      bestFitnessEver: this.bestFitnessEver
    };
    this.history.push({
      gen: summary.gen,
      best: summary.best,
      avg: summary.avg,
      min: summary.min,
      bestScore: summary.bestScore
    });
    while (this.history.length > this.config.historyLength) this.history.shift();

    const hofEntry: HallOfFameEntry = {
      gen: this.generation,
      seed: genomeSeed(this.config.seed, this.generation, bestIdx),
      index: bestIdx,
      fitness: bestOutcome.fitness,
      score: bestOutcome.score,
      length: bestOutcome.length,
      network: networkToJSON(bestNet)
    };
    this.hallOfFame.add(hofEntry);

    const event: GenerationEvent = { summary, outcomes: ordered, best: bestNet, improvedScore, hofEntry };
    for (const listener of this.listeners) listener(event);

    const rng = createRng(hashSeed(this.config.seed, this.generation, BREEDING_STREAM));
    const next = this.ga.evolve(candidates, rng, bestScore);
    this.generation += 1;
    this.population = new Population(next, this.config, this.generation);
    return summary;
  }

  getHistory(): FitnessHistoryEntry[] {
    return this.history.map(entry => ({ ...entry }));
  }

  snapshot(): SimulationSnapshot {
    const focus = this.population.focus();
    const game = focus.game;
    let generationBestScore = 0;
    for (const genome of this.population.genomes) {
      if (genome.game.score > generationBestScore) generationBestScore = genome.game.score;
    }
    return {
      generation: this.generation,
      boardSize: this.config.boardSize,
      populationSize: this.population.size,
      aliveCount: this.population.aliveCount(),
      focusIndex: focus.index,
      body: game.body.map(p => ({ x: p.x, y: p.y })),
      food: { x: game.food.x, y: game.food.y },
      heading: game.heading,
      score: game.score,
      state: game.state.kind === 'dead' ? { kind: 'dead', reason: game.state.reason } : { kind: 'running' },
      totalSteps: game.totalSteps,
      stepsSinceFood: game.stepsSinceFood,
      bestFitnessEver: this.bestFitnessEver,
      bestScoreEver: this.bestScoreEver,
      generationBestScore,
      history: this.getHistory()
    };
  }
}
