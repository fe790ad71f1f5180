// genome.ts
// A network paired with the game it is playing this generation.

import type { FitnessWeights, SimulationConfig } from './config.ts';
import { computeFitness } from './fitness.ts';
import { SnakeGame } from './game.ts';
import { ACTIONS } from './grid.ts';
import type { NeuralNetwork } from './network.ts';
import type { GenomeOutcome } from './protocol/messages.ts';
import { createRng, genomeSeed } from './rng.ts';

export class Genome {
  readonly index: number;
  readonly network: NeuralNetwork;
  readonly game: SnakeGame;
  fitness = 0;
  private readonly weights: FitnessWeights;

  /**
   * @param index - Slot in the population; also selects the game's seed.
   */
  constructor(network: NeuralNetwork, config: SimulationConfig, generation: number, index: number) {
    this.index = index;
    this.network = network;
    this.game = new SnakeGame({
      boardSize: config.boardSize,
      rng: createRng(genomeSeed(config.seed, generation, index)),
      starvationSteps: config.starvationSteps,
      starvationScaling: config.starvationScaling,
      initialLength: config.initialLength
    });
    this.weights = config.fitness;
  }

  get alive(): boolean {
    return this.game.alive;
  }

  /**
   * Sees, decides and moves once. Returns whether the game still runs.
   */
  update(): boolean {
    if (!this.game.alive) return false;
    const choice = this.network.decide(this.game.vision());
    this.game.step(ACTIONS[choice] ?? 'straight');
    this.refreshFitness();
    return this.game.alive;
  }

  refreshFitness(): number {
    this.fitness = computeFitness(this.game.score, this.game.totalSteps, this.weights);
    return this.fitness;
  }

  /**
   * Result of a finished game. A game still running is reported as starved.
   */
  outcome(): GenomeOutcome {
    const state = this.game.state;
    return {
      index: this.index,
      fitness: this.refreshFitness(),
      score: this.game.score,
      length: this.game.length,
      steps: this.game.totalSteps,
      reason: state.kind === 'dead' ? state.reason : 'starvation'
    };
  }
}
