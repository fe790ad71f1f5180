// population.ts
// Fixed-size set of genomes playing one generation side by side.

import type { SimulationConfig } from './config.ts';
import { Genome } from './genome.ts';
import type { NeuralNetwork } from './network.ts';
import type { DeathCounts, GenomeOutcome } from './protocol/messages.ts';

export class Population {
  readonly generation: number;
  readonly genomes: Genome[];
  private readonly first: Genome;

  constructor(networks: readonly NeuralNetwork[], config: SimulationConfig, generation: number) {
    const [head, ...rest] = networks;
    if (!head) throw new RangeError('population needs at least one network');
    this.generation = generation;
    this.first = new Genome(head, config, generation, 0);
    this.genomes = [this.first, ...rest.map((net, i) => new Genome(net, config, generation, i + 1))];
  }

  get size(): number {
    return this.genomes.length;
  }

  /**
   * Steps every running genome once. Dead genomes stay frozen.
   * @returns Whether any genome is still running.
   */
  stepAll(): boolean {
    let anyAlive = false;
    for (const genome of this.genomes) {
      if (genome.update()) anyAlive = true;
    }
    return anyAlive;
  }

  aliveCount(): number {
    let n = 0;
    for (const genome of this.genomes) if (genome.alive) n++;
    return n;
  }

  /** Steps until every game has ended. */
  runToCompletion(): void {
    while (this.stepAll()) {
      // keep stepping
    }
  }

  outcomes(): GenomeOutcome[] {
    return this.genomes.map(genome => genome.outcome());
  }

  /**
   * Live genome with the highest score (lowest index on ties), or the first
   * genome once everything has died.
   */
  focus(): Genome {
    let best: Genome | null = null;
    for (const genome of this.genomes) {
      if (!genome.alive) continue;
      if (!best || genome.game.score > best.game.score) best = genome;
    }
    return best ?? this.first;
  }
}

export function countDeaths(outcomes: readonly GenomeOutcome[]): DeathCounts {
  const counts: DeathCounts = { collision: 0, starvation: 0, 'board-full': 0 };
  for (const o of outcomes) counts[o.reason] += 1;
  return counts;
}
