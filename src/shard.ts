// shard.ts
// Plays a slice of one generation to completion. Used by worker threads;
// results match the in-process population because each genome seeds its
// own game from (run seed, generation, slot).

import type { SimulationConfig } from './config.ts';
import { Genome } from './genome.ts';
import { NeuralNetwork, type NetworkShape } from './network.ts';
import type { GenomeOutcome } from './protocol/messages.ts';

export interface ShardGenome {
  index: number;
  params: Float32Array;
}

/** Structured-clone friendly job description. */
export interface ShardJob {
  config: SimulationConfig;
  shape: NetworkShape;
  generation: number;
  genomes: ShardGenome[];
}

export function simulateShard(job: ShardJob): GenomeOutcome[] {
  const out: GenomeOutcome[] = [];
  for (const entry of job.genomes) {
    const genome = new Genome(new NeuralNetwork(job.shape, entry.params), job.config, job.generation, entry.index);
    while (genome.update()) {
      // play on
    }
    out.push(genome.outcome());
  }
  return out;
}

/**
 * Splits slot indices into at most shardCount contiguous, non-empty jobs.
 */
export function splitIntoShards(
  networks: readonly NeuralNetwork[],
  shardCount: number,
  config: SimulationConfig,
  shape: NetworkShape,
  generation: number
): ShardJob[] {
  const count = Math.max(1, Math.min(Math.floor(shardCount), networks.length));
  const per = Math.ceil(networks.length / count);
  const jobs: ShardJob[] = [];
  for (let start = 0; start < networks.length; start += per) {
    const genomes: ShardGenome[] = [];
    for (let i = start; i < Math.min(start + per, networks.length); i++) {
      const net = networks[i];
      if (net) genomes.push({ index: i, params: net.params.slice() });
    }
    jobs.push({ config, shape, generation, genomes });
  }
  return jobs;
}
