import { describe, it, expect } from 'vitest';
import { networkShape, normalizeSimulationConfig } from './config.ts';
import { computeFitness } from './fitness.ts';
import { Genome } from './genome.ts';
import { NeuralNetwork } from './network.ts';
import { countDeaths, Population } from './population.ts';
import { createRng } from './rng.ts';
import { simulateShard, splitIntoShards } from './shard.ts';

/** Test suite label for genomes, populations and shards. */
const SUITE = 'population.ts';

const config = normalizeSimulationConfig({ boardSize: 8, populationSize: 6, hiddenLayers: [4], seed: 7 });
const shape = networkShape(config);

function networks(seed: number): NeuralNetwork[] {
  const rng = createRng(seed);
  return Array.from({ length: config.populationSize }, () => NeuralNetwork.random(shape, rng));
}

describe(SUITE, () => {
  it('scores so that one more food beats any survival time', () => {
    const weights = config.fitness;
    expect(computeFitness(2, 100, weights)).toBe(2.25);
    expect(computeFitness(0, 0, weights)).toBe(0);
    expect(computeFitness(1, 0, weights)).toBeGreaterThan(computeFitness(0, 1e9, weights));
  });

  it('reports a genome that never moved as starved with zero fitness', () => {
    const genome = new Genome(networks(1)[0] ?? new NeuralNetwork(shape), config, 1, 0);
    expect(genome.outcome()).toEqual({ index: 0, fitness: 0, score: 0, length: 3, steps: 0, reason: 'starvation' });
  });

  it('gives every genome its own game', () => {
    const population = new Population(networks(2), config, 1);
    const games = new Set(population.genomes.map(g => g.game));
    expect(games.size).toBe(config.populationSize);
    expect(population.genomes.map(g => g.index)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('runs every game to a terminal state', () => {
    const population = new Population(networks(3), config, 1);
    expect(population.aliveCount()).toBe(6);
    population.runToCompletion();
    expect(population.aliveCount()).toBe(0);
    expect(population.stepAll()).toBe(false);
    const outcomes = population.outcomes();
    expect(outcomes.map(o => o.index)).toEqual([0, 1, 2, 3, 4, 5]);
    const deaths = countDeaths(outcomes);
    expect(deaths.collision + deaths.starvation + deaths['board-full']).toBe(6);
    expect(population.focus()).toBe(population.genomes[0]);
  });

  it('replays identically from the same networks and seed', () => {
    const a = new Population(networks(4), config, 3);
    const b = new Population(networks(4), config, 3);
    a.runToCompletion();
    b.runToCompletion();
    expect(a.outcomes()).toEqual(b.outcomes());
  });

  it('focuses the live genome with the highest score', () => {
    const population = new Population(networks(5), config, 1);
    const [first, second, third] = population.genomes;
    if (!first || !second || !third) throw new Error('population too small');
    second.game.score = 2;
    third.game.score = 2;
    expect(population.focus()).toBe(second);
    second.game.state = { kind: 'dead', reason: 'collision' };
    expect(population.focus()).toBe(third);
  });

  it('refuses an empty population', () => {
    expect(() => new Population([], config, 1)).toThrow(RangeError);
  });

  it('matches in-process results when split into shards', () => {
    const nets = networks(6);
    const population = new Population(nets, config, 2);
    population.runToCompletion();
    const jobs = splitIntoShards(nets, 4, config, shape, 2);
    expect(jobs.map(job => job.genomes.map(g => g.index))).toEqual([[0, 1], [2, 3], [4, 5]]);
    expect(jobs.flatMap(simulateShard)).toEqual(population.outcomes());
  });

  it('never makes more shards than genomes', () => {
    const jobs = splitIntoShards(networks(7).slice(0, 2), 8, config, shape, 1);
    expect(jobs).toHaveLength(2);
    expect(splitIntoShards(networks(7), 0, config, shape, 1)).toHaveLength(1);
  });
});
