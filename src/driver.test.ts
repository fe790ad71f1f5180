import { describe, it, expect } from 'vitest';
import { networkShape, normalizeSimulationConfig } from './config.ts';
import { randomNetworks, seedFromNetwork, SimulationDriver, type GenerationEvent } from './driver.ts';
import { ShapeMismatchError } from './errors.ts';
import { NeuralNetwork } from './network.ts';
import type { GenomeOutcome } from './protocol/messages.ts';
import { genomeSeed } from './rng.ts';

/** Test suite label for the generation driver. */
const SUITE = 'driver.ts';

const config = normalizeSimulationConfig({
  boardSize: 8,
  populationSize: 6,
  hiddenLayers: [4],
  eliteCount: 1,
  seed: 5,
  historyLength: 2
});

function outcome(index: number, fitness: number, score: number): GenomeOutcome {
  return { index, fitness, score, length: 3 + score, steps: 10, reason: 'collision' };
}

describe(SUITE, () => {
  it('exposes the first generation before anything runs', () => {
    const driver = new SimulationDriver({ config });
    const snap = driver.snapshot();
    expect(snap.generation).toBe(1);
    expect(snap.boardSize).toBe(8);
    expect(snap.populationSize).toBe(6);
    expect(snap.aliveCount).toBe(6);
    expect(snap.focusIndex).toBe(0);
    expect(snap.body).toEqual([{ x: 4, y: 4 }, { x: 3, y: 4 }, { x: 2, y: 4 }]);
    expect(snap.state).toEqual({ kind: 'running' });
    expect(snap.history).toEqual([]);
    expect(driver.bestNetwork).toBeNull();
  });

  it('hands out snapshot copies', () => {
    const driver = new SimulationDriver({ config });
    const snap = driver.snapshot();
    snap.body[0] = { x: 0, y: 0 };
    expect(driver.population.genomes[0]?.game.head).toEqual({ x: 4, y: 4 });
  });

  it('runs a generation, breeds the next and reports to listeners', () => {
    const driver = new SimulationDriver({ config });
    const events: GenerationEvent[] = [];
    driver.onGeneration(event => events.push(event));
    const summary = driver.runGeneration();
    expect(summary.gen).toBe(1);
    expect(driver.generation).toBe(2);
    expect(driver.population.generation).toBe(2);
    expect(driver.population.size).toBe(6);
    expect(summary.best).toBeGreaterThanOrEqual(summary.avg);
    expect(summary.avg).toBeGreaterThanOrEqual(summary.min);
    expect(summary.deaths.collision + summary.deaths.starvation + summary.deaths['board-full']).toBe(6);
    expect(events).toHaveLength(1);
    expect(events[0]?.improvedScore).toBe(true);
    expect(driver.bestNetwork).not.toBeNull();
    expect(driver.hallOfFame.size).toBe(1);
    expect(driver.currentNetworks()[0]?.equals(events[0]?.best ?? new NeuralNetwork(driver.shape))).toBe(true);
  });

  it('completes a generation tick by tick', () => {
    const driver = new SimulationDriver({ config });
    let summary = driver.step();
    let ticks = 1;
    while (summary === null) {
      summary = driver.step();
      ticks++;
    }
    expect(summary.gen).toBe(1);
    expect(ticks).toBeGreaterThan(0);
    expect(driver.generation).toBe(2);
  });

  it('is reproducible for a fixed seed', () => {
    const a = new SimulationDriver({ config });
    const b = new SimulationDriver({ config });
    for (let i = 0; i < 2; i++) expect(a.runGeneration()).toEqual(b.runGeneration());
  });

  it('keeps a bounded history', () => {
    const driver = new SimulationDriver({ config });
    for (let i = 0; i < 3; i++) driver.runGeneration();
    expect(driver.getHistory().map(h => h.gen)).toEqual([2, 3]);
  });

  it('summarises externally computed outcomes', () => {
    const driver = new SimulationDriver({ config });
    const nets = driver.currentNetworks();
    const events: GenerationEvent[] = [];
    driver.onGeneration(event => events.push(event));
    const summary = driver.completeGeneration([
      outcome(5, 0, 0),
      outcome(0, 1, 0),
      outcome(1, 5, 2),
      outcome(2, 5, 3),
      outcome(3, 2, 1),
      outcome(4, 0, 0)
    ]);
    expect(summary.best).toBe(5);
    expect(summary.min).toBe(0);
    expect(summary.avg).toBe(13 / 6);
    expect(summary.bestIndex).toBe(1);
    expect(summary.bestScore).toBe(3);
    expect(summary.bestLength).toBe(5);
    expect(summary.deaths).toEqual({ collision: 6, starvation: 0, 'board-full': 0 });
    expect(driver.bestScoreEver).toBe(3);
    expect(driver.bestNetwork?.equals(nets[2] ?? new NeuralNetwork(driver.shape))).toBe(true);
    expect(events[0]?.hofEntry).toMatchObject({ gen: 1, index: 1, fitness: 5, score: 2, seed: genomeSeed(5, 1, 1) });
    expect(events[0]?.outcomes.map(o => o.index)).toEqual([0, 1, 2, 3, 4, 5]);

    const next = driver.completeGeneration([0, 1, 2, 3, 4, 5].map(i => outcome(i, 1, 1)));
    expect(events[1]?.improvedScore).toBe(false);
    expect(next.bestScoreEver).toBe(3);
    expect(next.bestFitnessEver).toBe(5);
  });

  it('rejects outcome sets that do not cover every slot once', () => {
    const driver = new SimulationDriver({ config });
    expect(() => driver.completeGeneration([outcome(0, 1, 0)])).toThrow(RangeError);
    expect(() => driver.completeGeneration([0, 0, 1, 2, 3, 4].map(i => outcome(i, 1, 0)))).toThrow(RangeError);
    expect(() => driver.completeGeneration([0, 1, 2, 3, 4, 9].map(i => outcome(i, 1, 0)))).toThrow(RangeError);
    expect(driver.generation).toBe(1);
  });

  it('stops listening after unsubscribe and records stop requests', () => {
    const driver = new SimulationDriver({ config });
    let calls = 0;
    const off = driver.onGeneration(() => {
      calls++;
    });
    driver.runGeneration();
    off();
    driver.runGeneration();
    expect(calls).toBe(1);
    expect(driver.stopRequested).toBe(false);
    driver.stop();
    expect(driver.stopRequested).toBe(true);
  });

  it('seeds a generation from one saved network', () => {
    const base = randomNetworks(config)[0] ?? new NeuralNetwork(networkShape(config));
    const seeded = seedFromNetwork(base, config);
    expect(seeded).toHaveLength(6);
    expect(seeded[0]?.equals(base)).toBe(true);
    expect(seeded[0]).not.toBe(base);
    expect(seeded.slice(1).some(net => !net.equals(base))).toBe(true);
    const driver = new SimulationDriver({ config, initialNetworks: seeded });
    expect(driver.currentNetworks()[0]?.equals(base)).toBe(true);
  });

  it('rejects networks of another topology', () => {
    const wrong = new NeuralNetwork({ layerSizes: [32, 3], hiddenActivation: 'relu', outputActivation: 'linear' });
    expect(() => seedFromNetwork(wrong, config)).toThrow(ShapeMismatchError);
    expect(() => new SimulationDriver({ config, initialNetworks: [wrong] })).toThrow(RangeError);
    expect(() => new SimulationDriver({ config, initialNetworks: Array.from({ length: 6 }, () => wrong) })).toThrow(ShapeMismatchError);
  });
});
