import { describe, it, expect } from 'vitest';
import { HallOfFame, MAX_HOF_ENTRIES } from './hallOfFame.ts';
import { NeuralNetwork } from './network.ts';
import { networkToJSON } from './networkSerializer.ts';
import type { HallOfFameEntry } from './protocol/messages.ts';

/** Test suite label for the in-memory hall of fame. */
const SUITE = 'hallOfFame.ts';

const network = networkToJSON(
  new NeuralNetwork({ layerSizes: [2, 1], hiddenActivation: 'relu', outputActivation: 'linear' })
);

function entry(gen: number, fitness: number): HallOfFameEntry {
  return { gen, seed: gen * 10, index: 0, fitness, score: Math.floor(fitness), length: 3, network };
}

describe(SUITE, () => {
  it('keeps the best entries first and trims to capacity', () => {
    const hof = new HallOfFame(3);
    expect(hof.add(entry(1, 1))).toBe(true);
    expect(hof.add(entry(2, 5))).toBe(true);
    expect(hof.add(entry(3, 3))).toBe(true);
    expect(hof.add(entry(4, 5))).toBe(true);
    expect(hof.add(entry(5, 0.5))).toBe(false);
    expect(hof.getAll().map(e => e.gen)).toEqual([2, 4, 3]);
    expect(hof.size).toBe(3);
  });

  it('ignores non-finite fitness', () => {
    const hof = new HallOfFame();
    expect(hof.add(entry(1, Number.NaN))).toBe(false);
    expect(hof.add(entry(2, Number.POSITIVE_INFINITY))).toBe(false);
    expect(hof.size).toBe(0);
    expect(hof.capacity).toBe(MAX_HOF_ENTRIES);
  });

  it('returns copies of its list', () => {
    const hof = new HallOfFame();
    hof.add(entry(1, 2));
    hof.getAll().pop();
    expect(hof.size).toBe(1);
  });
});
