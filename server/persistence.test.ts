import { describe, it, expect } from 'vitest';
import { NeuralNetwork } from '../src/network.ts';
import { networkToJSON } from '../src/networkSerializer.ts';
import type { HallOfFameEntry } from '../src/protocol/messages.ts';
import { createPersistence, initDb, validateSnapshotPayload, type PopulationSnapshotPayload } from './persistence.ts';

/** Test suite label for persistence helpers. */
const SUITE = 'persistence';

const network = networkToJSON(
  new NeuralNetwork({ layerSizes: [2, 1], hiddenActivation: 'relu', outputActivation: 'linear' }, new Float32Array([0.5, -0.25, 1]))
);

function hofEntry(gen: number, fitness: number): HallOfFameEntry {
  return { gen, seed: 1000 + gen, index: gen % 3, fitness, score: Math.floor(fitness), length: 3 + Math.floor(fitness), network };
}

function snapshot(generation: number): PopulationSnapshotPayload {
  return { generation, topology: '2x1', cfgHash: 'abc123', seed: 42, networks: [[0.5, -0.25, 1], [0, 0, 0]] };
}

describe(SUITE, () => {
  it('creates both tables', () => {
    const db = initDb(':memory:');
    const names = db.prepare(`SELECT name FROM sqlite_master WHERE type='table' ORDER BY name`).pluck().all();
    expect(names).toEqual(['hof_entries', 'population_snapshots']);
    db.close();
  });

  it('lists hall-of-fame entries best first', () => {
    const db = initDb(':memory:');
    const persistence = createPersistence(db);
    persistence.saveHofEntry(hofEntry(1, 2.5));
    persistence.saveHofEntry(hofEntry(2, 7.25));
    persistence.saveHofEntry(hofEntry(3, 2.5));
    persistence.saveHofEntry(hofEntry(4, Number.NaN));
    const entries = persistence.listHofEntries(10);
    expect(entries.map(e => e.gen)).toEqual([2, 1, 3]);
    expect(entries[0]).toMatchObject({ gen: 2, seed: 1002, index: 2, fitness: 7.25, score: 7, length: 10 });
    expect(entries[0]?.network).toEqual(network);
    expect(persistence.listHofEntries(1)).toHaveLength(1);
    db.close();
  });

  it('stores, lists and exports population snapshots', () => {
    const db = initDb(':memory:');
    const persistence = createPersistence(db);
    expect(persistence.loadLatestSnapshot()).toBeNull();
    const first = persistence.saveSnapshot(snapshot(1));
    const second = persistence.saveSnapshot(snapshot(2));
    expect(second).toBeGreaterThan(first);
    expect(persistence.loadLatestSnapshot()).toEqual(snapshot(2));
    expect(persistence.listSnapshots(10).map(s => [s.id, s.gen])).toEqual([[second, 2], [first, 1]]);
    expect(persistence.exportSnapshot(first)).toEqual(snapshot(1));
    expect(() => persistence.exportSnapshot(999)).toThrow('snapshot not found');
    db.close();
  });

  it('refuses invalid snapshots', () => {
    expect(() => validateSnapshotPayload(null)).toThrow('snapshot payload must be an object');
    expect(() => validateSnapshotPayload({ ...snapshot(1), cfgHash: '' })).toThrow('snapshot cfgHash missing');
    expect(() => validateSnapshotPayload({ ...snapshot(1), networks: [] })).toThrow('snapshot networks missing');
    expect(() => validateSnapshotPayload({ ...snapshot(1), networks: [[1, Number.NaN]] })).toThrow(
      'network weights contain invalid numbers'
    );
    const db = initDb(':memory:');
    expect(() => createPersistence(db).saveSnapshot({ ...snapshot(1), topology: ' ' })).toThrow('snapshot topology is invalid');
    db.close();
  });
});
