import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { networkFromJSON, networkToJSON } from '../src/networkSerializer.ts';
import type { HallOfFameEntry } from '../src/protocol/messages.ts';
import { isRecord } from '../src/utils.ts';

const MAX_SNAPSHOT_BYTES = 50 * 1024 * 1024;
const MAX_GENOME_WEIGHTS = 2_000_000;

/** Whole-population checkpoint: every network's flat parameters in slot order. */
export interface PopulationSnapshotPayload {
  generation: number;
  topology: string;
  cfgHash: string;
  seed: number;
  networks: number[][];
}

export interface SnapshotMeta {
  id: number;
  createdAt: number;
  gen: number;
}

export interface StoredHofEntry extends HallOfFameEntry {
  id: number;
  createdAt: number;
}

export interface Persistence {
  saveHofEntry: (entry: HallOfFameEntry) => void;
  listHofEntries: (limit: number) => StoredHofEntry[];
  saveSnapshot: (payload: PopulationSnapshotPayload) => number;
  loadLatestSnapshot: () => PopulationSnapshotPayload | null;
  listSnapshots: (limit: number) => SnapshotMeta[];
  exportSnapshot: (id: number) => PopulationSnapshotPayload;
}

type DbType = ReturnType<typeof Database>;

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS hof_entries (
  id INTEGER PRIMARY KEY,
  created_at INTEGER,
  gen INTEGER,
  seed INTEGER,
  slot INTEGER,
  fitness REAL,
  score INTEGER,
  length INTEGER,
  network_json TEXT
);

CREATE TABLE IF NOT EXISTS population_snapshots (
  id INTEGER PRIMARY KEY,
  created_at INTEGER,
  gen INTEGER,
  payload_json TEXT
);

CREATE INDEX IF NOT EXISTS idx_hof_gen ON hof_entries(gen);
CREATE INDEX IF NOT EXISTS idx_hof_fitness ON hof_entries(fitness);
CREATE INDEX IF NOT EXISTS idx_snap_gen ON population_snapshots(gen);
`;

export function initDb(dbPath: string): DbType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.exec(SCHEMA_SQL);
  return db;
}

function num(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  if (typeof value !== 'number') throw new Error(`row column ${key} is not numeric`);
  return value;
}

function text(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw new Error(`row column ${key} is not text`);
  return value;
}

function parsePayload(json: string): PopulationSnapshotPayload {
  const parsed: unknown = JSON.parse(json);
  validateSnapshotPayload(parsed);
  return parsed;
}

export function createPersistence(db: DbType): Persistence {
  const insertHof = db.prepare(
    `INSERT INTO hof_entries (created_at, gen, seed, slot, fitness, score, length, network_json)
     VALUES (@created_at, @gen, @seed, @slot, @fitness, @score, @length, @network_json)`
  );
  const listHofStmt = db.prepare(
    `SELECT id, created_at, gen, seed, slot, fitness, score, length, network_json
     FROM hof_entries ORDER BY fitness DESC, id ASC LIMIT ?`
  );
  const insertSnapshot = db.prepare(
    `INSERT INTO population_snapshots (created_at, gen, payload_json)
     VALUES (@created_at, @gen, @payload_json)`
  );
  const latestSnapshot = db.prepare(
    `SELECT payload_json FROM population_snapshots ORDER BY id DESC LIMIT 1`
  );
  const listSnapshotStmt = db.prepare(
    `SELECT id, created_at, gen FROM population_snapshots ORDER BY id DESC LIMIT ?`
  );
  const exportSnapshotStmt = db.prepare(
    `SELECT payload_json FROM population_snapshots WHERE id = ?`
  );

  const saveHofEntry = (entry: HallOfFameEntry): void => {
    if (!Number.isFinite(entry.gen) || !Number.isFinite(entry.fitness)) return;
    insertHof.run({
      created_at: Date.now(),
      gen: entry.gen,
      seed: entry.seed,
      slot: entry.index,
      fitness: entry.fitness,
      score: entry.score,
      length: entry.length,
      network_json: JSON.stringify(entry.network)
    });
  };

  const listHofEntries = (limit: number): StoredHofEntry[] => {
    const rows: unknown[] = listHofStmt.all(limit);
    return rows.filter(isRecord).map(row => {
      const parsed: unknown = JSON.parse(text(row, 'network_json'));
      return {
        id: num(row, 'id'),
        createdAt: num(row, 'created_at'),
        gen: num(row, 'gen'),
        seed: num(row, 'seed'),
        index: num(row, 'slot'),
        fitness: num(row, 'fitness'),
        score: num(row, 'score'),
        length: num(row, 'length'),
        network: networkToJSON(networkFromJSON(parsed))
      };
    });
  };

  const saveSnapshot = (payload: PopulationSnapshotPayload): number => {
    validateSnapshotPayload(payload);
    const json = JSON.stringify(payload);
    const bytes = Buffer.byteLength(json, 'utf8');
    if (bytes > MAX_SNAPSHOT_BYTES) {
      throw new Error(`snapshot too large (${bytes} bytes)`);
    }
    const info = insertSnapshot.run({
      created_at: Date.now(),
      gen: payload.generation,
      payload_json: json
    });
    return Number(info.lastInsertRowid);
  };

  const loadLatestSnapshot = (): PopulationSnapshotPayload | null => {
    const row: unknown = latestSnapshot.get();
    if (!isRecord(row)) return null;
    return parsePayload(text(row, 'payload_json'));
  };

  const listSnapshots = (limit: number): SnapshotMeta[] => {
    const rows: unknown[] = listSnapshotStmt.all(limit);
    return rows.filter(isRecord).map(row => ({
      id: num(row, 'id'),
      createdAt: num(row, 'created_at'),
      gen: num(row, 'gen')
    }));
  };

  const exportSnapshot = (id: number): PopulationSnapshotPayload => {
    const row: unknown = exportSnapshotStmt.get(id);
    if (!isRecord(row)) {
      throw new Error('snapshot not found');
    }
    return parsePayload(text(row, 'payload_json'));
  };

  return {
    saveHofEntry,
    listHofEntries,
    saveSnapshot,
    loadLatestSnapshot,
    listSnapshots,
    exportSnapshot
  };
}

export function validateSnapshotPayload(payload: unknown): asserts payload is PopulationSnapshotPayload {
  if (!isRecord(payload)) {
    throw new Error('snapshot payload must be an object');
  }
  const generation = payload['generation'];
  if (typeof generation !== 'number' || !Number.isFinite(generation)) {
    throw new Error('snapshot generation is invalid');
  }
  const topology = payload['topology'];
  if (typeof topology !== 'string' || !topology.trim()) {
    throw new Error('snapshot topology is invalid');
  }
  const cfgHash = payload['cfgHash'];
  if (typeof cfgHash !== 'string' || !cfgHash.trim()) {
    throw new Error('snapshot cfgHash missing');
  }
  const seed = payload['seed'];
  if (typeof seed !== 'number' || !Number.isFinite(seed)) {
    throw new Error('snapshot seed missing');
  }
  const networks = payload['networks'];
  if (!Array.isArray(networks) || networks.length === 0) {
    throw new Error('snapshot networks missing');
  }
  for (const weights of networks) {
    if (!Array.isArray(weights)) {
      throw new Error('network weights missing');
    }
    if (weights.length > MAX_GENOME_WEIGHTS) {
      throw new Error('network weights too large');
    }
    for (const w of weights) {
      if (typeof w !== 'number' || !Number.isFinite(w)) {
        throw new Error('network weights contain invalid numbers');
      }
    }
  }
}
