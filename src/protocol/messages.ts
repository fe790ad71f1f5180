import type { DeathReason, GameState } from '../game.ts';
import type { Heading, Point } from '../grid.ts';
import type { NetworkJSON } from '../networkSerializer.ts';

/** Final result of one genome's game. */
export interface GenomeOutcome {
  index: number;
  fitness: number;
  score: number;
  length: number;
  steps: number;
  reason: DeathReason;
}

export type DeathCounts = Record<DeathReason, number>;

export interface FitnessHistoryEntry {
  gen: number;
  best: number;
  avg: number;
  min: number;
  bestScore: number;
}

/** Per-generation statistics broadcast to clients and logged by the runner. */
export interface GenerationSummary extends FitnessHistoryEntry {
  bestLength: number;
  bestIndex: number;
  deaths: DeathCounts;
  bestScoreEver: number;
  bestFitnessEver: number;
}

export interface HallOfFameEntry {
  gen: number;
  seed: number;
  index: number;
  fitness: number;
  score: number;
  length: number;
  network: NetworkJSON;
}

/** Copy of the state a renderer needs; never aliases live game data. */
export interface SimulationSnapshot {
  generation: number;
  boardSize: number;
  populationSize: number;
  aliveCount: number;
  focusIndex: number;
  body: Point[];
  food: Point;
  heading: Heading;
  score: number;
  state: GameState;
  totalSteps: number;
  stepsSinceFood: number;
  bestFitnessEver: number;
  bestScoreEver: number;
  generationBestScore: number;
  history: FitnessHistoryEntry[];
}
