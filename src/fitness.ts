// fitness.ts

import type { FitnessWeights } from './config.ts';

/**
 * Scores a finished (or running) game. The survival term approaches but
 * never reaches stepWeight, so score always dominates.
 */
export function computeFitness(score: number, steps: number, weights: FitnessWeights): number {
  const s = Math.max(0, steps);
  return weights.scoreWeight * score + (weights.stepWeight * s) / (s + weights.stepScale);
}
