// hallOfFame.ts
// Keeps the best genomes seen across all generations, best first.

import type { HallOfFameEntry } from './protocol/messages.ts';

export const MAX_HOF_ENTRIES = 50;

export class HallOfFame {
  private entries: HallOfFameEntry[] = [];
  readonly capacity: number;

  constructor(capacity = MAX_HOF_ENTRIES) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  /**
   * Adds a candidate, keeping the top entries by fitness. Ties keep the
   * earlier entry ahead.
   * @returns Whether the entry made the list.
   */
  add(entry: HallOfFameEntry): boolean {
    if (!Number.isFinite(entry.fitness)) return false;
    this.entries.push(entry);
    this.entries.sort((a, b) => b.fitness - a.fitness);
    if (this.entries.length > this.capacity) this.entries.length = this.capacity;
    return this.entries.includes(entry);
  }

  /**
   * Returns copy of entries.
   */
  getAll(): HallOfFameEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
