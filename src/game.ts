// game.ts
// One game of Snake on a square board. Each game owns its random stream, so
// games never influence each other.

import type { StarvationTier } from './config.ts';
import {
  cellIndex,
  headingVector,
  inBounds,
  samePoint,
  turn,
  type Action,
  type Heading,
  type Point
} from './grid.ts';
import { randomInt, type RandomSource } from './rng.ts';
import { computeVision } from './vision.ts';

export type DeathReason = 'collision' | 'starvation' | 'board-full';

export type GameState =
  | { kind: 'running' }
  | { kind: 'dead'; reason: DeathReason };

export interface SnakeGameOptions {
  boardSize: number;
  rng: RandomSource;
  /** Defaults to boardSize². */
  starvationSteps?: number;
  starvationScaling?: readonly StarvationTier[];
  initialLength?: number;
  /** Head first. Overrides initialLength and the centred start. */
  initialBody?: readonly Point[];
  initialHeading?: Heading;
  /** Placed at random when omitted. */
  initialFood?: Point;
}

const RUNNING: GameState = { kind: 'running' };

/**
 * Snake game state machine. A fatal step flips the state to dead; later
 * calls to step() do nothing.
 */
export class SnakeGame {
  readonly boardSize: number;
  readonly starvationSteps: number;
  readonly starvationScaling: readonly StarvationTier[];
  body: Point[];
  food: Point;
  heading: Heading;
  score = 0;
  stepsSinceFood = 0;
  totalSteps = 0;
  state: GameState = RUNNING;
  private readonly rng: RandomSource;
  /** 1 where a body cell sits, indexed by cellIndex. */
  private readonly cells: Uint8Array;

  constructor(opts: SnakeGameOptions) {
    this.boardSize = opts.boardSize;
    this.rng = opts.rng;
    this.starvationSteps = opts.starvationSteps ?? opts.boardSize * opts.boardSize;
    this.starvationScaling = opts.starvationScaling ?? [];
    this.heading = opts.initialHeading ?? 'right';
    this.body = opts.initialBody
      ? opts.initialBody.map(p => ({ x: p.x, y: p.y }))
      : SnakeGame.startingBody(opts.boardSize, opts.initialLength ?? 3);
    this.cells = new Uint8Array(opts.boardSize * opts.boardSize);
    for (const p of this.body) {
      if (!inBounds(p, this.boardSize)) throw new RangeError(`body cell (${p.x},${p.y}) is off the board`);
      this.cells[cellIndex(p, this.boardSize)] = 1;
    }
    if (opts.initialFood) {
      this.food = { x: opts.initialFood.x, y: opts.initialFood.y };
    } else {
      const food = this.placeFood();
      this.food = food ?? { x: 0, y: 0 };
      if (!food) this.state = { kind: 'dead', reason: 'board-full' };
    }
  }

  /**
   * Horizontal body centred on the board, head first, trailing left.
   */
  static startingBody(boardSize: number, length: number): Point[] {
    const c = Math.floor(boardSize / 2);
    const body: Point[] = [];
    for (let i = 0; i < length; i++) body.push({ x: c - i, y: c });
    return body;
  }

  get head(): Point {
    return this.body[0] ?? { x: 0, y: 0 };
  }

  get length(): number {
    return this.body.length;
  }

  get alive(): boolean {
    return this.state.kind === 'running';
  }

  occupied(p: Point): boolean {
    return inBounds(p, this.boardSize) && this.cells[cellIndex(p, this.boardSize)] === 1;
  }

  /**
   * Steps allowed without eating at the current length.
   */
  get starvationLimit(): number {
    let factor = 1;
    for (const tier of this.starvationScaling) {
      if (this.body.length >= tier.minLength) factor = tier.factor;
    }
    return Math.max(1, Math.floor(this.starvationSteps * factor));
  }

  vision(): Float32Array {
    return computeVision(this);
  }

  /**
   * Advances the game one move in the direction chosen relative to the
   * current heading.
   */
  step(action: Action): GameState {
    if (this.state.kind === 'dead') return this.state;
    this.heading = turn(this.heading, action);
    const v = headingVector(this.heading);
    const next = { x: this.head.x + v.x, y: this.head.y + v.y };
    this.totalSteps += 1;

    if (!inBounds(next, this.boardSize)) {
      return this.die('collision');
    }
    const eating = samePoint(next, this.food);
    const tail = this.body[this.body.length - 1];
    // The tail cell vacates this step unless the snake grows.
    const intoTail = !eating && tail !== undefined && samePoint(next, tail);
    if (this.occupied(next) && !intoTail) {
      return this.die('collision');
    }

    if (eating) {
      this.body.unshift(next);
      this.cells[cellIndex(next, this.boardSize)] = 1;
      this.score += 1;
      this.stepsSinceFood = 0;
      const food = this.placeFood();
      if (!food) return this.die('board-full');
      this.food = food;
      return this.state;
    }

    const removed = this.body.pop();
    if (removed) this.cells[cellIndex(removed, this.boardSize)] = 0;
    this.body.unshift(next);
    this.cells[cellIndex(next, this.boardSize)] = 1;
    this.stepsSinceFood += 1;
    if (this.stepsSinceFood >= this.starvationLimit) {
      return this.die('starvation');
    }
    return this.state;
  }

  private die(reason: DeathReason): GameState {
    this.state = { kind: 'dead', reason };
    return this.state;
  }

  /**
   * Picks a free cell uniformly from this game's stream, or null when the
   * body covers the board.
   */
  private placeFood(): Point | null {
    const free = this.cells.length - this.body.length;
    if (free <= 0) return null;
    let target = randomInt(this.rng, free);
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] === 1) continue;
      if (target === 0) return { x: i % this.boardSize, y: Math.floor(i / this.boardSize) };
      target -= 1;
    }
    return null;
  }
}
