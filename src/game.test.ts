import { describe, it, expect } from 'vitest';
import { SnakeGame } from './game.ts';
import { ACTIONS, inBounds, type Point } from './grid.ts';
import { createRng } from './rng.ts';

/** Test suite label for the Snake state machine. */
const SUITE = 'game.ts';

function key(p: Point): string {
  return `${p.x},${p.y}`;
}

describe(SUITE, () => {
  it('starts centred, heading right, with food off the body', () => {
    const game = new SnakeGame({ boardSize: 10, rng: createRng(3) });
    expect(game.body).toEqual([{ x: 5, y: 5 }, { x: 4, y: 5 }, { x: 3, y: 5 }]);
    expect(game.heading).toBe('right');
    expect(game.state).toEqual({ kind: 'running' });
    expect(game.occupied(game.food)).toBe(false);
    expect(inBounds(game.food, 10)).toBe(true);
  });

  it('grows and scores when food is directly ahead', () => {
    const game = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      starvationSteps: 100,
      initialFood: { x: 6, y: 5 }
    });
    game.step('straight');
    expect(game.score).toBe(1);
    expect(game.length).toBe(4);
    expect(game.stepsSinceFood).toBe(0);
    expect(game.head).toEqual({ x: 6, y: 5 });
    expect(game.alive).toBe(true);
    expect(game.occupied(game.food)).toBe(false);
  });

  it('starves after exactly the threshold of steps without food', () => {
    const game = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      starvationSteps: 4,
      initialFood: { x: 0, y: 0 }
    });
    for (let i = 0; i < 3; i++) {
      game.step('straight');
      expect(game.alive).toBe(true);
    }
    const state = game.step('straight');
    expect(state).toEqual({ kind: 'dead', reason: 'starvation' });
    expect(game.head).toEqual({ x: 9, y: 5 });
    expect(game.stepsSinceFood).toBe(4);
  });

  it('dies on the step that leaves the board', () => {
    const game = new SnakeGame({ boardSize: 10, rng: createRng(1), initialFood: { x: 0, y: 0 } });
    for (let i = 0; i < 4; i++) game.step('straight');
    expect(game.alive).toBe(true);
    expect(game.step('straight')).toEqual({ kind: 'dead', reason: 'collision' });
    expect(game.totalSteps).toBe(5);
    expect(game.head).toEqual({ x: 9, y: 5 });
  });

  it('dies when turning into a body cell that is not the tail', () => {
    const game = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      initialBody: [{ x: 5, y: 5 }, { x: 5, y: 6 }, { x: 4, y: 6 }, { x: 4, y: 5 }, { x: 4, y: 4 }],
      initialHeading: 'up',
      initialFood: { x: 0, y: 0 }
    });
    expect(game.step('left')).toEqual({ kind: 'dead', reason: 'collision' });
  });

  it('may move into the cell the tail is leaving', () => {
    const game = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      initialBody: [{ x: 5, y: 5 }, { x: 5, y: 6 }, { x: 4, y: 6 }, { x: 4, y: 5 }],
      initialHeading: 'up',
      initialFood: { x: 0, y: 0 }
    });
    game.step('left');
    expect(game.alive).toBe(true);
    expect(game.heading).toBe('left');
    expect(game.body).toEqual([{ x: 4, y: 5 }, { x: 5, y: 5 }, { x: 5, y: 6 }, { x: 4, y: 6 }]);
    expect(game.occupied({ x: 4, y: 5 })).toBe(true);
  });

  it('ends as board-full when the last free cell is eaten', () => {
    const game = new SnakeGame({
      boardSize: 2,
      rng: createRng(1),
      initialBody: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }],
      initialHeading: 'left',
      initialFood: { x: 0, y: 1 }
    });
    expect(game.step('left')).toEqual({ kind: 'dead', reason: 'board-full' });
    expect(game.score).toBe(1);
    expect(game.length).toBe(4);
  });

  it('starts dead when no cell is free for food', () => {
    const game = new SnakeGame({ boardSize: 1, rng: createRng(1), initialBody: [{ x: 0, y: 0 }] });
    expect(game.state).toEqual({ kind: 'dead', reason: 'board-full' });
  });

  it('ignores steps once dead', () => {
    const game = new SnakeGame({ boardSize: 10, rng: createRng(1), starvationSteps: 1, initialFood: { x: 0, y: 0 } });
    game.step('straight');
    const body = game.body.map(p => ({ ...p }));
    game.step('left');
    expect(game.body).toEqual(body);
    expect(game.totalSteps).toBe(1);
  });

  it('scales the starvation limit with length', () => {
    const tiers = [{ minLength: 3, factor: 2 }, { minLength: 5, factor: 3 }];
    const short = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      starvationSteps: 10,
      starvationScaling: tiers,
      initialLength: 2
    });
    const mid = new SnakeGame({ boardSize: 10, rng: createRng(1), starvationSteps: 10, starvationScaling: tiers });
    const long = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      starvationSteps: 10,
      starvationScaling: tiers,
      initialLength: 5
    });
    expect(short.starvationLimit).toBe(10);
    expect(mid.starvationLimit).toBe(20);
    expect(long.starvationLimit).toBe(30);
  });

  it('places food identically for identical seeds', () => {
    const a = new SnakeGame({ boardSize: 12, rng: createRng(99) });
    const b = new SnakeGame({ boardSize: 12, rng: createRng(99) });
    expect(a.food).toEqual(b.food);
  });

  it('keeps body cells distinct and on the board during random play', () => {
    const moves = createRng(17);
    for (let seed = 1; seed <= 20; seed++) {
      const game = new SnakeGame({ boardSize: 6, rng: createRng(seed), starvationSteps: 50 });
      while (game.alive) {
        game.step(ACTIONS[Math.floor(moves() * ACTIONS.length)] ?? 'straight');
        const seen = new Set(game.body.map(key));
        expect(seen.size).toBe(game.length);
        if (game.alive) {
          for (const p of game.body) expect(inBounds(p, 6)).toBe(true);
          expect(seen.has(key(game.food))).toBe(false);
        }
      }
    }
  });
});
