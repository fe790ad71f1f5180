import { describe, it, expect } from 'vitest';
import { SnakeGame } from './game.ts';
import { createRng } from './rng.ts';
import { computeVision, tailDirection, VISION_LABELS, VISION_SIZE } from './vision.ts';

/** Test suite label for vision encoding. */
const SUITE = 'vision.ts';

function gameWithFoodAbove(): SnakeGame {
  return new SnakeGame({ boardSize: 10, rng: createRng(1), initialFood: { x: 5, y: 2 } });
}

/** One ray's three slots, rounded to six places. */
function v3(v: Float32Array, start: number): number[] {
  return Array.from(v.slice(start, start + 3), x => Number(x.toFixed(6)));
}

describe(SUITE, () => {
  it('labels every slot', () => {
    expect(VISION_SIZE).toBe(32);
    expect(VISION_LABELS).toHaveLength(VISION_SIZE);
    expect(VISION_LABELS.slice(0, 3)).toEqual(['wall_n', 'food_n', 'body_n']);
    expect(VISION_LABELS[24]).toBe('heading_up');
    expect(VISION_LABELS[31]).toBe('tail_left');
  });

  it('encodes wall distance, food and body along each ray', () => {
    const v = gameWithFoodAbove().vision();
    expect(v).toHaveLength(VISION_SIZE);
    // north: five cells to the top edge, food at the third
    expect(v[0]).toBeCloseTo(1 / 6, 6);
    expect(v[1]).toBe(1);
    expect(v[2]).toBe(0);
    // east: four cells to the right edge, nothing on the way
    expect(v[6]).toBeCloseTo(1 / 5, 6);
    expect(v[7]).toBe(0);
    expect(v[8]).toBe(0);
    // west: own neck is adjacent
    expect(v[18]).toBeCloseTo(1 / 6, 6);
    expect(v[19]).toBe(0);
    expect(v[20]).toBe(1);
  });

  it('does not see food behind its own body', () => {
    const body = [{ x: 5, y: 5 }, { x: 5, y: 6 }, { x: 4, y: 6 }, { x: 3, y: 6 }, { x: 3, y: 5 }, { x: 3, y: 4 }];
    const blocked = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      initialBody: body,
      initialHeading: 'up',
      initialFood: { x: 1, y: 5 }
    }).vision();
    // west: body two cells away, food beyond it
    expect(v3(blocked, 18)).toEqual([0.166667, 0, 0.5]);

    const clear = new SnakeGame({
      boardSize: 10,
      rng: createRng(1),
      initialBody: body,
      initialHeading: 'up',
      initialFood: { x: 4, y: 5 }
    }).vision();
    expect(v3(clear, 18)).toEqual([0.166667, 1, 0.5]);
  });

  it('one-hot encodes heading and tail direction', () => {
    const v = gameWithFoodAbove().vision();
    expect(Array.from(v.slice(24, 28))).toEqual([0, 1, 0, 0]);
    expect(Array.from(v.slice(28, 32))).toEqual([0, 1, 0, 0]);
  });

  it('is a pure read of the game', () => {
    const game = gameWithFoodAbove();
    expect(computeVision(game)).toEqual(computeVision(game));
    expect(game.totalSteps).toBe(0);
  });

  it('follows the tail around corners', () => {
    const body = [{ x: 3, y: 3 }, { x: 3, y: 4 }, { x: 2, y: 4 }];
    expect(tailDirection(body, 'up')).toBe('right');
    expect(tailDirection([{ x: 1, y: 1 }], 'down')).toBe('down');
  });
});
