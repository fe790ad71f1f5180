// vision.ts
// Builds the input vector fed into each snake's network: what the head sees
// along eight rays, plus the heading and the direction the tail is moving.

import {
  HEADINGS,
  RAY_DIRECTIONS,
  headingFromDelta,
  inBounds,
  samePoint,
  type Heading,
  type Point
} from './grid.ts';

/** Values per ray: wall proximity, food flag, body proximity. */
export const VALUES_PER_RAY = 3;

export const VISION_SIZE = RAY_DIRECTIONS.length * VALUES_PER_RAY + HEADINGS.length * 2;

/** Slot names in vision order, for logs and for UIs that label inputs. */
export const VISION_LABELS: readonly string[] = buildLabels();

/** Minimal game shape needed to compute vision. */
export interface VisionSource {
  readonly boardSize: number;
  /** Head first. */
  readonly body: readonly Point[];
  readonly food: Point;
  readonly heading: Heading;
  occupied: (p: Point) => boolean;
}

function buildLabels(): string[] {
  const rays = ['n', 'ne', 'e', 'se', 's', 'sw', 'w', 'nw'];
  const labels: string[] = [];
  for (const ray of rays) labels.push(`wall_${ray}`, `food_${ray}`, `body_${ray}`);
  for (const h of HEADINGS) labels.push(`heading_${h}`);
  for (const h of HEADINGS) labels.push(`tail_${h}`);
  return labels;
}

/**
 * Direction the tail moves next step: from the last cell toward the one
 * before it. A one-cell snake reports its heading.
 */
export function tailDirection(body: readonly Point[], heading: Heading): Heading {
  const tail = body[body.length - 1];
  const beforeTail = body[body.length - 2];
  if (!tail || !beforeTail) return heading;
  return headingFromDelta(beforeTail.x - tail.x, beforeTail.y - tail.y) ?? heading;
}

/**
 * Computes the vision vector for the current state. Pure read of the game.
 */
export function computeVision(game: VisionSource): Float32Array {
  const out = new Float32Array(VISION_SIZE);
  const head = game.body[0];
  if (!head) return out;
  let k = 0;
  for (const dir of RAY_DIRECTIONS) {
    let foodSeen = false;
    let bodyDist = 0;
    let d = 1;
    const p = { x: head.x + dir.x, y: head.y + dir.y };
    while (inBounds(p, game.boardSize)) {
      // The first body cell blocks the view of food further along the ray.
      if (bodyDist === 0) {
        if (game.occupied(p)) bodyDist = d;
        else if (samePoint(p, game.food)) foodSeen = true;
      }
      p.x += dir.x;
      p.y += dir.y;
      d += 1;
    }
    // d is now the step count at which the ray leaves the board.
    out[k++] = 1 / d;
    out[k++] = foodSeen ? 1 : 0;
    out[k++] = bodyDist > 0 ? 1 / bodyDist : 0;
  }
  const tail = tailDirection(game.body, game.heading);
  for (const h of HEADINGS) out[k++] = h === game.heading ? 1 : 0;
  for (const h of HEADINGS) out[k++] = h === tail ? 1 : 0;
  return out;
}
