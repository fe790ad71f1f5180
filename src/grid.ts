// grid.ts
// Cell coordinates, headings and relative turns on the square board.
// Origin is the top-left cell; x grows to the right and y grows downward.

export interface Point {
  x: number;
  y: number;
}

export type Heading = 'up' | 'right' | 'down' | 'left';

/** Relative moves a network can choose, in network output order. */
export const ACTIONS = ['left', 'right', 'straight'] as const;

export type Action = (typeof ACTIONS)[number];

export const ACTION_COUNT = ACTIONS.length;

/** Headings in clockwise order; also the order of the heading one-hot inputs. */
export const HEADINGS: readonly Heading[] = ['up', 'right', 'down', 'left'];

const HEADING_VECTORS: Record<Heading, Point> = {
  up: { x: 0, y: -1 },
  right: { x: 1, y: 0 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 }
};

/** Eight ray directions, clockwise from straight up. */
export const RAY_DIRECTIONS: readonly Point[] = [
  { x: 0, y: -1 },
  { x: 1, y: -1 },
  { x: 1, y: 0 },
  { x: 1, y: 1 },
  { x: 0, y: 1 },
  { x: -1, y: 1 },
  { x: -1, y: 0 },
  { x: -1, y: -1 }
];

export function headingVector(heading: Heading): Point {
  return HEADING_VECTORS[heading];
}

/**
 * Applies a relative action to a heading. "left" is a counter-clockwise
 * quarter turn, so a reversal can never be produced.
 */
export function turn(heading: Heading, action: Action): Heading {
  const idx = HEADINGS.indexOf(heading);
  switch (action) {
    case 'left':
      return HEADINGS[(idx + 3) % 4] ?? heading;
    case 'right':
      return HEADINGS[(idx + 1) % 4] ?? heading;
    case 'straight':
      return heading;
  }
}

/**
 * Heading whose vector equals (dx, dy), or null for anything that is not a
 * unit orthogonal step.
 */
export function headingFromDelta(dx: number, dy: number): Heading | null {
  for (const heading of HEADINGS) {
    const v = HEADING_VECTORS[heading];
    if (v.x === dx && v.y === dy) return heading;
  }
  return null;
}

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function inBounds(p: Point, size: number): boolean {
  return p.x >= 0 && p.y >= 0 && p.x < size && p.y < size;
}

/** Flat cell index used by occupancy grids. */
export function cellIndex(p: Point, size: number): number {
  return p.y * size + p.x;
}
