export const FRAME_HEADER_OFFSETS = {
  generation: 0,
  boardSize: 1,
  populationSize: 2,
  aliveCount: 3,
  focusIndex: 4,
  score: 5,
  bestScoreEver: 6,
  heading: 7,
  state: 8,
  totalSteps: 9,
  stepsSinceFood: 10,
  foodX: 11,
  foodY: 12,
  bodyLength: 13
} as const;

export const FRAME_HEADER_FLOATS = 14;

/** state slot: 0 running, then one code per death reason. */
export const FRAME_STATE_CODES = {
  running: 0,
  collision: 1,
  starvation: 2,
  'board-full': 3
} as const;

export interface FrameHeader {
  generation: number;
  boardSize: number;
  populationSize: number;
  aliveCount: number;
  focusIndex: number;
  score: number;
  bestScoreEver: number;
  heading: number;
  state: number;
  totalSteps: number;
  stepsSinceFood: number;
  foodX: number;
  foodY: number;
  bodyLength: number;
}

export function readFrameHeader(buffer: Float32Array, offset = 0): FrameHeader {
  const o = FRAME_HEADER_OFFSETS;
  return {
    generation: buffer[offset + o.generation] ?? 0,
    boardSize: buffer[offset + o.boardSize] ?? 0,
    populationSize: buffer[offset + o.populationSize] ?? 0,
    aliveCount: buffer[offset + o.aliveCount] ?? 0,
    focusIndex: buffer[offset + o.focusIndex] ?? 0,
    score: buffer[offset + o.score] ?? 0,
    bestScoreEver: buffer[offset + o.bestScoreEver] ?? 0,
    heading: buffer[offset + o.heading] ?? 0,
    state: buffer[offset + o.state] ?? 0,
    totalSteps: buffer[offset + o.totalSteps] ?? 0,
    stepsSinceFood: buffer[offset + o.stepsSinceFood] ?? 0,
    foodX: buffer[offset + o.foodX] ?? 0,
    foodY: buffer[offset + o.foodY] ?? 0,
    bodyLength: buffer[offset + o.bodyLength] ?? 0
  };
}
