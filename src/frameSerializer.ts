/** Packs simulation snapshots into Float32Array frames for the live view. */

import { HEADINGS, type Point } from './grid.ts';
import { FRAME_HEADER_FLOATS, FRAME_HEADER_OFFSETS, FRAME_STATE_CODES, readFrameHeader } from './protocol/frame.ts';
import type { SimulationSnapshot } from './protocol/messages.ts';

/** Decoded frame: header fields plus the focus snake's cells, head first. */
export interface DecodedFrame {
  generation: number;
  boardSize: number;
  aliveCount: number;
  score: number;
  heading: string;
  state: number;
  food: Point;
  body: Point[];
}

export class FrameSerializer {
  /**
   * Buffer Layout:
   * 1. Header (FRAME_HEADER_FLOATS floats), see FRAME_HEADER_OFFSETS.
   * 2. Body block: [x, y] * bodyLength, head first.
   * @param snap - Snapshot to pack.
   * @returns Float32Array ready to send as a binary WS message.
   */
  static serialize(snap: SimulationSnapshot): Float32Array {
    const buf = new Float32Array(FRAME_HEADER_FLOATS + snap.body.length * 2);
    const o = FRAME_HEADER_OFFSETS;
    buf[o.generation] = snap.generation;
    buf[o.boardSize] = snap.boardSize;
    buf[o.populationSize] = snap.populationSize;
    buf[o.aliveCount] = snap.aliveCount;
    buf[o.focusIndex] = snap.focusIndex;
    buf[o.score] = snap.score;
    buf[o.bestScoreEver] = snap.bestScoreEver;
    buf[o.heading] = HEADINGS.indexOf(snap.heading);
    buf[o.state] = snap.state.kind === 'running' ? FRAME_STATE_CODES.running : FRAME_STATE_CODES[snap.state.reason];
    buf[o.totalSteps] = snap.totalSteps;
    buf[o.stepsSinceFood] = snap.stepsSinceFood;
    buf[o.foodX] = snap.food.x;
    buf[o.foodY] = snap.food.y;
    buf[o.bodyLength] = snap.body.length;
    let ptr = FRAME_HEADER_FLOATS;
    for (const p of snap.body) {
      buf[ptr++] = p.x;
      buf[ptr++] = p.y;
    }
    return buf;
  }

  static deserialize(buf: Float32Array): DecodedFrame {
    const header = readFrameHeader(buf);
    const body: Point[] = [];
    let ptr = FRAME_HEADER_FLOATS;
    for (let i = 0; i < header.bodyLength; i++) {
      body.push({ x: buf[ptr] ?? 0, y: buf[ptr + 1] ?? 0 });
      ptr += 2;
    }
    return {
      generation: header.generation,
      boardSize: header.boardSize,
      aliveCount: header.aliveCount,
      score: header.score,
      heading: HEADINGS[header.heading] ?? 'right',
      state: header.state,
      food: { x: header.foodX, y: header.foodY },
      body
    };
  }
}
