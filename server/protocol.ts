import type { FitnessHistoryEntry, GenerationSummary } from '../src/protocol/messages.ts';
import { isRecord } from '../src/utils.ts';

export const PROTOCOL_VERSION = 1;
export const SERIALIZER_VERSION = 1;

export interface HelloMsg {
  type: 'hello';
  version: number;
}

export interface PingMsg {
  type: 'ping';
  t?: number;
}

export type ClientMessage = HelloMsg | PingMsg;

export interface WelcomeMsg {
  type: 'welcome';
  sessionId: string;
  protocolVersion: number;
  serializerVersion: number;
  boardSize: number;
  populationSize: number;
  seed: number;
  cfgHash: string;
  /** Names of the network inputs, in order. */
  visionLabels: string[];
  frameHeaderFloats: number;
  lowDetail: boolean;
}

export interface StatsMsg {
  type: 'stats';
  summary: GenerationSummary;
  history: FitnessHistoryEntry[];
}

export interface PongMsg {
  type: 'pong';
  t?: number;
}

export interface ErrorMsg {
  type: 'error';
  message: string;
}

export type ServerMessage = WelcomeMsg | StatsMsg | PongMsg | ErrorMsg;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  return msg['type'] === 'hello' && msg['version'] === PROTOCOL_VERSION;
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  if ('t' in msg && !isFiniteNumber(msg['t'])) return false;
  return true;
}

export function parseClientMessage(raw: unknown): ClientMessage | null {
  if (!isRecord(raw)) return null;
  if (typeof raw['type'] !== 'string') return null;
  switch (raw['type']) {
    case 'hello':
      return isHello(raw) ? raw : null;
    case 'ping':
      return isPing(raw) ? raw : null;
    default:
      return null;
  }
}
