import type { IncomingMessage, ServerResponse } from 'node:http';
import type { NetworkJSON } from '../src/networkSerializer.ts';
import type { GenerationSummary, HallOfFameEntry } from '../src/protocol/messages.ts';
import type { Persistence } from './persistence.ts';

export interface HttpApiDeps {
  getStatus: () => { generation: number; clients: number; alive: number };
  /** Network that holds the best score so far, or null before the first generation ends. */
  getBest: () => { score: number; network: NetworkJSON } | null;
  getLastSummary: () => GenerationSummary | null;
  /** In-memory hall of fame, best first; served when persistence is off. */
  getHallOfFame: () => HallOfFameEntry[];
  /** Writes a population checkpoint now; returns the snapshot id. */
  saveSnapshot: () => number;
  persistence: Persistence | null;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export function createHttpHandler(deps: HttpApiDeps): (req: IncomingMessage, res: ServerResponse) => void {
  return (req, res) => {
    applyCors(req, res);
    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }
    const { status, body } = routeRequest(req.method ?? 'GET', req.url ?? '/', deps);
    sendJson(res, status, body);
  };
}

function applyCors(req: IncomingMessage, res: ServerResponse): void {
  const origin = req.headers.origin;
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Vary', 'Origin');
  } else {
    res.setHeader('Access-Control-Allow-Origin', '*');
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
}

function parseLimit(raw: string | null, fallback: number): number {
  const parsed = Number(raw);
  if (raw === null || !Number.isFinite(parsed)) return fallback;
  return Math.min(200, Math.max(1, Math.floor(parsed)));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resolves one API call. Kept free of sockets so routes can be exercised directly.
 */
export function routeRequest(method: string, rawUrl: string, deps: HttpApiDeps): ApiResponse {
  const url = new URL(rawUrl, 'http://localhost');
  const path = url.pathname;

  if (method === 'GET' && path === '/health') {
    const status = deps.getStatus();
    return { status: 200, body: { ok: true, ...status } };
  }

  if (method === 'GET' && path === '/api/best') {
    const best = deps.getBest();
    if (!best) return { status: 404, body: { ok: false, message: 'no generation has finished yet' } };
    return { status: 200, body: best.network };
  }

  if (method === 'GET' && path === '/api/stats') {
    return { status: 200, body: { ok: true, summary: deps.getLastSummary() } };
  }

  const persistence = deps.persistence;
  if (method === 'GET' && path === '/api/hof' && !persistence) {
    const entries = deps.getHallOfFame().slice(0, parseLimit(url.searchParams.get('limit'), 20));
    return { status: 200, body: { ok: true, entries } };
  }
  if (path.startsWith('/api/') && !persistence) {
    return { status: 503, body: { ok: false, message: 'persistence disabled' } };
  }
  if (!persistence) return { status: 404, body: { ok: false, message: 'not found' } };

  if (method === 'GET' && path === '/api/hof') {
    try {
      const entries = persistence.listHofEntries(parseLimit(url.searchParams.get('limit'), 20));
      return { status: 200, body: { ok: true, entries } };
    } catch (err) {
      return { status: 500, body: { ok: false, message: errorMessage(err) } };
    }
  }

  if (method === 'GET' && path === '/api/snapshots') {
    try {
      const snapshots = persistence.listSnapshots(parseLimit(url.searchParams.get('limit'), 20));
      return { status: 200, body: { ok: true, snapshots } };
    } catch (err) {
      return { status: 500, body: { ok: false, message: errorMessage(err) } };
    }
  }

  if (method === 'POST' && path === '/api/save') {
    try {
      return { status: 200, body: { ok: true, snapshotId: deps.saveSnapshot() } };
    } catch (err) {
      return { status: 500, body: { ok: false, message: errorMessage(err) } };
    }
  }

  if (method === 'GET' && path === '/api/export/latest') {
    try {
      const snapshot = persistence.loadLatestSnapshot();
      if (!snapshot) return { status: 404, body: { ok: false, message: 'no snapshots' } };
      return { status: 200, body: snapshot };
    } catch (err) {
      return { status: 500, body: { ok: false, message: errorMessage(err) } };
    }
  }

  if (method === 'GET' && path.startsWith('/api/export/')) {
    const id = Number(path.split('/').pop() ?? '');
    if (!Number.isInteger(id)) {
      return { status: 400, body: { ok: false, message: 'snapshot id must be a number' } };
    }
    try {
      return { status: 200, body: persistence.exportSnapshot(id) };
    } catch (err) {
      return { status: 404, body: { ok: false, message: errorMessage(err) } };
    }
  }

  return { status: 404, body: { ok: false, message: 'not found' } };
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(payload));
}
