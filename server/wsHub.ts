import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { parseClientMessage } from './protocol.ts';
import type { ServerMessage, StatsMsg, WelcomeMsg } from './protocol.ts';

const DEFAULT_MAX_MESSAGE_BYTES = 16 * 1024;
const DEFAULT_MAX_BUFFERED_BYTES = 512 * 1024;

export interface ConnectionState {
  id: number;
  socket: WebSocket;
  /** Set once the client has sent a valid hello. */
  greeted: boolean;
  lastMessageTime: number;
}

export interface WsHubOptions {
  maxMessageBytes?: number;
  maxBufferedAmount?: number;
}

/**
 * Spectator hub: clients say hello, receive the welcome, then get every
 * frame and stats broadcast. Slow clients are skipped rather than queued.
 */
export class WsHub {
  private wss: WebSocketServer;
  private connections = new Map<number, ConnectionState>();
  private nextId = 1;
  private welcomeJson: string;
  private maxMessageBytes: number;
  private maxBufferedAmount: number;

  constructor(httpServer: Server, welcome: WelcomeMsg, options: WsHubOptions = {}) {
    this.maxMessageBytes = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
    this.maxBufferedAmount = options.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.wss = new WebSocketServer({
      server: httpServer,
      maxPayload: this.maxMessageBytes
    });
    this.welcomeJson = JSON.stringify(welcome);
    this.wss.on('connection', (socket) => this.handleConnection(socket));
  }

  getClientCount(): number {
    return this.connections.size;
  }

  closeAll(): void {
    for (const state of this.connections.values()) {
      state.socket.close();
    }
    this.connections.clear();
    this.wss.close();
  }

  broadcastFrame(buffer: ArrayBufferView): void {
    for (const state of this.connections.values()) {
      if (!this.writable(state)) continue;
      state.socket.send(buffer, { binary: true });
    }
  }

  broadcastStats(stats: StatsMsg): void {
    const payload = JSON.stringify(stats);
    for (const state of this.connections.values()) {
      if (!this.writable(state)) continue;
      state.socket.send(payload);
    }
  }

  sendJsonTo(connId: number, payload: ServerMessage): void {
    const state = this.connections.get(connId);
    if (!state || !this.writable(state)) return;
    state.socket.send(JSON.stringify(payload));
  }

  private writable(state: ConnectionState): boolean {
    return (
      state.greeted &&
      state.socket.readyState === WebSocket.OPEN &&
      state.socket.bufferedAmount <= this.maxBufferedAmount
    );
  }

  private handleConnection(socket: WebSocket): void {
    const state: ConnectionState = {
      id: this.nextId++,
      socket,
      greeted: false,
      lastMessageTime: Date.now()
    };
    this.connections.set(state.id, state);
    socket.on('message', (data, isBinary) => this.handleMessage(state, data, isBinary));
    socket.on('close', () => {
      this.connections.delete(state.id);
    });
  }

  private handleMessage(state: ConnectionState, data: RawData, isBinary: boolean): void {
    if (payloadSize(data) > this.maxMessageBytes) {
      this.protocolError(state, 'message too large');
      return;
    }
    if (isBinary) {
      this.protocolError(state, 'binary messages are not supported');
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(payloadToText(data));
    } catch {
      this.protocolError(state, 'invalid JSON');
      return;
    }
    const msg = parseClientMessage(parsed);
    if (!msg) {
      this.protocolError(state, 'invalid message');
      return;
    }
    state.lastMessageTime = Date.now();
    switch (msg.type) {
      case 'hello':
        if (state.greeted) {
          this.protocolError(state, 'duplicate hello');
          return;
        }
        state.greeted = true;
        state.socket.send(this.welcomeJson);
        return;
      case 'ping':
        this.sendJsonTo(state.id, msg.t === undefined ? { type: 'pong' } : { type: 'pong', t: msg.t });
        return;
    }
  }

  private protocolError(state: ConnectionState, message: string): void {
    if (state.socket.readyState === WebSocket.OPEN) {
      state.socket.send(JSON.stringify({ type: 'error', message }));
    }
    state.socket.close(1008, message);
  }
}

function payloadSize(data: RawData): number {
  if (Array.isArray(data)) return data.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  return data.byteLength;
}

function payloadToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
