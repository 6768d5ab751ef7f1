// ─── Socket Transport ────────────────────────────────────
// Binds a `ws` server to the sync channel. Each connection is one room
// member; frames are JSON, validated against the client message schema,
// and answered with a `reply` carrying the request's ref.

import type { Server } from 'node:http';
import crypto from 'node:crypto';
import { WebSocketServer, type RawData } from 'ws';
import { ClientMessageSchema, zRoomKey, type ClientMessage, type ServerReplyFrame } from '@mapsync/shared';
import type { LogStore } from '../storage/logStore.js';
import type { RoomMember } from './room.js';
import type { SyncChannel } from './syncChannel.js';

const DEFAULT_HEARTBEAT_MS = 30_000;

/** The slice of a `ws` WebSocket the transport relies on. */
export interface SocketLike {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  ping(): void;
  terminate(): void;
  on(event: 'message', listener: (data: RawData) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'pong', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export interface SocketTransportOptions {
  channel: SyncChannel;
  logs: LogStore;
  /** Interval between heartbeat pings; a socket that misses one is terminated */
  heartbeatMs?: number;
}

interface Connection {
  id: string;
  socket: SocketLike;
  member: RoomMember;
  rooms: Set<string>;
  alive: boolean;
  /** Serialises this connection's messages */
  pending: Promise<void>;
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

function refOf(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'ref' in raw && typeof raw.ref === 'string' && raw.ref !== '') {
    return raw.ref;
  }
  return '0';
}

export class SocketTransport {
  private readonly channel: SyncChannel;
  private readonly logs: LogStore;
  private readonly heartbeatMs: number;
  private readonly connections = new Map<string, Connection>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;
  private server: WebSocketServer | null = null;

  constructor(options: SocketTransportOptions) {
    this.channel = options.channel;
    this.logs = options.logs;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  }

  /** Accept upgrades on `path` of an existing HTTP server. */
  attach(httpServer: Server, path: string): WebSocketServer {
    const wss = new WebSocketServer({ server: httpServer, path });
    wss.on('connection', (socket) => this.handleConnection(socket));
    this.server = wss;
    this.startHeartbeat();
    return wss;
  }

  startHeartbeat(): void {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => this.sweep(), this.heartbeatMs);
  }

  /** Terminate sockets that missed the last ping, then ping the rest. */
  sweep(): void {
    for (const conn of this.connections.values()) {
      if (!conn.alive) {
        console.warn(`[socket] ${conn.id} missed heartbeat, terminating`);
        conn.socket.terminate();
        this.drop(conn);
        continue;
      }
      conn.alive = false;
      conn.socket.ping();
    }
  }

  handleConnection(socket: SocketLike): string {
    const id = crypto.randomUUID().slice(0, 8);
    const conn: Connection = {
      id,
      socket,
      rooms: new Set(),
      alive: true,
      pending: Promise.resolve(),
      member: {
        id,
        send: (frame) => {
          if (socket.readyState !== socket.OPEN) throw new Error('socket is not open');
          socket.send(JSON.stringify(frame));
        },
      },
    };
    this.connections.set(id, conn);

    socket.on('pong', () => {
      conn.alive = true;
    });
    socket.on('message', (data) => {
      conn.pending = conn.pending.then(() =>
        this.handleMessage(conn, rawToString(data)).catch((err) => {
          const message = err instanceof Error ? err.message : String(err);
          console.error(`[socket] ${id} message failed:`, message);
          this.logs.record('ERROR', { connection: id, error: message }, 'ERROR');
        }),
      );
    });
    socket.on('close', () => this.drop(conn));
    socket.on('error', (err) => {
      console.error(`[socket] ${id} error:`, err.message);
    });

    return id;
  }

  connectionCount(): number {
    return this.connections.size;
  }

  async close(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    for (const conn of [...this.connections.values()]) {
      conn.socket.terminate();
      this.drop(conn);
    }
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  // ─── Internals ─────────────────────────────────────────

  private drop(conn: Connection): void {
    if (!this.connections.delete(conn.id)) return;
    const rooms = [...conn.rooms];
    conn.rooms.clear();
    for (const room of rooms) {
      void this.channel.leave(room, conn.id);
    }
  }

  private reply(conn: Connection, ref: string, status: ServerReplyFrame['status'], response: Record<string, unknown>): void {
    if (conn.socket.readyState !== conn.socket.OPEN) return;
    const frame: ServerReplyFrame = { type: 'reply', ref, status, response };
    conn.socket.send(JSON.stringify(frame));
  }

  private protocolError(conn: Connection, ref: string, reason: string): void {
    this.logs.record('PROTOCOL_ERROR', { connection: conn.id, reason }, 'WARN');
    this.reply(conn, ref, 'error', { reason });
  }

  private async handleMessage(conn: Connection, text: string): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.protocolError(conn, '0', 'invalid_json');
      return;
    }

    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.protocolError(conn, refOf(raw), 'invalid_message');
      return;
    }
    await this.dispatch(conn, parsed.data);
  }

  private async dispatch(conn: Connection, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'health_check':
        this.reply(conn, message.ref, 'ok', { ...this.channel.handleHealthCheck() });
        return;

      case 'join': {
        if (!zRoomKey.safeParse(message.room).success) {
          this.protocolError(conn, message.ref, 'invalid_room');
          return;
        }
        const result = await this.channel.join(message.room, conn.member);
        if (!result.ok) {
          this.reply(conn, message.ref, 'error', { reason: result.reason, room: message.room });
          return;
        }
        if (!this.connections.has(conn.id)) {
          // Closed while the join was queued.
          await this.channel.leave(message.room, conn.id);
          return;
        }
        conn.rooms.add(message.room);
        this.reply(conn, message.ref, 'ok', {
          status: 'joined',
          room: message.room,
          members: result.members,
          revision: result.revision,
        });
        return;
      }

      case 'leave':
        conn.rooms.delete(message.room);
        await this.channel.leave(message.room, conn.id);
        this.reply(conn, message.ref, 'ok', { status: 'left', room: message.room });
        return;

      case 'sync_request': {
        const status = await this.channel.handleSyncRequest(message.room, conn.id, message.client_state_fingerprint);
        this.reply(conn, message.ref, 'ok', { status, room: message.room });
        return;
      }
    }
  }
}
