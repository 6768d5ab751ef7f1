import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import { createLocationTable, sceneFingerprint, type ServerFrame } from '@mapsync/shared';
import { LogStore } from '../src/storage/logStore.js';
import { SocketTransport } from '../src/sync/socketTransport.js';
import { SyncChannel } from '../src/sync/syncChannel.js';

/** In-process stand-in for a `ws` socket. */
class FakeSocket extends EventEmitter {
  readonly OPEN = 1;
  readyState = 1;
  readonly sent: ServerFrame[] = [];
  pings = 0;
  terminated = false;

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }
  ping(): void {
    this.pings += 1;
  }
  terminate(): void {
    this.terminated = true;
    this.readyState = 3;
  }

  receive(message: unknown): void {
    this.emit('message', Buffer.from(typeof message === 'string' ? message : JSON.stringify(message)));
  }

  replies() {
    return this.sent.flatMap((f) => (f.type === 'reply' ? [f] : []));
  }
  events() {
    return this.sent.flatMap((f) => (f.type === 'event' ? [f] : []));
  }
}

/** Let queued message handling finish. */
async function settle(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
  await new Promise<void>((resolve) => setImmediate(resolve));
}

describe('SocketTransport', () => {
  let logs: LogStore;
  let channel: SyncChannel;
  let transport: SocketTransport;

  beforeEach(() => {
    logs = new LogStore();
    channel = new SyncChannel({
      config: { roomDrainGraceMs: 1_000, updateThrottleMs: 50, maxMembersPerRoom: 10 },
      locations: createLocationTable(),
      logs,
    });
    transport = new SocketTransport({ channel, logs, heartbeatMs: 100 });
  });
  afterEach(async () => {
    await transport.close();
    channel.close();
  });

  it('joins a room, pushes full state, then replies', async () => {
    const socket = new FakeSocket();
    transport.handleConnection(socket);

    socket.receive({ type: 'join', ref: '1', room: 'ops' });
    await settle();

    expect(socket.sent.map((f) => f.type)).toEqual(['event', 'reply']);
    expect(socket.replies()[0]).toEqual({
      type: 'reply',
      ref: '1',
      status: 'ok',
      response: { status: 'joined', room: 'ops', members: 1, revision: 0 },
    });
    expect(channel.stats()).toEqual({ rooms: 1, members: 1 });
  });

  it('answers health checks with the request ref', async () => {
    const socket = new FakeSocket();
    transport.handleConnection(socket);
    socket.receive({ type: 'health_check', ref: 'hc-1' });
    await settle();

    const [reply] = socket.replies();
    expect(reply.ref).toBe('hc-1');
    expect(reply.status).toBe('ok');
    expect(reply.response.status).toBe('pong');
  });

  it('replies with an error to malformed frames', async () => {
    const socket = new FakeSocket();
    transport.handleConnection(socket);

    socket.receive('{not json');
    socket.receive({ type: 'explode', ref: '7' });
    socket.receive({ type: 'join', ref: '8', room: 'bad room!' });
    await settle();

    expect(socket.replies()).toEqual([
      { type: 'reply', ref: '0', status: 'error', response: { reason: 'invalid_json' } },
      { type: 'reply', ref: '7', status: 'error', response: { reason: 'invalid_message' } },
      { type: 'reply', ref: '8', status: 'error', response: { reason: 'invalid_room' } },
    ]);
    expect(logs.readLatest(10).filter((e) => e.type === 'PROTOCOL_ERROR')).toHaveLength(3);
  });

  it('handles sync requests for joined rooms', async () => {
    const socket = new FakeSocket();
    transport.handleConnection(socket);
    socket.receive({ type: 'join', ref: '1', room: 'ops' });
    await settle();

    const scene = channel.snapshot('ops');
    if (!scene) throw new Error('room missing');
    socket.receive({ type: 'sync_request', ref: '2', room: 'ops', client_state_fingerprint: sceneFingerprint(scene) });
    socket.receive({ type: 'sync_request', ref: '3', room: 'ops', client_state_fingerprint: '0xstale' });
    await settle();

    const replies = socket.replies();
    expect(replies[1].response).toEqual({ status: 'in_sync', room: 'ops' });
    expect(replies[2].response).toEqual({ status: 'state_updated', room: 'ops' });
    expect(socket.events()).toHaveLength(2);
  });

  it('leaves every joined room when the socket closes', async () => {
    const socket = new FakeSocket();
    transport.handleConnection(socket);
    socket.receive({ type: 'join', ref: '1', room: 'ops' });
    socket.receive({ type: 'join', ref: '2', room: 'map' });
    await settle();
    expect(channel.stats().members).toBe(2);

    socket.emit('close');
    await settle();
    expect(channel.stats().members).toBe(0);
    expect(transport.connectionCount()).toBe(0);
  });

  it('lets leave run twice without error', async () => {
    const socket = new FakeSocket();
    transport.handleConnection(socket);
    socket.receive({ type: 'join', ref: '1', room: 'ops' });
    socket.receive({ type: 'leave', ref: '2', room: 'ops' });
    socket.receive({ type: 'leave', ref: '3', room: 'ops' });
    await settle();

    expect(socket.replies().map((r) => r.status)).toEqual(['ok', 'ok', 'ok']);
    expect(channel.stats().members).toBe(0);
  });

  describe('heartbeat', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });
    afterEach(() => {
      vi.useRealTimers();
    });

    it('terminates sockets that stop answering pings', async () => {
      const quiet = new FakeSocket();
      const lively = new FakeSocket();
      transport.handleConnection(quiet);
      transport.handleConnection(lively);
      transport.startHeartbeat();

      await vi.advanceTimersByTimeAsync(100);
      expect(quiet.pings).toBe(1);
      lively.emit('pong');

      await vi.advanceTimersByTimeAsync(100);
      expect(quiet.terminated).toBe(true);
      expect(lively.terminated).toBe(false);
      expect(transport.connectionCount()).toBe(1);
    });
  });
});
