import { describe, it, expect, beforeEach, vi } from 'vitest';
import { WebSocketMapTransport, type BrowserSocket } from '../src/services/mapSocket';
import { TransportError } from '../src/services/mapTransport';

interface FakeSocketEvent {
  data: unknown;
  code: number;
  reason: string;
}

class FakeBrowserSocket implements BrowserSocket {
  static instances: FakeBrowserSocket[] = [];
  readyState = 0;
  readonly sent: string[] = [];
  private readonly listeners = new Map<string, Array<(ev: FakeSocketEvent) => void>>();

  constructor(readonly url: string) {
    FakeBrowserSocket.instances.push(this);
  }

  addEventListener(type: string, listener: (ev: FakeSocketEvent) => void): void {
    this.listeners.set(type, [...(this.listeners.get(type) ?? []), listener]);
  }

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    this.serverClose('client closed', 1000);
  }

  open(): void {
    this.readyState = 1;
    this.dispatch('open', { data: null, code: 0, reason: '' });
  }

  receive(frame: unknown): void {
    this.dispatch('message', { data: JSON.stringify(frame), code: 0, reason: '' });
  }

  serverClose(reason: string, code = 1006): void {
    if (this.readyState === 3) return;
    this.readyState = 3;
    this.dispatch('close', { data: null, code, reason });
  }

  private dispatch(type: string, ev: FakeSocketEvent): void {
    for (const listener of this.listeners.get(type) ?? []) listener(ev);
  }
}

async function openTransport(): Promise<{ transport: WebSocketMapTransport; socket: FakeBrowserSocket }> {
  const transport = new WebSocketMapTransport('ws://test.local/socket', { WebSocketImpl: FakeBrowserSocket });
  const connected = transport.connect();
  const socket = FakeBrowserSocket.instances[FakeBrowserSocket.instances.length - 1];
  socket.open();
  await connected;
  return { transport, socket };
}

describe('WebSocketMapTransport', () => {
  beforeEach(() => {
    FakeBrowserSocket.instances = [];
  });

  it('stamps a ref on each request and resolves with the matching reply', async () => {
    const { transport, socket } = await openTransport();

    const pending = transport.request({ type: 'join', room: 'ops' }, 1_000);
    expect(JSON.parse(socket.sent[0])).toEqual({ type: 'join', room: 'ops', ref: '1' });

    socket.receive({ type: 'reply', ref: '1', status: 'ok', response: { status: 'joined', room: 'ops' } });

    await expect(pending).resolves.toEqual({
      type: 'reply',
      ref: '1',
      status: 'ok',
      response: { status: 'joined', room: 'ops' },
    });
  });

  it('hands frames that are not replies to event listeners', async () => {
    const { transport, socket } = await openTransport();
    const events: unknown[] = [];
    transport.onEvent((raw) => events.push(raw));

    const frame = { type: 'event', room: 'ops', revision: 1, event: 'theme_change', payload: { theme: {} } };
    socket.receive(frame);

    expect(events).toEqual([frame]);
  });

  it('rejects pending requests and notifies listeners when the socket closes', async () => {
    const { transport, socket } = await openTransport();
    const reasons: string[] = [];
    transport.onClose((reason) => reasons.push(reason));

    const pending = transport.request({ type: 'health_check' }, 1_000);
    socket.serverClose('server going away');

    await expect(pending).rejects.toThrow('server going away');
    expect(reasons).toEqual(['server going away']);
  });

  it('times out requests nobody answers', async () => {
    vi.useFakeTimers();
    try {
      const { transport } = await openTransport();
      const pending = transport.request({ type: 'health_check' }, 500);
      const assertion = expect(pending).rejects.toThrow('Request health_check timed out');

      vi.advanceTimersByTime(500);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('refuses requests before the socket is open', async () => {
    const transport = new WebSocketMapTransport('ws://test.local/socket', { WebSocketImpl: FakeBrowserSocket });

    await expect(transport.request({ type: 'health_check' }, 500)).rejects.toBeInstanceOf(TransportError);
  });

  it('fails to connect when the socket closes before opening', async () => {
    const transport = new WebSocketMapTransport('ws://test.local/socket', { WebSocketImpl: FakeBrowserSocket });
    const connected = transport.connect();
    FakeBrowserSocket.instances[0].serverClose('', 1006);

    await expect(connected).rejects.toThrow('closed (1006)');
  });
});
