// ─── WebSocket Map Transport ─────────────────────────────
// Browser WebSocket implementation of MapTransport. Replies are matched
// to requests by ref; everything else is handed to event listeners.

import { ServerReplySchema, type ServerReplyFrame } from '@mapsync/shared';
import { TransportError, type ClientRequest, type MapTransport, type Unsubscribe } from './mapTransport';

interface PendingRequest {
  resolve: (reply: ServerReplyFrame) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/** The part of the browser WebSocket this transport uses. */
export interface BrowserSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  addEventListener(type: 'open', listener: () => void): void;
  addEventListener(type: 'message', listener: (ev: { data: unknown }) => void): void;
  addEventListener(type: 'close', listener: (ev: { code: number; reason: string }) => void): void;
}

export type BrowserSocketConstructor = new (url: string) => BrowserSocket;

export interface WebSocketMapTransportOptions {
  /** Connection timeout in ms */
  connectTimeoutMs?: number;
  /** Constructor to use instead of the global WebSocket */
  WebSocketImpl?: BrowserSocketConstructor;
}

const SOCKET_OPEN = 1;

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export class WebSocketMapTransport implements MapTransport {
  private socket: BrowserSocket | null = null;
  private nextRef = 1;
  private readonly pending = new Map<string, PendingRequest>();
  private readonly eventListeners = new Set<(raw: unknown) => void>();
  private readonly closeListeners = new Set<(reason: string) => void>();
  private readonly url: string;
  private readonly options: WebSocketMapTransportOptions;

  constructor(url: string, options: WebSocketMapTransportOptions = {}) {
    this.url = url;
    this.options = options;
  }

  connect(): Promise<void> {
    const Impl: BrowserSocketConstructor | undefined = this.options.WebSocketImpl ?? globalThis.WebSocket;
    if (typeof Impl !== 'function') {
      return Promise.reject(new TransportError('WebSocket is not available'));
    }

    return new Promise<void>((resolve, reject) => {
      const socket = new Impl(this.url);
      this.socket = socket;
      let opened = false;

      const timer = setTimeout(() => {
        if (opened) return;
        socket.close();
        reject(new TransportError('Connection timed out'));
      }, this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);

      socket.addEventListener('open', () => {
        opened = true;
        clearTimeout(timer);
        resolve();
      });
      socket.addEventListener('message', (ev) => this.handleMessage(ev.data));
      socket.addEventListener('close', (ev) => {
        clearTimeout(timer);
        const reason = ev.reason || `closed (${ev.code})`;
        if (!opened) reject(new TransportError(reason));
        this.handleClose(reason);
      });
    });
  }

  request(message: ClientRequest, timeoutMs: number): Promise<ServerReplyFrame> {
    const socket = this.socket;
    if (!socket || socket.readyState !== SOCKET_OPEN) {
      return Promise.reject(new TransportError('Socket is not open'));
    }
    const ref = String(this.nextRef++);

    return new Promise<ServerReplyFrame>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(ref);
        reject(new TransportError(`Request ${message.type} timed out`));
      }, timeoutMs);
      this.pending.set(ref, { resolve, reject, timer });
      socket.send(JSON.stringify({ ...message, ref }));
    });
  }

  onEvent(listener: (raw: unknown) => void): Unsubscribe {
    this.eventListeners.add(listener);
    return () => this.eventListeners.delete(listener);
  }

  onClose(listener: (reason: string) => void): Unsubscribe {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  close(): void {
    const socket = this.socket;
    this.socket = null;
    this.rejectPending('Transport closed');
    this.closeListeners.clear();
    this.eventListeners.clear();
    socket?.close();
  }

  // ─── Internals ─────────────────────────────────────────

  private handleMessage(data: unknown): void {
    if (typeof data !== 'string') return;
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      console.warn('[socket] dropping frame that is not JSON');
      return;
    }

    const reply = ServerReplySchema.safeParse(raw);
    if (reply.success) {
      const entry = this.pending.get(reply.data.ref);
      if (!entry) return;
      this.pending.delete(reply.data.ref);
      clearTimeout(entry.timer);
      entry.resolve(reply.data);
      return;
    }

    for (const listener of this.eventListeners) listener(raw);
  }

  private handleClose(reason: string): void {
    this.socket = null;
    this.rejectPending(reason);
    for (const listener of this.closeListeners) listener(reason);
  }

  private rejectPending(reason: string): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
      entry.reject(new TransportError(reason));
    }
    this.pending.clear();
  }
}
