// ─── Map Reconciler ──────────────────────────────────────
// Keeps one room's local mirror in step with the server and drives the
// render surface from it.
//
//   disconnected → connecting → joined ⇄ recovering → fallback
//
// Fallback is terminal: markers are cleared, the surface is marked static
// and the host is told to re-request a server-rendered view.

import {
  decodeFullState,
  decodeEvent,
  defaultLocationTable,
  createSceneState,
  applySceneEvent,
  sceneFingerprint,
  type BootstrapPayload,
  type DecodeContext,
  type LocationTable,
  type SceneState,
} from '@mapsync/shared';
import type { MapTransport, Unsubscribe } from '../../services/mapTransport';
import type { RenderSurface } from '../../render/RenderSurface';
import { backoffDelay } from './backoff';
import { applyServerEvent, createMirror, type MapMirror, type RenderChange } from './mirror';
import { validateServerEvent, validateServerState } from './validate';

export type ReconcilerState = 'disconnected' | 'connecting' | 'joined' | 'recovering' | 'fallback';

export interface ReconcilerOptions {
  room: string;
  /** Called once per connection attempt. */
  createTransport: () => MapTransport;
  surface: RenderSurface | null;
  bootstrap?: BootstrapPayload;
  locations?: LocationTable;
  /** Render unknown location keys off-frame instead of dropping them */
  legacy?: boolean;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  requestTimeoutMs?: number;
  healthCheckMs?: number;
  /** Replaces the default runtime preflight. */
  isSupported?: () => boolean;
  onStateChange?: (state: ReconcilerState) => void;
  onFallback?: (reason: string) => void;
}

const DEFAULTS = {
  maxAttempts: 5,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  requestTimeoutMs: 10_000,
  healthCheckMs: 25_000,
};

/** The runtime has a socket, a DOM and a surface to draw on. */
export function isSupported(surface: RenderSurface | null): boolean {
  return typeof globalThis.WebSocket === 'function' && typeof document !== 'undefined' && surface !== null;
}

export class MapReconciler {
  private state: ReconcilerState = 'disconnected';
  private mirror: MapMirror;
  private transport: MapTransport | null = null;
  private subscriptions: Unsubscribe[] = [];
  private pending: RenderChange[] = [];
  private attempts = 0;
  private hasJoined = false;
  private destroyed = false;
  private fallbackReason: string | null = null;

  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private healthTimer: ReturnType<typeof setInterval> | null = null;

  private readonly listeners = new Set<(state: ReconcilerState) => void>();
  private readonly options: ReconcilerOptions;
  private readonly limits: typeof DEFAULTS;

  constructor(options: ReconcilerOptions) {
    this.options = options;
    this.limits = {
      maxAttempts: options.maxAttempts ?? DEFAULTS.maxAttempts,
      baseDelayMs: options.baseDelayMs ?? DEFAULTS.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULTS.maxDelayMs,
      requestTimeoutMs: options.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs,
      healthCheckMs: options.healthCheckMs ?? DEFAULTS.healthCheckMs,
    };
    this.mirror = createMirror(options.room);
  }

  // ─── Public API ────────────────────────────────────────

  getState(): ReconcilerState {
    return this.state;
  }

  getScene(): SceneState {
    return this.mirror.scene;
  }

  getRevision(): number {
    return this.mirror.revision;
  }

  getFallbackReason(): string | null {
    return this.fallbackReason;
  }

  subscribe(listener: (state: ReconcilerState) => void): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /** Seed and paint from the bootstrap payload, then join the room. */
  start(): void {
    if (this.destroyed || this.state !== 'disconnected') return;

    const supported = this.options.isSupported?.() ?? isSupported(this.options.surface);
    if (!supported) {
      this.enterFallback('unsupported runtime');
      return;
    }

    this.seed();
    this.options.surface?.renderAll(this.mirror.scene);
    void this.connect();
  }

  /** Skip the remaining backoff wait. Ignored once in fallback. */
  retry(): void {
    if (this.destroyed || this.state !== 'recovering') return;
    this.clearReconnectTimer();
    void this.connect();
  }

  /** Tear down: cancel every timer and leave the room. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.clearReconnectTimer();
    this.stopHealthCheck();
    if (this.flushTimer) clearTimeout(this.flushTimer);
    this.flushTimer = null;

    const transport = this.transport;
    if (transport && this.state === 'joined') {
      void transport
        .request({ type: 'leave', room: this.options.room }, this.limits.requestTimeoutMs)
        .catch((err: unknown) => console.warn('[reconciler] leave failed:', errorMessage(err)))
        .finally(() => transport.close());
      this.detach(false);
    } else {
      this.detach(true);
    }
    if (this.state !== 'fallback') this.setState('disconnected');
    this.listeners.clear();
  }

  // ─── Connection ────────────────────────────────────────

  private seed(): void {
    const bootstrap = this.options.bootstrap;
    if (!bootstrap) return;
    if (bootstrap.room !== this.options.room) {
      console.warn(`[reconciler] ignoring bootstrap for room "${bootstrap.room}"`);
      return;
    }

    const state = validateServerState(bootstrap.state);
    if (!state.ok) {
      console.warn('[reconciler] invalid bootstrap state:', state.error.message);
      return;
    }
    const decoded = decodeFullState(state.value, this.decodeContext());
    for (const error of decoded.errors) {
      console.warn(`[reconciler] bootstrap ${error.code} in "${error.groupId ?? '?'}": ${error.message}`);
    }
    const scene = applySceneEvent(createSceneState(this.options.room), decoded.value);
    this.mirror = createMirror(this.options.room, { ...scene, revision: bootstrap.revision });
  }

  private async connect(): Promise<void> {
    this.setState(this.hasJoined || this.attempts > 0 ? 'recovering' : 'connecting');

    const transport = this.options.createTransport();
    this.transport = transport;
    this.subscriptions = [
      transport.onEvent((raw) => {
        if (this.transport === transport) this.handleEvent(raw);
      }),
      transport.onClose((reason) => {
        if (this.transport === transport) this.handleLoss(reason);
      }),
    ];

    try {
      await transport.connect();
      if (this.transport !== transport) return;

      const reply = await transport.request({ type: 'join', room: this.options.room }, this.limits.requestTimeoutMs);
      if (this.transport !== transport) return;
      if (reply.status !== 'ok') {
        this.handleLoss(`join rejected: ${String(reply.response.reason ?? 'unknown')}`);
        return;
      }

      const rejoined = this.hasJoined;
      this.hasJoined = true;
      this.attempts = 0;
      this.setState('joined');
      this.startHealthCheck(transport);
      if (rejoined) await this.requestSync(transport);
    } catch (err) {
      if (this.transport === transport) this.handleLoss(errorMessage(err));
    }
  }

  private async requestSync(transport: MapTransport): Promise<void> {
    const reply = await transport.request(
      {
        type: 'sync_request',
        room: this.options.room,
        client_state_fingerprint: sceneFingerprint(this.mirror.scene),
      },
      this.limits.requestTimeoutMs,
    );
    console.info(`[reconciler] sync after rejoin: ${String(reply.response.status ?? reply.status)}`);
  }

  private handleLoss(reason: string): void {
    if (this.destroyed || this.state === 'fallback') return;
    console.warn(`[reconciler] connection lost: ${reason}`);
    this.stopHealthCheck();
    this.detach(true);

    this.attempts += 1;
    if (this.attempts > this.limits.maxAttempts) {
      this.enterFallback(`reconnect failed after ${this.limits.maxAttempts} attempts: ${reason}`);
      return;
    }

    this.setState('recovering');
    const delay = backoffDelay(this.attempts, this.limits.baseDelayMs, this.limits.maxDelayMs);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.connect();
    }, delay);
  }

  private enterFallback(reason: string): void {
    this.clearReconnectTimer();
    this.stopHealthCheck();
    this.detach(true);
    if (this.flushTimer) clearTimeout(this.flushTimer);
    this.flushTimer = null;
    this.pending = [];

    this.fallbackReason = reason;
    this.options.surface?.clear();
    this.options.surface?.showStatic();
    this.setState('fallback');
    console.warn(`[reconciler] falling back to static rendering: ${reason}`);
    this.options.onFallback?.(reason);
  }

  private detach(close: boolean): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
    const transport = this.transport;
    this.transport = null;
    if (close) transport?.close();
  }

  // ─── Health check ──────────────────────────────────────

  private startHealthCheck(transport: MapTransport): void {
    this.stopHealthCheck();
    this.healthTimer = setInterval(() => {
      void transport
        .request({ type: 'health_check' }, this.limits.requestTimeoutMs)
        .catch((err: unknown) => {
          if (this.transport === transport) this.handleLoss(`health check failed: ${errorMessage(err)}`);
        });
    }, this.limits.healthCheckMs);
  }

  private stopHealthCheck(): void {
    if (this.healthTimer) clearInterval(this.healthTimer);
    this.healthTimer = null;
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
  }

  // ─── Events ────────────────────────────────────────────

  private handleEvent(raw: unknown): void {
    const frame = validateServerEvent(raw);
    if (!frame.ok) {
      console.warn(`[reconciler] dropped event (${frame.error.code}): ${frame.error.message}`);
      return;
    }
    if (frame.value.room !== this.options.room) {
      console.warn(`[reconciler] dropped event for stale room "${frame.value.room}"`);
      return;
    }

    const decoded = decodeEvent(frame.value, this.decodeContext());
    if (decoded.value === null || decoded.errors.length > 0) {
      const detail = decoded.errors.map((e) => `${e.code}: ${e.message}`).join('; ');
      console.warn(`[reconciler] dropped ${frame.value.event} event: ${detail}`);
      return;
    }

    const update = applyServerEvent(this.mirror, frame.value.revision, decoded.value);
    this.mirror = update.mirror;
    if (update.changes.length > 0) {
      this.pending.push(...update.changes);
      this.scheduleFlush();
    }
  }

  private scheduleFlush(): void {
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flush();
    }, this.mirror.scene.config.throttleMs);
  }

  /** Replay queued changes against the current mirror. */
  private flush(): void {
    const surface = this.options.surface;
    const changes = this.pending;
    this.pending = [];
    if (!surface || changes.length === 0) return;

    const scene = this.mirror.scene;
    if (changes.some((change) => change.type === 'render_all')) {
      surface.renderAll(scene);
      return;
    }

    let themeChanged = false;
    for (const change of changes) {
      if (change.type === 'theme') {
        themeChanged = true;
        continue;
      }
      if (change.type === 'render_all') continue;

      const group = scene.groups.find((g) => g.id === change.groupId);
      switch (change.type) {
        case 'render_group':
          if (group) surface.renderGroup(group, scene.config);
          break;
        case 'upsert_marker': {
          const node = group?.nodes.find((n) => n.id === change.markerId);
          if (group && node) surface.upsertMarker(group, node, scene.config);
          else surface.removeMarker(change.groupId, change.markerId);
          break;
        }
        case 'remove_marker':
          surface.removeMarker(change.groupId, change.markerId);
          break;
        case 'group_visible':
          if (group) surface.setGroupVisible(group.id, group.visible);
          break;
      }
    }
    if (themeChanged) surface.applyTheme(scene.theme);
  }

  private decodeContext(): DecodeContext {
    return { locations: this.options.locations ?? defaultLocationTable, legacy: this.options.legacy ?? false };
  }

  private setState(next: ReconcilerState): void {
    if (this.state === next) return;
    this.state = next;
    this.options.onStateChange?.(next);
    for (const listener of this.listeners) listener(next);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
