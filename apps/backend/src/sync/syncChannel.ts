/**
 * Sync Channel: owns every room's scene and fans events out to members.
 *
 * All work for a room (join, leave, publish, sync requests, drain expiry)
 * runs through that room's queue, so a room's scene is mutated by one
 * task at a time and a producer's events reach every member in the order
 * they were emitted. Rooms never wait on each other.
 */

import {
  addMarker,
  changeTheme,
  createSceneState,
  diffScenes,
  encodeEvent,
  fullStateEvent,
  removeMarker,
  replaceGroupNodes,
  replaceState,
  sceneFingerprint,
  setGroupVisibility,
  ok,
  type FullStateInput,
  type GroupNodesInput,
  type LocationTable,
  type Result,
  type SceneContext,
  type SceneDiagnostic,
  type SceneEvent,
  type SceneState,
  type ServerFrame,
  type SyncStatus,
  type ThemeInput,
  type ValidationError,
} from '@mapsync/shared';
import type { ServerConfig } from '../config/server.js';
import type { LogStore } from '../storage/logStore.js';
import { Room, type RoomMember, type RoomSummary } from './room.js';
import { RoomQueue } from './roomQueue.js';

export type ChannelConfig = Pick<ServerConfig, 'roomDrainGraceMs' | 'updateThrottleMs' | 'maxMembersPerRoom'>;

export interface SyncChannelOptions {
  config: ChannelConfig;
  locations: LocationTable;
  logs: LogStore;
  /** Place unknown location keys off-frame instead of skipping them */
  legacy?: boolean;
}

export type JoinResult =
  | { ok: true; members: number; revision: number }
  | { ok: false; reason: 'room_full' };

export interface PublishResult {
  /** Revision stamped on each emitted event, in emission order */
  revisions: number[];
  /** Nodes or groups skipped during normalisation */
  errors: SceneDiagnostic[];
}

export interface HealthReply {
  status: 'pong';
  at: number;
}

export interface ChannelStats {
  rooms: number;
  members: number;
}

/** Producer-facing handle that keeps its room alive until released. */
export interface RoomProducer {
  readonly roomKey: string;
  publishFullState(input: FullStateInput): Promise<PublishResult>;
  publishGroupUpdate(groupId: string, input: GroupNodesInput): Promise<Result<PublishResult>>;
  publishMarkerAdd(groupId: string, marker: unknown): Promise<Result<PublishResult>>;
  publishMarkerRemove(groupId: string, markerId: string): Promise<PublishResult>;
  publishThemeChange(theme: ThemeInput): Promise<PublishResult>;
  publishVisibilityToggle(groupId: string, visible: boolean): Promise<Result<PublishResult>>;
  release(): Promise<void>;
}

export class SyncChannel {
  private readonly rooms = new Map<string, Room>();
  private readonly queue = new RoomQueue();
  private readonly config: ChannelConfig;
  private readonly context: SceneContext;
  private readonly logs: LogStore;

  constructor(options: SyncChannelOptions) {
    this.config = options.config;
    this.context = { locations: options.locations, legacy: options.legacy };
    this.logs = options.logs;
  }

  // ─── Membership ────────────────────────────────────────

  /**
   * Register a member and push the current full state to it alone. The
   * room is created on first reference; joining never validates content.
   */
  join(roomKey: string, member: RoomMember): Promise<JoinResult> {
    return this.queue.run(roomKey, (): JoinResult => {
      const room = this.ensureRoom(roomKey);

      if (!room.members.has(member.id) && room.members.size >= this.config.maxMembersPerRoom) {
        this.logs.record('JOIN_REJECTED', { memberId: member.id, reason: 'room_full' }, 'WARN', roomKey);
        this.settle(room);
        return { ok: false, reason: 'room_full' };
      }

      room.members.set(member.id, member);
      this.settle(room);
      this.logs.record('MEMBER_JOINED', { memberId: member.id, members: room.members.size }, 'INFO', roomKey);

      this.deliver(room, member, encodeEvent(roomKey, room.revision, fullStateEvent(room.scene)));
      return { ok: true, members: room.members.size, revision: room.revision };
    });
  }

  /** Remove a member. Leaving a room you are not in is a no-op. */
  leave(roomKey: string, memberId: string): Promise<boolean> {
    return this.queue.run(roomKey, () => {
      const room = this.rooms.get(roomKey);
      if (!room || !room.members.delete(memberId)) return false;
      this.logs.record('MEMBER_LEFT', { memberId, members: room.members.size }, 'INFO', roomKey);
      this.settle(room);
      return true;
    });
  }

  // ─── Requests ──────────────────────────────────────────

  /**
   * Compare a client's fingerprint with the room's scene.
   * - equal → `in_sync`
   * - different, and the requester is a member → full state to the
   *   requester only, `state_updated`
   * - anything else (unknown room, non-member) → `sync_acknowledged`
   */
  handleSyncRequest(roomKey: string, memberId: string, fingerprint: string): Promise<SyncStatus> {
    return this.queue.run(roomKey, () => {
      const room = this.rooms.get(roomKey);
      let status: SyncStatus = 'sync_acknowledged';

      if (room) {
        const member = room.members.get(memberId);
        if (sceneFingerprint(room.scene) === fingerprint) {
          status = 'in_sync';
        } else if (member) {
          this.deliver(room, member, encodeEvent(roomKey, room.revision, fullStateEvent(room.scene)));
          status = 'state_updated';
        }
      }

      this.logs.record('SYNC_REQUEST', { memberId, status }, 'INFO', roomKey);
      return status;
    });
  }

  /** Liveness reply. Touches no room. */
  handleHealthCheck(): HealthReply {
    return { status: 'pong', at: Date.now() };
  }

  // ─── Producer operations ───────────────────────────────
  // Each one updates the scene inside the room queue before broadcasting,
  // so a join queued behind it always sees the new state.

  publishFullState(roomKey: string, input: FullStateInput): Promise<PublishResult> {
    return this.mutate<never>(roomKey, (scene) => {
      const update = replaceState(scene, input, this.context);
      return ok({ scene: update.scene, events: diffScenes(scene, update.scene), errors: update.errors });
    }).then(infallible);
  }

  publishGroupUpdate(roomKey: string, groupId: string, input: GroupNodesInput): Promise<Result<PublishResult>> {
    return this.mutate<ValidationError>(roomKey, (scene) => {
      const update = replaceGroupNodes(scene, groupId, input, this.context);
      if (!update.ok) return update;
      const group = update.value.scene.groups.find((g) => g.id === groupId);
      const events: SceneEvent[] = group
        ? [
            {
              kind: 'group_update',
              groupId,
              nodes: group.nodes,
              label: group.label,
              style: group.style,
              visible: group.visible,
            },
          ]
        : [];
      return ok({ scene: update.value.scene, events, errors: update.value.errors });
    });
  }

  publishMarkerAdd(roomKey: string, groupId: string, marker: unknown): Promise<Result<PublishResult>> {
    return this.mutate<ValidationError>(roomKey, (scene) => {
      const update = addMarker(scene, groupId, marker, this.context);
      if (!update.ok) return update;
      const { node, changed } = update.value;
      const events: SceneEvent[] = changed ? [{ kind: 'marker_add', groupId, node }] : [];
      return ok({ scene: update.value.scene, events, errors: [] });
    });
  }

  publishMarkerRemove(roomKey: string, groupId: string, markerId: string): Promise<PublishResult> {
    return this.mutate<never>(roomKey, (scene) => {
      const update = removeMarker(scene, groupId, markerId);
      const events: SceneEvent[] = update.changed ? [{ kind: 'marker_remove', groupId, markerId }] : [];
      return ok({ scene: update.scene, events, errors: [] });
    }).then(infallible);
  }

  publishThemeChange(roomKey: string, theme: ThemeInput): Promise<PublishResult> {
    return this.mutate<never>(roomKey, (scene) => {
      const update = changeTheme(scene, theme);
      const events: SceneEvent[] =
        Object.keys(update.delta).length > 0 ? [{ kind: 'theme_change', theme: update.delta }] : [];
      return ok({ scene: update.scene, events, errors: [] });
    }).then(infallible);
  }

  publishVisibilityToggle(roomKey: string, groupId: string, visible: boolean): Promise<Result<PublishResult>> {
    return this.mutate<ValidationError>(roomKey, (scene) => {
      const update = setGroupVisibility(scene, groupId, visible);
      if (!update.ok) return update;
      const events: SceneEvent[] = update.value.changed ? [{ kind: 'visibility_toggle', groupId, visible }] : [];
      return ok({ scene: update.value.scene, events, errors: [] });
    });
  }

  /** Hold a room open for a producer. The room drains only after release. */
  async producer(roomKey: string): Promise<RoomProducer> {
    await this.queue.run(roomKey, () => {
      const room = this.ensureRoom(roomKey);
      room.producers += 1;
      this.settle(room);
    });

    let released = false;
    return {
      roomKey,
      publishFullState: (input) => this.publishFullState(roomKey, input),
      publishGroupUpdate: (groupId, input) => this.publishGroupUpdate(roomKey, groupId, input),
      publishMarkerAdd: (groupId, marker) => this.publishMarkerAdd(roomKey, groupId, marker),
      publishMarkerRemove: (groupId, markerId) => this.publishMarkerRemove(roomKey, groupId, markerId),
      publishThemeChange: (theme) => this.publishThemeChange(roomKey, theme),
      publishVisibilityToggle: (groupId, visible) => this.publishVisibilityToggle(roomKey, groupId, visible),
      release: () =>
        this.queue.run(roomKey, () => {
          if (released) return;
          released = true;
          const room = this.rooms.get(roomKey);
          if (!room) return;
          room.producers = Math.max(0, room.producers - 1);
          this.settle(room);
        }),
    };
  }

  // ─── Introspection ─────────────────────────────────────

  snapshot(roomKey: string): SceneState | undefined {
    return this.rooms.get(roomKey)?.scene;
  }

  /** The room's scene, or the scene a new room would start with. Creates nothing. */
  bootstrapScene(roomKey: string): SceneState {
    return this.snapshot(roomKey) ?? createSceneState(roomKey, { config: { throttleMs: this.config.updateThrottleMs } });
  }

  listRooms(): RoomSummary[] {
    return [...this.rooms.values()].map((room) => room.summary());
  }

  stats(): ChannelStats {
    let members = 0;
    for (const room of this.rooms.values()) members += room.members.size;
    return { rooms: this.rooms.size, members };
  }

  /** Cancel every drain timer and forget all rooms. */
  close(): void {
    for (const room of this.rooms.values()) room.cancelDrain();
    this.rooms.clear();
  }

  // ─── Internals ─────────────────────────────────────────

  private ensureRoom(roomKey: string): Room {
    let room = this.rooms.get(roomKey);
    if (!room) {
      room = new Room(roomKey, { throttleMs: this.config.updateThrottleMs });
      this.rooms.set(roomKey, room);
      this.logs.record('ROOM_CREATED', {}, 'INFO', roomKey);
    }
    return room;
  }

  private settle(room: Room): void {
    const started = room.settle(this.config.roomDrainGraceMs, () => {
      void this.queue.run(room.roomKey, () => this.expire(room));
    });
    if (started) {
      this.logs.record('ROOM_DRAINING', { graceMs: this.config.roomDrainGraceMs }, 'INFO', room.roomKey);
    }
  }

  private expire(room: Room): void {
    // A join or publish may have slipped in ahead of the expiry task.
    if (this.rooms.get(room.roomKey) !== room || !room.isIdle() || room.state !== 'draining') return;
    this.rooms.delete(room.roomKey);
    room.state = 'empty';
    console.log(`[sync] room ${room.roomKey} discarded after drain`);
    this.logs.record('ROOM_DISCARDED', { revision: room.revision }, 'INFO', room.roomKey);
  }

  private mutate<E extends ValidationError>(
    roomKey: string,
    step: (scene: SceneState) => Result<MutationStep, E>,
  ): Promise<Result<PublishResult, E>> {
    return this.queue.run(roomKey, (): Result<PublishResult, E> => {
      const room = this.ensureRoom(roomKey);
      const outcome = step(room.scene);
      if (!outcome.ok) {
        this.logs.record('VALIDATION_SKIP', { code: outcome.error.code, message: outcome.error.message }, 'WARN', roomKey);
        this.settle(room);
        return outcome;
      }

      const { scene, events, errors } = outcome.value;
      room.scene = { ...scene, revision: room.revision };
      if (errors.length > 0) {
        this.logs.record('VALIDATION_SKIP', { errors }, 'WARN', roomKey);
      }

      const revisions = events.map((event) => {
        const revision = room.nextRevision();
        this.broadcast(room, encodeEvent(roomKey, revision, event));
        return revision;
      });

      if (revisions.length > 0) {
        this.logs.record(
          'PUBLISH',
          { events: events.map((e) => e.kind), revisions },
          'INFO',
          roomKey,
        );
      }
      this.settle(room);
      return ok({ revisions, errors });
    });
  }

  private broadcast(room: Room, frame: ServerFrame): void {
    for (const member of [...room.members.values()]) {
      this.deliver(room, member, frame);
    }
  }

  /** Send to one member. A member whose send throws is dropped from the room. */
  private deliver(room: Room, member: RoomMember, frame: ServerFrame): void {
    try {
      member.send(frame);
    } catch (err) {
      room.members.delete(member.id);
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[sync] dropping member ${member.id} from ${room.roomKey}:`, message);
      this.logs.record('MEMBER_DROPPED', { memberId: member.id, error: message }, 'WARN', room.roomKey);
      this.settle(room);
    }
  }
}

interface MutationStep {
  scene: SceneState;
  events: SceneEvent[];
  errors: SceneDiagnostic[];
}

function infallible(result: Result<PublishResult, never>): PublishResult {
  return result.ok ? result.value : result.error;
}
