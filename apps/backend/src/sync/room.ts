import {
  createSceneState,
  withRevision,
  type SceneConfig,
  type SceneState,
  type ServerFrame,
} from '@mapsync/shared';

/** Anything that can receive frames for a room: one socket, one test stub. */
export interface RoomMember {
  readonly id: string;
  /** Enqueue a frame. Throwing marks the member as gone. */
  send(frame: ServerFrame): void;
}

export type RoomLifecycle = 'empty' | 'active' | 'draining';

export interface RoomSummary {
  roomKey: string;
  state: RoomLifecycle;
  members: number;
  producers: number;
  groups: number;
  revision: number;
  updatedAt: number;
}

/**
 * Per-room state owned by the sync channel. Only ever touched from inside
 * the room's queue.
 */
export class Room {
  readonly roomKey: string;
  scene: SceneState;
  state: RoomLifecycle = 'empty';
  readonly members = new Map<string, RoomMember>();
  producers = 0;
  private drainTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(roomKey: string, config: Partial<SceneConfig>) {
    this.roomKey = roomKey;
    this.scene = createSceneState(roomKey, { config });
  }

  get revision(): number {
    return this.scene.revision;
  }

  /** Advance the revision counter and return the new value. */
  nextRevision(): number {
    const revision = this.scene.revision + 1;
    this.scene = withRevision(this.scene, revision);
    return revision;
  }

  isIdle(): boolean {
    return this.members.size === 0 && this.producers === 0;
  }

  /**
   * Move to active when anyone holds the room, otherwise start draining.
   * Returns true when a drain just started.
   */
  settle(graceMs: number, onExpire: () => void): boolean {
    if (!this.isIdle()) {
      this.cancelDrain();
      this.state = 'active';
      return false;
    }
    if (this.state === 'draining') return false;
    this.state = 'draining';
    this.drainTimer = setTimeout(() => {
      this.drainTimer = null;
      onExpire();
    }, graceMs);
    return true;
  }

  cancelDrain(): void {
    if (this.drainTimer) {
      clearTimeout(this.drainTimer);
      this.drainTimer = null;
    }
  }

  summary(): RoomSummary {
    return {
      roomKey: this.roomKey,
      state: this.state,
      members: this.members.size,
      producers: this.producers,
      groups: this.scene.groups.length,
      revision: this.scene.revision,
      updatedAt: this.scene.updatedAt,
    };
  }
}
