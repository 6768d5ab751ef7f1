// ─── Local Mirror ────────────────────────────────────────
// The client's copy of a room's scene plus the last revision applied.
// Only the reconciler mutates it, and only through applyServerEvent.

import { applySceneEvent, createSceneState, type SceneEvent, type SceneState } from '@mapsync/shared';

export interface MapMirror {
  readonly room: string;
  readonly revision: number;
  readonly scene: SceneState;
}

/** What the render surface has to redo after an event. */
export type RenderChange =
  | { type: 'render_all' }
  | { type: 'render_group'; groupId: string }
  | { type: 'upsert_marker'; groupId: string; markerId: string }
  | { type: 'remove_marker'; groupId: string; markerId: string }
  | { type: 'group_visible'; groupId: string }
  | { type: 'theme' };

export interface MirrorUpdate {
  mirror: MapMirror;
  changes: RenderChange[];
}

export function createMirror(room: string, scene: SceneState = createSceneState(room)): MapMirror {
  return { room, revision: scene.revision, scene };
}

function changesFor(event: SceneEvent): RenderChange[] {
  switch (event.kind) {
    case 'full_state':
      return [{ type: 'render_all' }];
    case 'group_update':
      return [{ type: 'render_group', groupId: event.groupId }];
    case 'marker_add':
      return [{ type: 'upsert_marker', groupId: event.groupId, markerId: event.node.id }];
    case 'marker_remove':
      return [{ type: 'remove_marker', groupId: event.groupId, markerId: event.markerId }];
    case 'theme_change':
      return [{ type: 'theme' }];
    case 'visibility_toggle':
      return [{ type: 'group_visible', groupId: event.groupId }];
  }
}

/**
 * Apply one decoded event. Incremental events at or below the mirror's
 * revision are ignored; full_state always applies and resets the revision.
 */
export function applyServerEvent(mirror: MapMirror, revision: number, event: SceneEvent): MirrorUpdate {
  if (event.kind !== 'full_state' && revision <= mirror.revision) {
    return { mirror, changes: [] };
  }

  const scene = applySceneEvent(mirror.scene, event);
  const next: MapMirror = { ...mirror, revision, scene: { ...scene, revision } };
  return { mirror: next, changes: scene === mirror.scene ? [] : changesFor(event) };
}
