import { DEFAULT_STYLE } from '../style/normalizeStyle';
import type { SceneEvent } from '../types/events';
import type { MarkerGroup, SceneState } from '../types/map';
import { defaultSceneConfig, findGroup, upsertNode } from './sceneState';
import { pickThemeColours, resolveTheme } from './theme';

/**
 * Apply one decoded event to a scene. Idempotent for every event kind:
 * re-applying an event yields the same scene. Events that reference an
 * unknown group (other than group_update, which adds it) change nothing.
 * A full_state rebuilds the scene: an omitted theme or config resets to
 * the defaults.
 */
export function applySceneEvent(scene: SceneState, event: SceneEvent): SceneState {
  switch (event.kind) {
    case 'full_state':
      return {
        ...scene,
        groups: event.groups,
        theme: event.theme ?? resolveTheme(undefined),
        config: event.config ?? defaultSceneConfig(),
      };

    case 'group_update': {
      const existing = findGroup(scene, event.groupId);
      const group: MarkerGroup = {
        id: event.groupId,
        label: event.label ?? existing?.label ?? event.groupId,
        style: event.style ?? existing?.style ?? DEFAULT_STYLE,
        nodes: event.nodes,
        visible: event.visible ?? existing?.visible ?? true,
      };
      const groups = existing
        ? scene.groups.map((g) => (g.id === event.groupId ? group : g))
        : [...scene.groups, group];
      return { ...scene, groups };
    }

    case 'marker_add': {
      const existing = findGroup(scene, event.groupId);
      if (!existing) return scene;
      const next = upsertNode(existing, event.node);
      if (next === existing) return scene;
      return { ...scene, groups: scene.groups.map((g) => (g.id === event.groupId ? next : g)) };
    }

    case 'marker_remove': {
      const existing = findGroup(scene, event.groupId);
      if (!existing || !existing.nodes.some((n) => n.id === event.markerId)) return scene;
      const next = { ...existing, nodes: existing.nodes.filter((n) => n.id !== event.markerId) };
      return { ...scene, groups: scene.groups.map((g) => (g.id === event.groupId ? next : g)) };
    }

    case 'theme_change':
      return { ...scene, theme: { ...scene.theme, ...pickThemeColours(event.theme) } };

    case 'visibility_toggle': {
      const existing = findGroup(scene, event.groupId);
      if (!existing || existing.visible === event.visible) return scene;
      return {
        ...scene,
        groups: scene.groups.map((g) => (g.id === event.groupId ? { ...g, visible: event.visible } : g)),
      };
    }
  }
}
