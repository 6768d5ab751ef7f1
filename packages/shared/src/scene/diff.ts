import type { SceneEvent } from '../types/events';
import type { MarkerGroup, SceneConfig, SceneState } from '../types/map';
import { nodesEqual, stylesEqual } from './sceneState';
import { themeDelta } from './theme';

type SceneContent = Pick<SceneState, 'groups' | 'theme' | 'config'>;

function configsEqual(a: SceneConfig, b: SceneConfig): boolean {
  return (
    a.throttleMs === b.throttleMs &&
    a.bbox.minX === b.bbox.minX &&
    a.bbox.minY === b.bbox.minY &&
    a.bbox.maxX === b.bbox.maxX &&
    a.bbox.maxY === b.bbox.maxY
  );
}

export function fullStateEvent(scene: SceneContent): SceneEvent {
  return { kind: 'full_state', groups: scene.groups, theme: scene.theme, config: scene.config };
}

/**
 * Existing groups must keep their relative order and new groups may only
 * be appended; anything else needs a full replace.
 */
function groupsIncremental(previous: readonly MarkerGroup[], next: readonly MarkerGroup[]): boolean {
  if (next.length < previous.length) return false;
  return previous.every((g, i) => next[i].id === g.id);
}

function groupUpdate(group: MarkerGroup, withMeta: boolean, withVisibility: boolean): SceneEvent {
  return {
    kind: 'group_update',
    groupId: group.id,
    nodes: group.nodes,
    ...(withMeta ? { label: group.label, style: group.style } : {}),
    ...(withVisibility ? { visible: group.visible } : {}),
  };
}

function diffNodes(previous: MarkerGroup, next: MarkerGroup): SceneEvent[] | null {
  const nextIds = new Set(next.nodes.map((n) => n.id));
  const kept = previous.nodes.filter((n) => nextIds.has(n.id));
  const removed = previous.nodes.filter((n) => !nextIds.has(n.id));

  // Kept nodes must be an unchanged prefix of the new list.
  if (!kept.every((n, i) => i < next.nodes.length && nodesEqual(n, next.nodes[i]))) return null;

  const added = next.nodes.slice(kept.length);
  return [
    ...removed.map((n): SceneEvent => ({ kind: 'marker_remove', groupId: next.id, markerId: n.id })),
    ...added.map((n): SceneEvent => ({ kind: 'marker_add', groupId: next.id, node: n })),
  ];
}

/**
 * Smallest run of events that turns `previous` into `next`. Falls back to a
 * single full_state whenever the incremental vocabulary cannot express the
 * change (removed or reordered groups, config changes).
 */
export function diffScenes(previous: SceneContent, next: SceneContent): SceneEvent[] {
  if (!configsEqual(previous.config, next.config) || !groupsIncremental(previous.groups, next.groups)) {
    return [fullStateEvent(next)];
  }

  const events: SceneEvent[] = [];

  next.groups.forEach((group, i) => {
    const old = previous.groups[i];
    if (!old) {
      events.push(groupUpdate(group, true, true));
      return;
    }

    if (old.label !== group.label || !stylesEqual(old.style, group.style)) {
      events.push(groupUpdate(group, true, old.visible !== group.visible));
      return;
    }

    const nodeEvents = diffNodes(old, group);
    if (nodeEvents === null) {
      events.push(groupUpdate(group, false, false));
    } else {
      events.push(...nodeEvents);
    }

    if (old.visible !== group.visible) {
      events.push({ kind: 'visibility_toggle', groupId: group.id, visible: group.visible });
    }
  });

  const delta = themeDelta(previous.theme, next.theme);
  if (Object.keys(delta).length > 0) {
    events.push({ kind: 'theme_change', theme: delta });
  }

  return events;
}
