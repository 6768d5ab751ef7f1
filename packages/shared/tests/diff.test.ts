import { describe, it, expect } from 'vitest';
import { defaultLocationTable } from '../src/geo/locations';
import { applySceneEvent } from '../src/scene/applyEvent';
import { diffScenes } from '../src/scene/diff';
import { resolveTheme } from '../src/scene/theme';
import {
  addMarker,
  applyGroups,
  changeTheme,
  createSceneState,
  removeMarker,
  replaceState,
  setGroupVisibility,
  type SceneContext,
} from '../src/scene/sceneState';
import type { MarkerGroupInput } from '../src/types/inputs';
import type { SceneState } from '../src/types/map';

const ctx: SceneContext = { locations: defaultLocationTable };

function sceneWith(groups: MarkerGroupInput[]): SceneState {
  return applyGroups(createSceneState('ops', { now: 0 }), groups, ctx).scene;
}

function content(scene: SceneState) {
  return { groups: scene.groups, theme: scene.theme, config: scene.config };
}

function replay(from: SceneState, to: SceneState): SceneState {
  return diffScenes(from, to).reduce(applySceneEvent, from);
}

describe('diffScenes', () => {
  const base = sceneWith([
    { id: 'edge', style: 'operational', nodes: ['sjc', 'lhr'] },
    { id: 'core', style: 'info', nodes: ['fra'] },
  ]);

  it('emits nothing for identical scenes', () => {
    expect(diffScenes(base, base)).toEqual([]);
  });

  it('emits marker_add for appended nodes', () => {
    const next = addMarker(base, 'edge', 'nrt', ctx).value?.scene ?? base;
    const events = diffScenes(base, next);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ kind: 'marker_add', groupId: 'edge', node: { id: 'nrt' } });
    expect(content(replay(base, next))).toEqual(content(next));
  });

  it('emits marker_remove for dropped nodes', () => {
    const next = removeMarker(base, 'edge', 'sjc').scene;
    expect(diffScenes(base, next)).toEqual([{ kind: 'marker_remove', groupId: 'edge', markerId: 'sjc' }]);
    expect(content(replay(base, next))).toEqual(content(next));
  });

  it('falls back to group_update when nodes are reordered', () => {
    const next = sceneWith([
      { id: 'edge', style: 'operational', nodes: ['lhr', 'sjc'] },
      { id: 'core', style: 'info', nodes: ['fra'] },
    ]);
    const events = diffScenes(base, next);
    expect(events).toHaveLength(1);
    expect(events[0].kind).toBe('group_update');
    expect(content(replay(base, next))).toEqual(content(next));
  });

  it('emits group_update with metadata for restyled groups', () => {
    const next = sceneWith([
      { id: 'edge', style: 'danger', nodes: ['sjc', 'lhr'] },
      { id: 'core', style: 'info', nodes: ['fra'] },
    ]);
    const [event] = diffScenes(base, next);
    expect(event).toMatchObject({ kind: 'group_update', groupId: 'edge', style: { colour: '#ef4444' } });
    expect(content(replay(base, next))).toEqual(content(next));
  });

  it('emits visibility_toggle for hidden groups', () => {
    const next = setGroupVisibility(base, 'core', false).value?.scene ?? base;
    expect(diffScenes(base, next)).toEqual([{ kind: 'visibility_toggle', groupId: 'core', visible: false }]);
  });

  it('emits one theme_change carrying only the changed keys', () => {
    const next = changeTheme(base, { land: '#111111', border: '#222222' }).scene;
    expect(diffScenes(base, next)).toEqual([
      { kind: 'theme_change', theme: { land: '#111111', border: '#222222' } },
    ]);
  });

  it('emits group_update for appended groups', () => {
    const next = sceneWith([
      { id: 'edge', style: 'operational', nodes: ['sjc', 'lhr'] },
      { id: 'core', style: 'info', nodes: ['fra'] },
      { id: 'new', nodes: ['syd'] },
    ]);
    const events = diffScenes(base, next);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ kind: 'group_update', groupId: 'new', visible: true });
    expect(content(replay(base, next))).toEqual(content(next));
  });

  it('falls back to full_state when a group is removed', () => {
    const next = sceneWith([{ id: 'core', style: 'info', nodes: ['fra'] }]);
    const events = diffScenes(base, next);
    expect(events).toHaveLength(1);
    expect(events[0].kind).toBe('full_state');
    expect(content(replay(base, next))).toEqual(content(next));
  });

  it('falls back to full_state when the config changes', () => {
    const next = replaceState(
      base,
      { groups: [{ id: 'edge', style: 'operational', nodes: ['sjc', 'lhr'] }, { id: 'core', style: 'info', nodes: ['fra'] }], config: { throttleMs: 250 } },
      ctx,
    ).scene;
    const events = diffScenes(base, next);
    expect(events.map((e) => e.kind)).toEqual(['full_state']);
    expect(content(replay(base, next))).toEqual(content(next));
  });
});

describe('applySceneEvent', () => {
  const base = sceneWith([{ id: 'edge', nodes: ['sjc'] }]);

  it('is idempotent for every incremental event', () => {
    const next = changeTheme(
      setGroupVisibility(addMarker(base, 'edge', 'lhr', ctx).value?.scene ?? base, 'edge', false).value?.scene ??
        base,
      { ocean: '#000000' },
    ).scene;
    for (const event of diffScenes(base, next)) {
      const once = applySceneEvent(base, event);
      expect(applySceneEvent(once, event)).toEqual(once);
    }
  });

  it('ignores events for unknown groups', () => {
    expect(applySceneEvent(base, { kind: 'marker_remove', groupId: 'nope', markerId: 'sjc' })).toBe(base);
    expect(applySceneEvent(base, { kind: 'visibility_toggle', groupId: 'nope', visible: false })).toBe(base);
  });

  it('resets theme and config when a full_state leaves them out', () => {
    const styled = replaceState(base, { groups: [], theme: 'dark', config: { throttleMs: 250 } }, ctx).scene;
    expect(styled.theme).toEqual(resolveTheme('dark'));

    const rebuilt = applySceneEvent(styled, { kind: 'full_state', groups: [] });

    expect(rebuilt.theme).toEqual(resolveTheme('light'));
    expect(rebuilt.config).toEqual({ bbox: { minX: 0, minY: 0, maxX: 800, maxY: 391 }, throttleMs: 50 });
  });
});
