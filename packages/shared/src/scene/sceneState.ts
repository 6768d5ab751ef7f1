// ─── Scene State ─────────────────────────────────────────
// Pure transitions over the per-room aggregate. Every function returns a
// new SceneState; the revision is left alone and stamped by whoever emits
// the resulting events.

import { DEFAULT_BBOX, DEFAULT_THROTTLE_MS } from '../constants';
import {
  ValidationError,
  fail,
  ok,
  toDiagnostic,
  type Result,
  type SceneDiagnostic,
} from '../errors';
import type { LocationTable } from '../geo/locations';
import { resolveNode } from '../geo/projection';
import { DEFAULT_STYLE, normalizeStyle } from '../style/normalizeStyle';
import type { FullStateInput, MarkerGroupInput, StyleInput, ThemeInput } from '../types/inputs';
import type { MapTheme, MarkerGroup, MarkerStyle, PlacedNode, SceneConfig, SceneState } from '../types/map';
import { pickThemeColours, resolveTheme, themeDelta } from './theme';

export interface SceneContext {
  locations: LocationTable;
  /** Place unknown location keys off-frame instead of skipping them. */
  legacy?: boolean;
}

export interface SceneUpdate {
  scene: SceneState;
  errors: SceneDiagnostic[];
}

export interface SceneOptions {
  theme?: ThemeInput;
  config?: Partial<SceneConfig>;
  now?: number;
}

export function defaultSceneConfig(overrides: Partial<SceneConfig> = {}): SceneConfig {
  return {
    bbox: { ...(overrides.bbox ?? DEFAULT_BBOX) },
    throttleMs: overrides.throttleMs ?? DEFAULT_THROTTLE_MS,
  };
}

export function createSceneState(roomKey: string, options: SceneOptions = {}): SceneState {
  return {
    roomKey,
    groups: [],
    theme: resolveTheme(options.theme),
    config: defaultSceneConfig(options.config),
    revision: 0,
    updatedAt: options.now ?? Date.now(),
  };
}

function touch(scene: SceneState, patch: Partial<Omit<SceneState, 'roomKey' | 'revision'>>): SceneState {
  return { ...scene, ...patch, updatedAt: patch.updatedAt ?? Date.now() };
}

export function withRevision(scene: SceneState, revision: number): SceneState {
  return { ...scene, revision };
}

export function findGroup(scene: Pick<SceneState, 'groups'>, groupId: string): MarkerGroup | undefined {
  return scene.groups.find((g) => g.id === groupId);
}

/** Suffix `~2`, `~3`… onto ids already used inside the same group. */
export function uniqueNodeId(id: string, used: Set<string>): string {
  let candidate = id;
  let n = 2;
  while (used.has(candidate)) {
    candidate = `${id}~${n}`;
    n += 1;
  }
  used.add(candidate);
  return candidate;
}

function resolveNodes(
  inputs: readonly unknown[],
  ctx: SceneContext,
  groupId: string,
): { nodes: PlacedNode[]; errors: SceneDiagnostic[] } {
  const nodes: PlacedNode[] = [];
  const errors: SceneDiagnostic[] = [];
  const used = new Set<string>();

  inputs.forEach((input, index) => {
    const resolved = resolveNode(input, ctx.locations, { legacy: ctx.legacy });
    if (!resolved.ok) {
      errors.push(toDiagnostic(resolved.error, groupId, index));
      return;
    }
    const id = uniqueNodeId(resolved.value.id, used);
    nodes.push(id === resolved.value.id ? resolved.value : { ...resolved.value, id });
  });

  return { nodes, errors };
}

function resolveStyle(input: StyleInput | undefined): Result<MarkerStyle> {
  return input === undefined ? ok(DEFAULT_STYLE) : normalizeStyle(input);
}

/**
 * Build one group. Invalid nodes are skipped and reported; the group itself
 * is only rejected when its id or style is unusable. A group left with no
 * valid nodes is still returned so its label stays visible.
 */
export function buildGroup(
  input: MarkerGroupInput,
  ctx: SceneContext,
): { group: MarkerGroup | null; errors: SceneDiagnostic[] } {
  if (typeof input.id !== 'string' || input.id.trim() === '') {
    const error = new ValidationError('missing_group_id', 'Marker group is missing an id', 'id');
    return { group: null, errors: [toDiagnostic(error, null)] };
  }

  const style = resolveStyle(input.style);
  if (!style.ok) {
    return { group: null, errors: [toDiagnostic(style.error, input.id)] };
  }

  const { nodes, errors } = resolveNodes(input.nodes, ctx, input.id);
  return {
    group: {
      id: input.id,
      label: input.label ?? input.id,
      style: style.value,
      nodes,
      visible: input.visible ?? true,
    },
    errors,
  };
}

/** Run every group through normalisation and replace the scene's group list. */
export function applyGroups(
  scene: SceneState,
  inputs: readonly MarkerGroupInput[],
  ctx: SceneContext,
): SceneUpdate {
  const groups: MarkerGroup[] = [];
  const errors: SceneDiagnostic[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const built = buildGroup(input, ctx);
    errors.push(...built.errors);
    if (!built.group) continue;

    if (seen.has(built.group.id)) {
      const error = new ValidationError(
        'duplicate_group',
        `Marker group "${built.group.id}" appears more than once`,
        'id',
      );
      errors.push(toDiagnostic(error, built.group.id));
      continue;
    }
    seen.add(built.group.id);
    groups.push(built.group);
  }

  return { scene: touch(scene, { groups }), errors };
}

export function replaceState(scene: SceneState, input: FullStateInput, ctx: SceneContext): SceneUpdate {
  const { scene: withGroups, errors } = applyGroups(scene, input.groups, ctx);
  return {
    scene: touch(withGroups, {
      theme: input.theme === undefined ? scene.theme : resolveTheme(input.theme),
      config: input.config === undefined ? scene.config : defaultSceneConfig({ ...scene.config, ...input.config }),
    }),
    errors,
  };
}

export interface GroupNodesInput {
  nodes: readonly unknown[];
  label?: string;
  style?: StyleInput;
}

/**
 * Replace one group's nodes (and optionally label and style). An absent
 * group is added at the end.
 */
export function replaceGroupNodes(
  scene: SceneState,
  groupId: string,
  input: GroupNodesInput,
  ctx: SceneContext,
): Result<SceneUpdate> {
  const existing = findGroup(scene, groupId);
  const style = input.style === undefined ? ok(existing?.style ?? DEFAULT_STYLE) : normalizeStyle(input.style);
  if (!style.ok) return fail(style.error);

  const { nodes, errors } = resolveNodes(input.nodes, ctx, groupId);
  const group: MarkerGroup = {
    id: groupId,
    label: input.label ?? existing?.label ?? groupId,
    style: style.value,
    nodes,
    visible: existing?.visible ?? true,
  };

  const groups = existing
    ? scene.groups.map((g) => (g.id === groupId ? group : g))
    : [...scene.groups, group];
  return ok({ scene: touch(scene, { groups }), errors });
}

export function nodesEqual(a: PlacedNode, b: PlacedNode): boolean {
  return (
    a.id === b.id &&
    a.label === b.label &&
    a.location === b.location &&
    a.coordinates.lat === b.coordinates.lat &&
    a.coordinates.lng === b.coordinates.lng
  );
}

export function stylesEqual(a: MarkerStyle, b: MarkerStyle): boolean {
  return (
    a.colour === b.colour &&
    a.size === b.size &&
    a.animation === b.animation &&
    a.gradient === b.gradient &&
    a.glow === b.glow
  );
}

/**
 * Insert a node into a group. A node with the same id is replaced in
 * place, so applying the same addition twice leaves one copy.
 */
export function upsertNode(group: MarkerGroup, node: PlacedNode): MarkerGroup {
  const index = group.nodes.findIndex((n) => n.id === node.id);
  if (index === -1) return { ...group, nodes: [...group.nodes, node] };
  if (nodesEqual(group.nodes[index], node)) return group;
  return { ...group, nodes: group.nodes.map((n, i) => (i === index ? node : n)) };
}

export function addMarker(
  scene: SceneState,
  groupId: string,
  marker: unknown,
  ctx: SceneContext,
): Result<{ scene: SceneState; node: PlacedNode; changed: boolean }> {
  const group = findGroup(scene, groupId);
  if (!group) {
    return fail(new ValidationError('unknown_group', `Marker group "${groupId}" does not exist`));
  }
  const resolved = resolveNode(marker, ctx.locations, { legacy: ctx.legacy });
  if (!resolved.ok) return fail(resolved.error);

  const next = upsertNode(group, resolved.value);
  if (next === group) return ok({ scene, node: resolved.value, changed: false });
  return ok({
    scene: touch(scene, { groups: scene.groups.map((g) => (g.id === groupId ? next : g)) }),
    node: resolved.value,
    changed: true,
  });
}

/** Remove a marker by id. Removing a marker that is not there is a no-op. */
export function removeMarker(
  scene: SceneState,
  groupId: string,
  markerId: string,
): { scene: SceneState; changed: boolean } {
  const group = findGroup(scene, groupId);
  if (!group || !group.nodes.some((n) => n.id === markerId)) return { scene, changed: false };
  const next: MarkerGroup = { ...group, nodes: group.nodes.filter((n) => n.id !== markerId) };
  return {
    scene: touch(scene, { groups: scene.groups.map((g) => (g.id === groupId ? next : g)) }),
    changed: true,
  };
}

/**
 * A preset name replaces the whole theme; a partial map is merged over the
 * current one. Returns only the keys that actually changed.
 */
export function changeTheme(
  scene: SceneState,
  input: ThemeInput,
): { scene: SceneState; delta: Partial<MapTheme> } {
  const theme: MapTheme =
    typeof input === 'string' ? resolveTheme(input) : { ...scene.theme, ...pickThemeColours(input) };
  const delta = themeDelta(scene.theme, theme);
  if (Object.keys(delta).length === 0) return { scene, delta };
  return { scene: touch(scene, { theme }), delta };
}

export function setGroupVisibility(
  scene: SceneState,
  groupId: string,
  visible: boolean,
): Result<{ scene: SceneState; changed: boolean }> {
  const group = findGroup(scene, groupId);
  if (!group) {
    return fail(new ValidationError('unknown_group', `Marker group "${groupId}" does not exist`));
  }
  if (group.visible === visible) return ok({ scene, changed: false });
  return ok({
    scene: touch(scene, {
      groups: scene.groups.map((g) => (g.id === groupId ? { ...g, visible } : g)),
    }),
    changed: true,
  });
}
