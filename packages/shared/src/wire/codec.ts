// ─── Wire Codec ──────────────────────────────────────────
// Translates between decoded scene records and the JSON frames on the
// socket. The only place that knows about `[lat, lng]` pairs, bbox arrays
// and snake_case field names.

import { ValidationError, fail, ok, toDiagnostic, type Result, type SceneDiagnostic } from '../errors';
import type { LocationTable } from '../geo/locations';
import { coordinateNodeId, resolveNode, type ResolveOptions } from '../geo/projection';
import { uniqueNodeId } from '../scene/sceneState';
import { pickThemeColours } from '../scene/theme';
import { ServerEventSchema, ServerReplySchema } from '../schemas/wire';
import { DEFAULT_STYLE } from '../style/normalizeStyle';
import type {
  FullStatePayload,
  RoomEvent,
  SceneEvent,
  ServerEventFrame,
  ServerFrame,
  WireGroup,
  WireNode,
  WireStyle,
} from '../types/events';
import type { MapTheme, MarkerGroup, MarkerStyle, PlacedNode, SceneConfig, SceneState } from '../types/map';

type WireConfig = NonNullable<FullStatePayload['config']>;

// ─── Encode ──────────────────────────────────────────────

export function encodeNode(node: PlacedNode): WireNode {
  return {
    coordinates: [node.coordinates.lat, node.coordinates.lng],
    label: node.label,
    id: node.id,
    ...(node.location !== undefined ? { location: node.location } : {}),
  };
}

export function encodeStyle(style: MarkerStyle): WireStyle {
  return {
    colour: style.colour,
    size: style.size,
    animation: style.animation,
    gradient: style.gradient,
    glow: style.glow,
  };
}

export function encodeGroup(group: MarkerGroup): WireGroup {
  return {
    id: group.id,
    label: group.label,
    style: encodeStyle(group.style),
    nodes: group.nodes.map(encodeNode),
    visible: group.visible,
  };
}

export function encodeTheme(theme: MapTheme): MapTheme {
  return {
    land: theme.land,
    ocean: theme.ocean,
    border: theme.border,
    neutralMarker: theme.neutralMarker,
    neutralText: theme.neutralText,
  };
}

export function encodeConfig(config: SceneConfig): WireConfig {
  const { minX, minY, maxX, maxY } = config.bbox;
  return { bbox: [minX, minY, maxX, maxY], throttle_ms: config.throttleMs };
}

export function encodeFullState(scene: Pick<SceneState, 'groups' | 'theme' | 'config'>): FullStatePayload {
  return {
    marker_groups: scene.groups.map(encodeGroup),
    theme: encodeTheme(scene.theme),
    config: encodeConfig(scene.config),
  };
}

export function encodeEvent(room: string, revision: number, event: SceneEvent): ServerEventFrame {
  const envelope = { type: 'event', room, revision } as const;
  switch (event.kind) {
    case 'full_state':
      return {
        ...envelope,
        event: 'full_state',
        payload: {
          marker_groups: event.groups.map(encodeGroup),
          ...(event.theme ? { theme: encodeTheme(event.theme) } : {}),
          ...(event.config ? { config: encodeConfig(event.config) } : {}),
        },
      };
    case 'group_update':
      return {
        ...envelope,
        event: 'group_update',
        payload: {
          group_id: event.groupId,
          markers: event.nodes.map(encodeNode),
          ...(event.label !== undefined ? { label: event.label } : {}),
          ...(event.style ? { style: encodeStyle(event.style) } : {}),
          ...(event.visible !== undefined ? { visible: event.visible } : {}),
        },
      };
    case 'marker_add':
      return {
        ...envelope,
        event: 'marker_add',
        payload: { group_id: event.groupId, marker: encodeNode(event.node) },
      };
    case 'marker_remove':
      return {
        ...envelope,
        event: 'marker_remove',
        payload: { group_id: event.groupId, marker_id: event.markerId },
      };
    case 'theme_change':
      return { ...envelope, event: 'theme_change', payload: { theme: pickThemeColours(event.theme) } };
    case 'visibility_toggle':
      return {
        ...envelope,
        event: 'visibility_toggle',
        payload: { group_id: event.groupId, visible: event.visible },
      };
  }
}

export function encodeRoomEvent(roomEvent: RoomEvent): ServerEventFrame {
  return encodeEvent(roomEvent.room, roomEvent.revision, roomEvent.event);
}

// ─── Decode ──────────────────────────────────────────────

export interface DecodeContext extends ResolveOptions {
  locations: LocationTable;
}

export interface Decoded<T> {
  value: T;
  errors: SceneDiagnostic[];
}

/** Decode one wire node. Key strings resolve through the location table. */
export function decodeNode(wire: WireNode, ctx: DecodeContext): Result<PlacedNode> {
  if (typeof wire === 'string') return resolveNode(wire, ctx.locations, ctx);
  if (Array.isArray(wire)) {
    return resolveNode({ coordinates: wire }, ctx.locations, ctx);
  }
  const [lat, lng] = wire.coordinates;
  return ok({
    id: wire.id ?? coordinateNodeId({ lat, lng }),
    label: wire.label,
    coordinates: { lat, lng },
    ...(wire.location !== undefined ? { location: wire.location } : {}),
  });
}

function decodeNodes(wire: readonly WireNode[], groupId: string, ctx: DecodeContext): Decoded<PlacedNode[]> {
  const nodes: PlacedNode[] = [];
  const errors: SceneDiagnostic[] = [];
  const used = new Set<string>();

  wire.forEach((item, index) => {
    const decoded = decodeNode(item, ctx);
    if (!decoded.ok) {
      errors.push(toDiagnostic(decoded.error, groupId, index));
      return;
    }
    const id = uniqueNodeId(decoded.value.id, used);
    nodes.push(id === decoded.value.id ? decoded.value : { ...decoded.value, id });
  });

  return { value: nodes, errors };
}

export function decodeStyle(wire: WireStyle): MarkerStyle {
  return Object.freeze({ ...wire });
}

export function decodeGroup(wire: WireGroup, ctx: DecodeContext): Decoded<MarkerGroup> {
  const { value: nodes, errors } = decodeNodes(wire.nodes, wire.id, ctx);
  return {
    value: {
      id: wire.id,
      label: wire.label ?? wire.id,
      style: wire.style ? decodeStyle(wire.style) : DEFAULT_STYLE,
      nodes,
      visible: wire.visible ?? true,
    },
    errors,
  };
}

export function decodeConfig(wire: WireConfig): SceneConfig {
  const [minX, minY, maxX, maxY] = wire.bbox;
  return { bbox: { minX, minY, maxX, maxY }, throttleMs: wire.throttle_ms };
}

export function decodeFullState(
  payload: FullStatePayload,
  ctx: DecodeContext,
): Decoded<Extract<SceneEvent, { kind: 'full_state' }>> {
  const groups: MarkerGroup[] = [];
  const errors: SceneDiagnostic[] = [];
  const seen = new Set<string>();

  for (const wire of payload.marker_groups) {
    if (seen.has(wire.id)) {
      const error = new ValidationError('duplicate_group', `Marker group "${wire.id}" appears more than once`, 'id');
      errors.push(toDiagnostic(error, wire.id));
      continue;
    }
    seen.add(wire.id);
    const decoded = decodeGroup(wire, ctx);
    groups.push(decoded.value);
    errors.push(...decoded.errors);
  }

  return {
    value: {
      kind: 'full_state',
      groups,
      ...(payload.theme ? { theme: encodeTheme(payload.theme) } : {}),
      ...(payload.config ? { config: decodeConfig(payload.config) } : {}),
    },
    errors,
  };
}

/**
 * Decode a validated event frame. Node-level failures are dropped and
 * reported; a marker_add whose only node fails yields no event at all.
 */
export function decodeEvent(frame: ServerEventFrame, ctx: DecodeContext): Decoded<SceneEvent | null> {
  switch (frame.event) {
    case 'full_state':
      return decodeFullState(frame.payload, ctx);
    case 'group_update': {
      const { group_id: groupId, markers, label, style, visible } = frame.payload;
      const { value: nodes, errors } = decodeNodes(markers, groupId, ctx);
      return {
        value: {
          kind: 'group_update',
          groupId,
          nodes,
          ...(label !== undefined ? { label } : {}),
          ...(style ? { style: decodeStyle(style) } : {}),
          ...(visible !== undefined ? { visible } : {}),
        },
        errors,
      };
    }
    case 'marker_add': {
      const decoded = decodeNode(frame.payload.marker, ctx);
      if (!decoded.ok) {
        return { value: null, errors: [toDiagnostic(decoded.error, frame.payload.group_id, 0)] };
      }
      return { value: { kind: 'marker_add', groupId: frame.payload.group_id, node: decoded.value }, errors: [] };
    }
    case 'marker_remove':
      return {
        value: { kind: 'marker_remove', groupId: frame.payload.group_id, markerId: frame.payload.marker_id },
        errors: [],
      };
    case 'theme_change':
      return { value: { kind: 'theme_change', theme: pickThemeColours(frame.payload.theme) }, errors: [] };
    case 'visibility_toggle':
      return {
        value: { kind: 'visibility_toggle', groupId: frame.payload.group_id, visible: frame.payload.visible },
        errors: [],
      };
  }
}

/** Validate raw JSON from the socket as an event or a reply frame. */
export function parseServerFrame(raw: unknown): Result<ServerFrame> {
  const event = ServerEventSchema.safeParse(raw);
  if (event.success) return ok(event.data);
  const reply = ServerReplySchema.safeParse(raw);
  if (reply.success) return ok(reply.data);
  return fail(new ValidationError('invalid_field', 'Frame is neither a known event nor a reply', 'frame'));
}
