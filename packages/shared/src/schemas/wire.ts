import { z } from 'zod';
import { MARKER_ANIMATIONS, MAX_MARKER_SIZE, MIN_MARKER_SIZE } from '../constants/styles';
import { zColour, zLatLngPair, zPlacedLatLngPair } from './validators';

// ─── Wire Schemas ────────────────────────────────────────
// JSON frames exchanged over the map socket. Field names are snake_case;
// coordinate pairs are `[lat, lng]` arrays, bounding boxes
// `[minX, minY, maxX, maxY]` arrays.

/** A node as it may appear on the wire: key, pair, or pair + label. */
export const WireNodeSchema = z.union([
  z.string().min(1),
  zLatLngPair,
  z.object({
    coordinates: zPlacedLatLngPair,
    label: z.string(),
    id: z.string().min(1).optional(),
    location: z.string().min(1).optional(),
  }),
]);

export const WireStyleSchema = z.object({
  colour: zColour,
  size: z.number().int().min(MIN_MARKER_SIZE).max(MAX_MARKER_SIZE),
  animation: z.enum(MARKER_ANIMATIONS),
  gradient: z.boolean(),
  glow: z.boolean(),
});

export const WireGroupSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  style: WireStyleSchema.optional(),
  nodes: z.array(WireNodeSchema),
  visible: z.boolean().optional(),
});

export const WireThemeSchema = z.object({
  land: zColour,
  ocean: zColour,
  border: zColour,
  neutralMarker: zColour,
  neutralText: zColour,
});

export const WireThemePatchSchema = WireThemeSchema.partial();

export const WireBoundingBoxSchema = z
  .tuple([z.number().finite(), z.number().finite(), z.number().finite(), z.number().finite()])
  .refine(([minX, minY, maxX, maxY]) => maxX > minX && maxY > minY, 'Bounding box must have positive extents');

export const WireConfigSchema = z.object({
  bbox: WireBoundingBoxSchema,
  throttle_ms: z.number().int().min(0),
});

// ─── Event payloads ──────────────────────────────────────

export const FullStatePayloadSchema = z.object({
  marker_groups: z.array(WireGroupSchema),
  theme: WireThemeSchema.optional(),
  config: WireConfigSchema.optional(),
});

export const GroupUpdatePayloadSchema = z.object({
  group_id: z.string().min(1),
  markers: z.array(WireNodeSchema),
  label: z.string().optional(),
  style: WireStyleSchema.optional(),
  visible: z.boolean().optional(),
});

export const MarkerAddPayloadSchema = z.object({
  group_id: z.string().min(1),
  marker: WireNodeSchema,
});

export const MarkerRemovePayloadSchema = z.object({
  group_id: z.string().min(1),
  marker_id: z.string().min(1),
});

export const ThemeChangePayloadSchema = z.object({
  theme: WireThemePatchSchema,
});

export const VisibilityTogglePayloadSchema = z.object({
  group_id: z.string().min(1),
  visible: z.boolean(),
});

// ─── Envelopes ───────────────────────────────────────────

const eventEnvelope = <K extends string, P extends z.ZodTypeAny>(event: K, payload: P) =>
  z.object({
    type: z.literal('event'),
    room: z.string().min(1),
    revision: z.number().int().nonnegative(),
    event: z.literal(event),
    payload,
  });

export const ServerEventSchema = z.discriminatedUnion('event', [
  eventEnvelope('full_state', FullStatePayloadSchema),
  eventEnvelope('group_update', GroupUpdatePayloadSchema),
  eventEnvelope('marker_add', MarkerAddPayloadSchema),
  eventEnvelope('marker_remove', MarkerRemovePayloadSchema),
  eventEnvelope('theme_change', ThemeChangePayloadSchema),
  eventEnvelope('visibility_toggle', VisibilityTogglePayloadSchema),
]);

export const ServerReplySchema = z.object({
  type: z.literal('reply'),
  ref: z.string().min(1),
  status: z.enum(['ok', 'error']),
  response: z.record(z.unknown()),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('join'), ref: z.string().min(1), room: z.string().min(1) }),
  z.object({ type: z.literal('leave'), ref: z.string().min(1), room: z.string().min(1) }),
  z.object({
    type: z.literal('sync_request'),
    ref: z.string().min(1),
    room: z.string().min(1),
    client_state_fingerprint: z.string(),
  }),
  z.object({ type: z.literal('health_check'), ref: z.string().min(1) }),
]);

export const BootstrapPayloadSchema = z.object({
  room: z.string().min(1),
  surface_id: z.string().min(1),
  revision: z.number().int().nonnegative().default(0),
  state: FullStatePayloadSchema,
});
