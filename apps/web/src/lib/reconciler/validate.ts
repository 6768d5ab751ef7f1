// ─── Inbound Validation ──────────────────────────────────
// Structural checks run before anything touches the local mirror. A
// frame that fails is dropped whole.

import {
  FullStatePayloadSchema,
  ServerEventSchema,
  ValidationError,
  WireNodeSchema,
  fail,
  ok,
  type FullStatePayload,
  type Result,
  type ServerEventFrame,
  type WireNode,
} from '@mapsync/shared';
import type { z } from 'zod';

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Index of the first group without a usable id, or -1. */
function missingGroupIdAt(groups: unknown): number {
  if (!Array.isArray(groups)) return -1;
  return groups.findIndex((group) => {
    if (!isRecord(group)) return false;
    return typeof group.id !== 'string' || group.id.length === 0;
  });
}

/**
 * Every group needs an id and a `nodes` sequence; a theme, when present,
 * must carry every colour.
 */
export function validateServerState(raw: unknown): Result<FullStatePayload> {
  if (isRecord(raw)) {
    const index = missingGroupIdAt(raw.marker_groups);
    if (index >= 0) {
      return fail(new ValidationError('missing_group_id', `Marker group ${index} has no id`, 'id'));
    }
  }
  const parsed = FullStatePayloadSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(new ValidationError('invalid_field', describeIssues(parsed.error), 'marker_groups'));
  }
  return ok(parsed.data);
}

/** A node must be a location key, a `[lat, lng]` pair, or a pair with a label. */
export function validateMarkerData(raw: unknown): Result<WireNode> {
  const parsed = WireNodeSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(new ValidationError('malformed_node', 'Expected a location key, [lat, lng] or { coordinates, label }'));
  }
  return ok(parsed.data);
}

export function validateServerEvent(raw: unknown): Result<ServerEventFrame> {
  if (isRecord(raw) && raw.event === 'full_state') {
    const state = validateServerState(raw.payload);
    if (!state.ok) return fail(state.error);
  }
  if (isRecord(raw) && raw.event === 'marker_add' && isRecord(raw.payload)) {
    const marker = validateMarkerData(raw.payload.marker);
    if (!marker.ok) return fail(marker.error);
  }
  const parsed = ServerEventSchema.safeParse(raw);
  if (!parsed.success) {
    return fail(new ValidationError('invalid_field', describeIssues(parsed.error), 'event'));
  }
  return ok(parsed.data);
}
