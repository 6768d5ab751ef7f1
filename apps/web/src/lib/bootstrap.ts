// ─── Page Bootstrap ──────────────────────────────────────
// The hosting page embeds the room key, surface id and an initial
// full_state payload as data attributes so first paint needs no round trip:
//
//   <div data-room="ops" data-surface-id="map-surface" data-initial-state='{"marker_groups":[]}'>

import { BootstrapPayloadSchema, DEFAULT_ROOM_KEY, DEFAULT_SURFACE_ID, type BootstrapPayload } from '@mapsync/shared';

export type BootstrapResult =
  | { ok: true; payload: BootstrapPayload }
  | { ok: false; error: string };

export function readBootstrap(element: Element): BootstrapResult {
  const room = element.getAttribute('data-room') ?? DEFAULT_ROOM_KEY;
  const surfaceId = element.getAttribute('data-surface-id') ?? DEFAULT_SURFACE_ID;
  const rawState = element.getAttribute('data-initial-state');
  const rawRevision = element.getAttribute('data-revision');

  let state: unknown = { marker_groups: [] };
  if (rawState) {
    try {
      state = JSON.parse(rawState);
    } catch {
      return { ok: false, error: 'data-initial-state is not valid JSON' };
    }
  }

  const parsed = BootstrapPayloadSchema.safeParse({
    room,
    surface_id: surfaceId,
    revision: rawRevision === null ? 0 : Number(rawRevision),
    state,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `Invalid bootstrap payload at ${issue?.path.join('.') ?? '(root)'}: ${issue?.message ?? 'unknown'}` };
  }
  return { ok: true, payload: parsed.data };
}
