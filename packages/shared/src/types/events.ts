import type { z } from 'zod';
import type { MapTheme, MarkerGroup, MarkerStyle, PlacedNode, SceneConfig } from './map';
import type {
  BootstrapPayloadSchema,
  ClientMessageSchema,
  FullStatePayloadSchema,
  ServerEventSchema,
  ServerReplySchema,
  WireGroupSchema,
  WireNodeSchema,
  WireStyleSchema,
} from '../schemas/wire';

// ─── Scene Events ────────────────────────────────────────
// Decoded, self-contained mutation instructions. Each one carries every
// key it needs, so it can be applied without consulting earlier events.

export type SceneEvent =
  | {
      kind: 'full_state';
      groups: readonly MarkerGroup[];
      theme?: MapTheme;
      config?: SceneConfig;
    }
  | {
      kind: 'group_update';
      groupId: string;
      nodes: readonly PlacedNode[];
      label?: string;
      style?: MarkerStyle;
      visible?: boolean;
    }
  | { kind: 'marker_add'; groupId: string; node: PlacedNode }
  | { kind: 'marker_remove'; groupId: string; markerId: string }
  | { kind: 'theme_change'; theme: Partial<MapTheme> }
  | { kind: 'visibility_toggle'; groupId: string; visible: boolean };

export type SceneEventKind = SceneEvent['kind'];

/** An event stamped with the room it belongs to and its position in that room's stream. */
export interface RoomEvent {
  room: string;
  revision: number;
  event: SceneEvent;
}

export type SyncStatus = 'in_sync' | 'state_updated' | 'sync_acknowledged';

// ─── Wire Types (inferred) ───────────────────────────────

export type WireNode = z.infer<typeof WireNodeSchema>;
export type WireStyle = z.infer<typeof WireStyleSchema>;
export type WireGroup = z.infer<typeof WireGroupSchema>;
export type FullStatePayload = z.infer<typeof FullStatePayloadSchema>;
export type ServerEventFrame = z.infer<typeof ServerEventSchema>;
export type ServerReplyFrame = z.infer<typeof ServerReplySchema>;
export type ServerFrame = ServerEventFrame | ServerReplyFrame;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type BootstrapPayload = z.infer<typeof BootstrapPayloadSchema>;
