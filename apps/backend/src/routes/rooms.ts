/**
 * Room API: producer-facing HTTP surface of the sync channel.
 * Every write goes through the room's queue, updates the scene and
 * broadcasts the resulting events before the response is sent.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import {
  DEFAULT_SURFACE_ID,
  FullStateInputSchema,
  GroupUpdateInputSchema,
  MarkerAddInputSchema,
  ThemeChangeInputSchema,
  VisibilityInputSchema,
  encodeFullState,
  zRoomKey,
  type BootstrapPayload,
  type Result,
} from '@mapsync/shared';
import type { LogStore } from '../storage/logStore.js';
import type { PublishResult, SyncChannel } from '../sync/syncChannel.js';

const BootstrapQuerySchema = z.object({
  surface: z.string().min(1).max(128).default(DEFAULT_SURFACE_ID),
});

const DiagnosticsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1_000).default(100),
});

type Handler = (req: Request, res: Response) => Promise<void>;

/** Wrap an async handler so unexpected failures become a logged 500. */
function route(label: string, logs: LogStore, handler: Handler) {
  return (req: Request, res: Response): void => {
    handler(req, res).catch((err) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[rooms] ${label} error:`, message);
      logs.record('ERROR', { route: label, error: message }, 'ERROR', req.params.roomKey);
      if (!res.headersSent) res.status(500).json({ ok: false, error: `Failed to ${label}` });
    });
  };
}

function roomKeyOf(req: Request, res: Response): string | null {
  const parsed = zRoomKey.safeParse(req.params.roomKey);
  if (!parsed.success) {
    res.status(400).json({ ok: false, error: 'Invalid room key', details: parsed.error.flatten() });
    return null;
  }
  return parsed.data;
}

function sendPublished(res: Response, result: Result<PublishResult>): void {
  if (!result.ok) {
    const status = result.error.code === 'unknown_group' ? 404 : 400;
    res.status(status).json({ ok: false, error: result.error.message, code: result.error.code });
    return;
  }
  res.json({ ok: true, ...result.value });
}

export function createRoomsRouter(channel: SyncChannel, logs: LogStore): Router {
  const roomsRouter = Router();

  /** GET /api/rooms: live rooms with lifecycle state and member counts */
  roomsRouter.get('/', (_req, res) => {
    res.json({ ok: true, rooms: channel.listRooms() });
  });

  /** GET /api/rooms/:roomKey/bootstrap: initial page payload; never creates the room */
  roomsRouter.get(
    '/:roomKey/bootstrap',
    route('load bootstrap', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const query = BootstrapQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ ok: false, error: 'Invalid query', details: query.error.flatten() });
        return;
      }
      const scene = channel.bootstrapScene(roomKey);
      const payload: BootstrapPayload = {
        room: roomKey,
        surface_id: query.data.surface,
        revision: scene.revision,
        state: encodeFullState(scene),
      };
      res.json(payload);
    }),
  );

  /** PUT /api/rooms/:roomKey/state: replace the whole scene */
  roomsRouter.put(
    '/:roomKey/state',
    route('publish state', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const parsed = FullStateInputSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: 'Invalid state', details: parsed.error.flatten() });
        return;
      }
      const { marker_groups: groups, theme, config } = parsed.data;
      const result = await channel.publishFullState(roomKey, { groups, theme, config });
      res.json({ ok: true, ...result });
    }),
  );

  /** PUT /api/rooms/:roomKey/groups/:groupId: replace one group's markers */
  roomsRouter.put(
    '/:roomKey/groups/:groupId',
    route('publish group update', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const parsed = GroupUpdateInputSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: 'Invalid group update', details: parsed.error.flatten() });
        return;
      }
      sendPublished(res, await channel.publishGroupUpdate(roomKey, req.params.groupId, parsed.data));
    }),
  );

  /** POST /api/rooms/:roomKey/groups/:groupId/markers: add one marker */
  roomsRouter.post(
    '/:roomKey/groups/:groupId/markers',
    route('publish marker add', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const parsed = MarkerAddInputSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: 'Invalid marker', details: parsed.error.flatten() });
        return;
      }
      sendPublished(res, await channel.publishMarkerAdd(roomKey, req.params.groupId, parsed.data.marker));
    }),
  );

  /** DELETE /api/rooms/:roomKey/groups/:groupId/markers/:markerId: idempotent remove */
  roomsRouter.delete(
    '/:roomKey/groups/:groupId/markers/:markerId',
    route('publish marker remove', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const result = await channel.publishMarkerRemove(roomKey, req.params.groupId, req.params.markerId);
      res.json({ ok: true, ...result });
    }),
  );

  /** PUT /api/rooms/:roomKey/theme: preset name or partial colour map */
  roomsRouter.put(
    '/:roomKey/theme',
    route('publish theme change', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const parsed = ThemeChangeInputSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: 'Invalid theme', details: parsed.error.flatten() });
        return;
      }
      const result = await channel.publishThemeChange(roomKey, parsed.data.theme);
      res.json({ ok: true, ...result });
    }),
  );

  /** PUT /api/rooms/:roomKey/groups/:groupId/visibility: show or hide a group */
  roomsRouter.put(
    '/:roomKey/groups/:groupId/visibility',
    route('publish visibility toggle', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const parsed = VisibilityInputSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ ok: false, error: 'Invalid visibility', details: parsed.error.flatten() });
        return;
      }
      sendPublished(
        res,
        await channel.publishVisibilityToggle(roomKey, req.params.groupId, parsed.data.visible),
      );
    }),
  );

  /** GET /api/rooms/:roomKey/diagnostics: latest operator diagnostics for a room */
  roomsRouter.get(
    '/:roomKey/diagnostics',
    route('load diagnostics', logs, async (req, res) => {
      const roomKey = roomKeyOf(req, res);
      if (!roomKey) return;
      const query = DiagnosticsQuerySchema.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ ok: false, error: 'Invalid query', details: query.error.flatten() });
        return;
      }
      res.json({ ok: true, room: roomKey, events: logs.readLatest(query.data.limit, roomKey) });
    }),
  );

  return roomsRouter;
}
