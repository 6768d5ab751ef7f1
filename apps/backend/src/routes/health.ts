import { Router } from 'express';
import type { LogStore } from '../storage/logStore.js';
import type { SyncChannel } from '../sync/syncChannel.js';

const SERVICE = 'mapsync-backend';
const VERSION = '0.1.0';

export function createHealthRouter(channel: SyncChannel, logs: LogStore): Router {
  const healthRouter = Router();

  healthRouter.get('/health', (_req, res) => {
    const { rooms, members } = channel.stats();
    res.json({
      status: 'ok',
      service: SERVICE,
      version: VERSION,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      rooms,
      members,
    });
  });

  // ─── Status (quick liveness + counters) ────────────────
  healthRouter.get('/status', (_req, res) => {
    res.json({
      alive: true,
      uptime: process.uptime(),
      rooms: channel.stats().rooms,
      diagnosticsCount: logs.count(),
    });
  });

  return healthRouter;
}
