/**
 * Composition root. Everything the server needs arrives through the
 * config struct; nothing is looked up from module-level state.
 */

import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import cors from 'cors';
import { createLocationTable, type LocationTable } from '@mapsync/shared';
import type { ServerConfig } from './config/server.js';
import { requestLogger } from './middleware/logger.js';
import { createHealthRouter } from './routes/health.js';
import { createRoomsRouter } from './routes/rooms.js';
import { LogStore } from './storage/logStore.js';
import { SocketTransport } from './sync/socketTransport.js';
import { SyncChannel } from './sync/syncChannel.js';

export interface SyncServer {
  app: Express;
  http: Server;
  channel: SyncChannel;
  transport: SocketTransport;
  logs: LogStore;
  locations: LocationTable;
  listen(): Promise<void>;
  close(): Promise<void>;
}

export interface SyncServerOptions {
  /** Place unknown location keys off-frame instead of skipping them */
  legacy?: boolean;
}

export function createSyncServer(config: ServerConfig, options: SyncServerOptions = {}): SyncServer {
  const logs = new LogStore({ dir: config.logStorePath });
  const locations = createLocationTable({ custom: config.customLocations });
  const channel = new SyncChannel({ config, locations, logs, legacy: options.legacy });
  const transport = new SocketTransport({ channel, logs });

  const app = express();

  // ─── Middleware ──────────────────────────────────────────
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  // ─── Routes ─────────────────────────────────────────────
  app.use('/', createHealthRouter(channel, logs));
  app.use('/api/rooms', createRoomsRouter(channel, logs));

  const http = createServer(app);

  return {
    app,
    http,
    channel,
    transport,
    logs,
    locations,
    listen: () =>
      new Promise<void>((resolve, reject) => {
        http.once('error', reject);
        http.listen(config.port, () => {
          http.off('error', reject);
          transport.attach(http, config.socketPath);
          resolve();
        });
      }),
    close: async () => {
      await transport.close();
      channel.close();
      if (!http.listening) return;
      await new Promise<void>((resolve, reject) => {
        http.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
