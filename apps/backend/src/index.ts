import 'dotenv/config';
import { createSyncServer } from './app.js';
import { ConfigError, loadServerConfig, type ServerConfig } from './config/server.js';

function start(): void {
  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const server = createSyncServer(config);

  server
    .listen()
    .then(() => {
      console.log(`🗺️  Map sync backend running on http://localhost:${config.port}`);
      console.log(`   Health:  http://localhost:${config.port}/health`);
      console.log(`   Socket:  ws://localhost:${config.port}${config.socketPath}`);
    })
    .catch((err: unknown) => {
      console.error('[server] failed to start:', err instanceof Error ? err.message : err);
      process.exit(1);
    });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] shutdown failed:', err instanceof Error ? err.message : err);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start();
