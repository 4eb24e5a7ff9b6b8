import { serve } from '@hono/node-server';
import { createApp } from '../worker/app';
import { loadConfig } from '../worker/config';
import { closePgDb, createDrizzleOutlineStore, createMemoryOutlineStore, getDb } from '../worker/db';
import { createProjectHub } from '../worker/realtime/projectHub';
import { createProjectGate } from '../worker/services/gate';
import { createLogger, setLogLevel } from '../worker/services/logService';
import { createOutlineEngine } from '../worker/services/outlineEngine';

const config = loadConfig();
setLogLevel(config.logLevel);

const log = createLogger('server');

const store = config.databaseUrl
  ? createDrizzleOutlineStore(getDb({ connectionString: config.databaseUrl, sslMode: config.pgSslMode }))
  : createMemoryOutlineStore();

if (!config.databaseUrl) {
  log.warn('DATABASE_URL is not set; outlines are kept in memory and lost on restart');
}

const hub = createProjectHub({ maxBacklog: config.maxBacklog });
const gate = createProjectGate();
const outline = createOutlineEngine({ store, gate, events: hub });
const app = createApp({ store, gate, outline, hub, heartbeatMs: config.heartbeatMs });

log.info(`Starting server on port ${config.port}...`);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`Server is running on http://localhost:${info.port}`);
});

const shutdown = (signal: string) => {
  log.info(`Received ${signal}, shutting down`);
  server.close(() => {
    closePgDb()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('Failed to close the database pool', { error });
        process.exit(1);
      });
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
