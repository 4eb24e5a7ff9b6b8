import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import type { Variables } from './types';
import { eventsRoute } from './routes/events';
import { jsonError } from './routes/helpers';
import { outlineRoute } from './routes/outline';
import { projectsRoute } from './routes/projects';
import { isOutlineError } from './services/errors';
import { createLogger } from './services/logService';
import type { ProjectHub } from './realtime/projectHub';
import type { ProjectGate } from './services/gate';
import type { OutlineEngine } from './services/outlineEngine';
import type { OutlineStore } from './services/types';

export type { Variables };

const log = createLogger('http');

export type AppDeps = {
  store: OutlineStore;
  /** The lane set the outline engine was built with. */
  gate: ProjectGate;
  outline: OutlineEngine;
  hub: ProjectHub;
  heartbeatMs?: number;
};

export const createApp = ({ store, gate, outline, hub, heartbeatMs = 25_000 }: AppDeps) => {
  const app = new Hono<{ Variables: Variables }>();

  app.use('*', logger((message, ...rest) => log.info([message, ...rest].join(' '))));

  // Inject the outline services - must be before routes
  app.use('*', async (c, next) => {
    c.set('store', store);
    c.set('gate', gate);
    c.set('outline', outline);
    c.set('hub', hub);
    c.set('heartbeatMs', heartbeatMs);
    await next();
  });

  app.route('/api/projects', projectsRoute);
  app.route('/api/projects', outlineRoute);
  app.route('/api/projects', eventsRoute);

  app.notFound((c) => jsonError(c, 'NOT_FOUND', 'Route not found.', 404));

  app.onError((err, c) => {
    if (isOutlineError(err)) return jsonError(c, err.code, err.message, err.status);
    if (err instanceof HTTPException) return err.getResponse();
    log.error('Server error', { error: err });
    return jsonError(c, 'INTERNAL_ERROR', 'Internal server error.', 500);
  });

  return app;
};
