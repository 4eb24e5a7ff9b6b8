import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { invalidParams, jsonError, projectParamSchema } from './helpers';
import { generateId, now } from '../services/utils';
import type { Variables } from '../types';

export const eventsRoute = new Hono<{ Variables: Variables }>();

// Server-Sent Events feed of outline changes made by other collaborators of the project.
eventsRoute.get('/:projectId/events', zValidator('param', projectParamSchema, invalidParams), async (c) => {
  const { projectId } = c.req.valid('param');
  const project = await c.get('store').findProject(projectId);
  if (!project) return jsonError(c, 'PROJECT_NOT_FOUND', `Project ${projectId} not found.`, 404);

  const clientId = c.req.query('clientId') || generateId();
  const hub = c.get('hub');
  const heartbeatMs = c.get('heartbeatMs');

  return streamSSE(c, async (stream) => {
    // Set when the hub gives up on this client; the stream then ends and the client reconnects.
    let dropped = false;
    const open = () => !stream.aborted && !dropped;
    const unsubscribe = hub.subscribe(projectId, {
      id: clientId,
      send: (event) => stream.writeSSE({ event: event.type, data: JSON.stringify(event) }),
      onDrop: () => {
        dropped = true;
      },
    });
    stream.onAbort(unsubscribe);
    try {
      await stream.writeSSE({ event: 'ready', data: JSON.stringify({ clientId }) });
      while (open()) {
        await stream.sleep(heartbeatMs);
        if (open()) await stream.writeSSE({ event: 'ping', data: String(now()) });
      }
    } finally {
      unsubscribe();
    }
  });
});
