import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import {
  authorHeadersSchema,
  callerHeadersSchema,
  invalidBody,
  invalidHeaders,
  invalidParams,
  jsonOk,
  projectParamSchema,
} from './helpers';
import type { Variables } from '../types';

export const outlineRoute = new Hono<{ Variables: Variables }>();

const taskParamSchema = projectParamSchema.extend({
  taskId: z.coerce.number().int().positive(),
});

const addTaskSchema = z.object({
  prevTaskId: z.number().int().positive().nullable().optional(),
});

const changeValueSchema = z.object({
  value: z.string(),
});

const taskParams = zValidator('param', taskParamSchema, invalidParams);
const callerHeaders = zValidator('header', callerHeadersSchema, invalidHeaders);

outlineRoute.get('/:projectId/tasks', zValidator('param', projectParamSchema, invalidParams), async (c) => {
  const { projectId } = c.req.valid('param');
  const tasks = await c.get('outline').getOrderedTasks(projectId);
  return jsonOk(c, tasks);
});

outlineRoute.post(
  '/:projectId/tasks',
  zValidator('param', projectParamSchema, invalidParams),
  zValidator('header', authorHeadersSchema, invalidHeaders),
  zValidator('json', addTaskSchema, invalidBody),
  async (c) => {
    const { projectId } = c.req.valid('param');
    const headers = c.req.valid('header');
    const { prevTaskId } = c.req.valid('json');
    const task = await c.get('outline').addTask(projectId, headers['x-user-id'], prevTaskId, {
      origin: headers['x-client-id'],
    });
    return jsonOk(c, task, 201);
  }
);

outlineRoute.patch(
  '/:projectId/tasks/:taskId',
  taskParams,
  callerHeaders,
  zValidator('json', changeValueSchema, invalidBody),
  async (c) => {
    const { projectId, taskId } = c.req.valid('param');
    const headers = c.req.valid('header');
    const { value } = c.req.valid('json');
    const task = await c.get('outline').changeValue(projectId, taskId, value, { origin: headers['x-client-id'] });
    return jsonOk(c, task);
  }
);

outlineRoute.delete('/:projectId/tasks/:taskId', taskParams, callerHeaders, async (c) => {
  const { projectId, taskId } = c.req.valid('param');
  const headers = c.req.valid('header');
  await c.get('outline').deleteTask(projectId, taskId, { origin: headers['x-client-id'] });
  return jsonOk(c, { id: taskId });
});

outlineRoute.post('/:projectId/tasks/:taskId/indent', taskParams, callerHeaders, async (c) => {
  const { projectId, taskId } = c.req.valid('param');
  const headers = c.req.valid('header');
  await c.get('outline').increaseLevel(projectId, taskId, headers['x-user-id'], { origin: headers['x-client-id'] });
  return jsonOk(c, { id: taskId });
});

outlineRoute.post('/:projectId/tasks/:taskId/outdent', taskParams, callerHeaders, async (c) => {
  const { projectId, taskId } = c.req.valid('param');
  const headers = c.req.valid('header');
  await c.get('outline').decreaseLevel(projectId, taskId, headers['x-user-id'], { origin: headers['x-client-id'] });
  return jsonOk(c, { id: taskId });
});

outlineRoute.post('/:projectId/tasks/:taskId/complete', taskParams, callerHeaders, async (c) => {
  const { projectId, taskId } = c.req.valid('param');
  const headers = c.req.valid('header');
  await c.get('outline').completeTask(projectId, taskId, headers['x-user-id'], { origin: headers['x-client-id'] });
  return jsonOk(c, { id: taskId });
});

outlineRoute.post('/:projectId/tasks/:taskId/uncomplete', taskParams, callerHeaders, async (c) => {
  const { projectId, taskId } = c.req.valid('param');
  const headers = c.req.valid('header');
  await c.get('outline').uncompleteTask(projectId, taskId, { origin: headers['x-client-id'] });
  return jsonOk(c, { id: taskId });
});
