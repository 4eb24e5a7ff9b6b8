import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import {
  authorHeadersSchema,
  invalidBody,
  invalidHeaders,
  invalidParams,
  jsonError,
  jsonOk,
  projectParamSchema,
} from './helpers';
import {
  createProject,
  deleteProject,
  getProjectById,
  listProjects,
  renameProject,
  setProjectSharing,
} from '../services/projectService';
import type { Variables } from '../types';

export const projectsRoute = new Hono<{ Variables: Variables }>();

const projectInputSchema = z.object({
  name: z.string().trim().min(1).max(50),
});

const projectParams = zValidator('param', projectParamSchema, invalidParams);

const notFoundMessage = (projectId: string) => `Project ${projectId} not found.`;

projectsRoute.get('/', async (c) => {
  const projects = await listProjects(c.get('store'));
  return jsonOk(c, projects);
});

projectsRoute.get('/:projectId', projectParams, async (c) => {
  const { projectId } = c.req.valid('param');
  const project = await getProjectById(c.get('store'), projectId);
  if (!project) return jsonError(c, 'PROJECT_NOT_FOUND', notFoundMessage(projectId), 404);
  return jsonOk(c, project);
});

projectsRoute.post(
  '/',
  zValidator('header', authorHeadersSchema, invalidHeaders),
  zValidator('json', projectInputSchema, invalidBody),
  async (c) => {
    const headers = c.req.valid('header');
    const data = c.req.valid('json');
    const project = await createProject(c.get('store'), { name: data.name, createdBy: headers['x-user-id'] });
    return jsonOk(c, project, 201);
  }
);

projectsRoute.put('/:projectId', projectParams, zValidator('json', projectInputSchema, invalidBody), async (c) => {
  const { projectId } = c.req.valid('param');
  const { name } = c.req.valid('json');
  const project = await renameProject({ store: c.get('store'), gate: c.get('gate') }, projectId, name);
  if (!project) return jsonError(c, 'PROJECT_NOT_FOUND', notFoundMessage(projectId), 404);
  return jsonOk(c, project);
});

projectsRoute.delete('/:projectId', projectParams, async (c) => {
  const { projectId } = c.req.valid('param');
  const deleted = await deleteProject({ store: c.get('store'), gate: c.get('gate') }, projectId);
  if (!deleted) return jsonError(c, 'PROJECT_NOT_FOUND', notFoundMessage(projectId), 404);
  return jsonOk(c, { id: projectId });
});

projectsRoute.put('/:projectId/share', projectParams, async (c) => {
  const { projectId } = c.req.valid('param');
  const change = await setProjectSharing({ store: c.get('store'), gate: c.get('gate') }, projectId, true);
  if (change.status === 'not_found') return jsonError(c, 'PROJECT_NOT_FOUND', notFoundMessage(projectId), 404);
  if (change.status === 'unchanged') return jsonError(c, 'PROJECT_ALREADY_PUBLIC', 'Project is already public.', 400);
  return jsonOk(c, change.project);
});

projectsRoute.delete('/:projectId/share', projectParams, async (c) => {
  const { projectId } = c.req.valid('param');
  const change = await setProjectSharing({ store: c.get('store'), gate: c.get('gate') }, projectId, false);
  if (change.status === 'not_found') return jsonError(c, 'PROJECT_NOT_FOUND', notFoundMessage(projectId), 404);
  if (change.status === 'unchanged') {
    return jsonError(c, 'PROJECT_ALREADY_PRIVATE', 'Project is already private.', 400);
  }
  return jsonOk(c, change.project);
});

// Read-only outline of a shared project; private and unknown projects look the same.
projectsRoute.get('/:projectId/share', projectParams, async (c) => {
  const { projectId } = c.req.valid('param');
  const project = await getProjectById(c.get('store'), projectId);
  if (!project?.isPublic) {
    return jsonError(c, 'ACCESS_DENIED', 'You do not have permission to access this project.', 403);
  }
  const tasks = await c.get('outline').getOrderedTasks(projectId);
  return jsonOk(c, tasks);
});
