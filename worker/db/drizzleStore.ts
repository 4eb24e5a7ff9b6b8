import { and, asc, eq } from 'drizzle-orm';
import type { NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from './schema';
import { projects, tasks } from './schema';
import { toProjectRecord, toTaskChanges, toTaskRecord } from '../services/serializers';
import type { OutlineReader, OutlineRepository, OutlineStore } from '../services/types';
import type { DrizzleDB } from './index';

// Both the pool-backed database and a transaction handle satisfy this.
type DrizzleExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

const taskKey = (projectId: string, taskId: number) => and(eq(tasks.projectId, projectId), eq(tasks.id, taskId));

const createReader = (db: DrizzleExecutor): OutlineReader => ({
  listProjects: async () => {
    const rows = await db.select().from(projects).orderBy(asc(projects.createdAt));
    return rows.map(toProjectRecord);
  },
  findProject: async (projectId) => {
    const [row] = await db.select().from(projects).where(eq(projects.id, projectId)).limit(1);
    return row ? toProjectRecord(row) : null;
  },
  findTask: async (projectId, taskId) => {
    const [row] = await db.select().from(tasks).where(taskKey(projectId, taskId)).limit(1);
    return row ? toTaskRecord(row) : null;
  },
  listTasks: async (projectId) => {
    const rows = await db.select().from(tasks).where(eq(tasks.projectId, projectId));
    return rows.map(toTaskRecord);
  },
});

const createRepository = (db: DrizzleExecutor): OutlineRepository => ({
  ...createReader(db),
  // Row lock keeps other server instances off this outline until commit.
  lockProject: async (projectId) => {
    const [row] = await db.select().from(projects).where(eq(projects.id, projectId)).for('update');
    return row ? toProjectRecord(row) : null;
  },
  insertProject: async (project) => {
    await db.insert(projects).values(project);
  },
  updateProject: async (project) => {
    await db
      .update(projects)
      .set({
        name: project.name,
        firstTask: project.firstTask,
        isPublic: project.isPublic,
        updatedAt: project.updatedAt,
      })
      .where(eq(projects.id, project.id));
  },
  // Task rows go with it through the foreign key cascade.
  removeProject: async (projectId) => {
    const removed = await db.delete(projects).where(eq(projects.id, projectId)).returning({ id: projects.id });
    return removed.length > 0;
  },
  insertTask: async (task) => {
    await db.insert(tasks).values(task);
  },
  updateTask: async (task) => {
    await db.update(tasks).set(toTaskChanges(task)).where(taskKey(task.projectId, task.id));
  },
  removeTask: async (projectId, taskId) => {
    await db.delete(tasks).where(taskKey(projectId, taskId));
  },
});

export const createDrizzleOutlineStore = (db: DrizzleDB): OutlineStore => ({
  ...createReader(db),
  transaction: (work) => db.transaction((tx) => work(createRepository(tx)), { isolationLevel: 'read committed' }),
});
