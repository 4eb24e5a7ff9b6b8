import type { projects, tasks } from '../db/schema';
import type { ProjectRecord, TaskRecord } from './types';

type ProjectRow = typeof projects.$inferSelect;
type TaskRow = typeof tasks.$inferSelect;

export const toProjectRecord = (row: ProjectRow): ProjectRecord => ({
  id: row.id,
  name: row.name,
  firstTask: row.firstTask,
  isPublic: row.isPublic,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

export const toTaskRecord = (row: TaskRow): TaskRecord => ({
  projectId: row.projectId,
  id: row.id,
  level: row.level,
  value: row.value,
  next: row.next,
  completed: row.completed,
  completedBy: row.completedBy,
  createdBy: row.createdBy,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

// Columns a structural mutation may touch. Identity and creation fields never change.
export const toTaskChanges = (task: TaskRecord) => ({
  level: task.level,
  value: task.value,
  next: task.next,
  completed: task.completed,
  completedBy: task.completedBy,
  updatedAt: task.updatedAt,
});

export const cloneTask = (task: TaskRecord): TaskRecord => ({ ...task });

export const cloneProject = (project: ProjectRecord): ProjectRecord => ({ ...project });
