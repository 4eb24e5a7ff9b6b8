import { linearizeTasks } from '../services/linearize';
import { getChildren } from '../services/navigation';
import type { OutlineStore, ProjectRecord, TaskRecord } from '../services/types';

export const PROJECT_ID = 'p1';

export const makeProject = (overrides: Partial<ProjectRecord> = {}): ProjectRecord => ({
  id: PROJECT_ID,
  name: 'Roadmap',
  firstTask: null,
  isPublic: false,
  createdBy: 'user-1',
  createdAt: 1,
  updatedAt: 1,
  ...overrides,
});

export const makeTask = (overrides: Partial<TaskRecord> & Pick<TaskRecord, 'id'>): TaskRecord => ({
  projectId: PROJECT_ID,
  level: 0,
  value: `Task ${overrides.id}`,
  next: null,
  completed: false,
  completedBy: null,
  createdBy: 'user-1',
  createdAt: 1,
  updatedAt: null,
  ...overrides,
});

/** Tasks 1..n chained in order, with the given levels. */
export const seedOutline = (levels: number[], completedIds: number[] = []) => {
  const tasks = levels.map((level, index) =>
    makeTask({
      id: index + 1,
      level,
      next: index + 1 < levels.length ? index + 2 : null,
      completed: completedIds.includes(index + 1),
    })
  );
  return { project: makeProject({ firstTask: levels.length > 0 ? 1 : null }), tasks };
};

/** Lists every broken outline invariant of a project; empty when the outline is sound. */
export const outlineProblems = async (store: OutlineStore, projectId = PROJECT_ID): Promise<string[]> => {
  const project = await store.findProject(projectId);
  if (!project) return [`project ${projectId} missing`];
  const rows = await store.listTasks(projectId);
  const ordered = linearizeTasks(rows, project.firstTask);
  const problems: string[] = [];

  if (ordered.length !== rows.length) problems.push(`${rows.length - ordered.length} task(s) unreachable`);
  if (ordered.length > 0 && ordered[ordered.length - 1].next !== null) problems.push('chain does not end in null');
  ordered.forEach((task, index) => {
    const ceiling = index === 0 ? 0 : ordered[index - 1].level + 1;
    if (task.level > ceiling) problems.push(`task ${task.id} jumps to level ${task.level}`);
    if (task.completed && getChildren(ordered, index).some((child) => !child.completed)) {
      problems.push(`task ${task.id} completed with an incomplete child`);
    }
  });
  return problems;
};

/** `[id, level, completed]` per task in outline order. */
export const outlineShape = (tasks: TaskRecord[]) => tasks.map((task) => [task.id, task.level, task.completed]);
