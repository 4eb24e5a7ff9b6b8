import { cloneProject, cloneTask } from '../services/serializers';
import type { OutlineRepository, OutlineStore, ProjectRecord, TaskRecord } from '../services/types';

type ProjectState = {
  project: ProjectRecord;
  tasks: Map<number, TaskRecord>;
};

export type MemorySeed = {
  projects?: ProjectRecord[];
  tasks?: TaskRecord[];
};

const copyState = (state: ProjectState): ProjectState => ({
  project: cloneProject(state.project),
  tasks: new Map([...state.tasks].map(([id, task]) => [id, cloneTask(task)])),
});

/**
 * Process-local store with the same contract as the Postgres one.
 *
 * A transaction works on private copies of the projects it touches and swaps
 * them in on commit, so a failed unit of work leaves no trace. Two transactions
 * on the same project must not overlap; the project gate guarantees that.
 */
export const createMemoryOutlineStore = (seed: MemorySeed = {}): OutlineStore => {
  const committed = new Map<string, ProjectState>();

  for (const project of seed.projects ?? []) {
    committed.set(project.id, { project: cloneProject(project), tasks: new Map() });
  }
  for (const task of seed.tasks ?? []) {
    const state = committed.get(task.projectId);
    if (!state) throw new Error(`Seed task ${task.id} references unknown project ${task.projectId}.`);
    state.tasks.set(task.id, cloneTask(task));
  }

  const createReader = (resolve: (projectId: string) => ProjectState | undefined) => ({
    findProject: async (projectId: string) => {
      const state = resolve(projectId);
      return state ? cloneProject(state.project) : null;
    },
    findTask: async (projectId: string, taskId: number) => {
      const task = resolve(projectId)?.tasks.get(taskId);
      return task ? cloneTask(task) : null;
    },
    listTasks: async (projectId: string) => [...(resolve(projectId)?.tasks.values() ?? [])].map(cloneTask),
  });

  const listProjects = async () =>
    [...committed.values()]
      .map((state) => cloneProject(state.project))
      .sort((a, b) => a.createdAt - b.createdAt);

  const transaction = async <T>(work: (repo: OutlineRepository) => Promise<T>): Promise<T> => {
    const working = new Map<string, ProjectState>();
    const removed = new Set<string>();

    const resolve = (projectId: string) => {
      if (removed.has(projectId)) return undefined;
      const copy = working.get(projectId);
      if (copy) return copy;
      const state = committed.get(projectId);
      if (!state) return undefined;
      const fresh = copyState(state);
      working.set(projectId, fresh);
      return fresh;
    };

    const expectState = (projectId: string) => {
      const state = resolve(projectId);
      if (!state) throw new Error(`Project ${projectId} does not exist.`);
      return state;
    };

    const repo: OutlineRepository = {
      ...createReader(resolve),
      listProjects,
      lockProject: async (projectId) => {
        const state = resolve(projectId);
        return state ? cloneProject(state.project) : null;
      },
      insertProject: async (project) => {
        if (resolve(project.id)) throw new Error(`Project ${project.id} already exists.`);
        removed.delete(project.id);
        working.set(project.id, { project: cloneProject(project), tasks: new Map() });
      },
      updateProject: async (project) => {
        expectState(project.id).project = cloneProject(project);
      },
      removeProject: async (projectId) => {
        if (!resolve(projectId)) return false;
        working.delete(projectId);
        removed.add(projectId);
        return true;
      },
      insertTask: async (task) => {
        const state = expectState(task.projectId);
        if (state.tasks.has(task.id)) {
          throw new Error(`Task ${task.id} of project ${task.projectId} already exists.`);
        }
        state.tasks.set(task.id, cloneTask(task));
      },
      updateTask: async (task) => {
        const state = expectState(task.projectId);
        if (!state.tasks.has(task.id)) {
          throw new Error(`Task ${task.id} of project ${task.projectId} does not exist.`);
        }
        state.tasks.set(task.id, cloneTask(task));
      },
      removeTask: async (projectId, taskId) => {
        if (!expectState(projectId).tasks.delete(taskId)) {
          throw new Error(`Task ${taskId} of project ${projectId} does not exist.`);
        }
      },
    };

    const result = await work(repo);
    for (const projectId of removed) committed.delete(projectId);
    for (const [projectId, state] of working) committed.set(projectId, state);
    return result;
  };

  return {
    ...createReader((projectId) => committed.get(projectId)),
    listProjects,
    transaction,
  };
};
