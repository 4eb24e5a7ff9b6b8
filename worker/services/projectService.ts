import type { ProjectGate } from './gate';
import type { OutlineStore, ProjectRecord } from './types';
import { generateId, now } from './utils';

// Edits of an existing project share the outline's lane, so they never interleave with a task mutation.
export type ProjectDeps = {
  store: OutlineStore;
  gate: ProjectGate;
};

export type SharingChange =
  | { status: 'updated'; project: ProjectRecord }
  | { status: 'unchanged'; project: ProjectRecord }
  | { status: 'not_found' };

export const listProjects = (store: OutlineStore): Promise<ProjectRecord[]> => store.listProjects();

export const getProjectById = (store: OutlineStore, id: string): Promise<ProjectRecord | null> =>
  store.findProject(id);

export const createProject = async (
  store: OutlineStore,
  data: { name: string; createdBy: string }
): Promise<ProjectRecord> => {
  const timestamp = now();
  const record: ProjectRecord = {
    id: generateId(),
    name: data.name,
    firstTask: null,
    isPublic: false,
    createdBy: data.createdBy,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
  await store.transaction((repo) => repo.insertProject(record));
  return record;
};

export const renameProject = ({ store, gate }: ProjectDeps, id: string, name: string) =>
  gate.run(id, () =>
    store.transaction(async (repo): Promise<ProjectRecord | null> => {
      const project = await repo.lockProject(id);
      if (!project) return null;
      const renamed = { ...project, name, updatedAt: now() };
      await repo.updateProject(renamed);
      return renamed;
    })
  );

export const deleteProject = ({ store, gate }: ProjectDeps, id: string): Promise<boolean> =>
  gate.run(id, () => store.transaction((repo) => repo.removeProject(id)));

export const setProjectSharing = ({ store, gate }: ProjectDeps, id: string, isPublic: boolean) =>
  gate.run(id, () =>
    store.transaction(async (repo): Promise<SharingChange> => {
      const project = await repo.lockProject(id);
      if (!project) return { status: 'not_found' };
      if (project.isPublic === isPublic) return { status: 'unchanged', project };
      const updated = { ...project, isPublic, updatedAt: now() };
      await repo.updateProject(updated);
      return { status: 'updated', project: updated };
    })
  );
