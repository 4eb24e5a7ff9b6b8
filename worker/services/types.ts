export type TaskRecord = {
  projectId: string;
  id: number;
  level: number;
  value: string;
  next: number | null;
  completed: boolean;
  completedBy: string | null;
  createdBy: string;
  createdAt: number;
  updatedAt: number | null;
};

export type ProjectRecord = {
  id: string;
  name: string;
  firstTask: number | null;
  /** Anyone holding the id may read the outline. */
  isPublic: boolean;
  createdBy: string;
  createdAt: number;
  updatedAt: number;
};

export type OutlineReader = {
  listProjects: () => Promise<ProjectRecord[]>;
  findProject: (projectId: string) => Promise<ProjectRecord | null>;
  findTask: (projectId: string, taskId: number) => Promise<TaskRecord | null>;
  listTasks: (projectId: string) => Promise<TaskRecord[]>;
};

/**
 * Row access inside one unit of work. Nothing written through a repository is
 * visible to other readers until the surrounding transaction commits.
 */
export type OutlineRepository = OutlineReader & {
  /** Reads the project row and holds it until commit or rollback. */
  lockProject: (projectId: string) => Promise<ProjectRecord | null>;
  insertProject: (project: ProjectRecord) => Promise<void>;
  updateProject: (project: ProjectRecord) => Promise<void>;
  /** Deletes the project with its tasks; false when there was no such project. */
  removeProject: (projectId: string) => Promise<boolean>;
  insertTask: (task: TaskRecord) => Promise<void>;
  updateTask: (task: TaskRecord) => Promise<void>;
  removeTask: (projectId: string, taskId: number) => Promise<void>;
};

export type OutlineStore = OutlineReader & {
  /** Commits when `work` resolves, rolls back when it throws. */
  transaction: <T>(work: (repo: OutlineRepository) => Promise<T>) => Promise<T>;
};

export type OutlineEvent =
  | { type: 'addedTask'; projectId: string; task: TaskRecord }
  | { type: 'changedValue'; projectId: string; task: { id: number; newValue: string } }
  | { type: 'deletedTask'; projectId: string; task: { id: number } }
  | {
      type: 'increasedLevel' | 'decreasedLevel' | 'completedTask' | 'uncompletedTask';
      projectId: string;
      id: number;
    };

export type OutlineEventSink = {
  /** `origin` is the client id of the sender; that subscriber is skipped. */
  publish: (projectId: string, event: OutlineEvent, origin?: string) => Promise<void>;
};
