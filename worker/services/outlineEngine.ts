import type { ProjectGate } from './gate';
import {
  isOutlineError,
  maxLevelReached,
  minLevelReached,
  persistenceFailure,
  projectNotFound,
  taskNotFound,
} from './errors';
import type { OutlineErrorContext, OutlineOperation } from './errors';
import { inspectChain, linearizeTasks } from './linearize';
import { createLogger } from './logService';
import { getLastSubtaskOrSelf, getParentIndex, getSubtreeEnd } from './navigation';
import { buildOutlineTree } from './outlineTree';
import type { OutlineTree } from './outlineTree';
import type {
  OutlineEvent,
  OutlineEventSink,
  OutlineRepository,
  OutlineStore,
  ProjectRecord,
  TaskRecord,
} from './types';
import { maxOf, now } from './utils';

const log = createLogger('outline');

export type OutlineEngineDeps = {
  store: OutlineStore;
  gate: ProjectGate;
  events?: OutlineEventSink;
  clock?: () => number;
};

export type MutationOptions = {
  /** Client id of the caller; its own subscription is left out of the fan-out. */
  origin?: string;
};

type Outline = {
  project: ProjectRecord;
  rows: TaskRecord[];
  ordered: TaskRecord[];
};

type Mutation<T> = {
  result: T;
  event: OutlineEvent;
};

const createChangeSet = (timestamp: number) => {
  const changed = new Set<TaskRecord>();
  return {
    timestamp,
    touch: (task: TaskRecord) => {
      task.updatedAt = timestamp;
      changed.add(task);
    },
    flush: async (repo: OutlineRepository) => {
      for (const task of changed) await repo.updateTask(task);
    },
  };
};

type ChangeSet = ReturnType<typeof createChangeSet>;

const setCompleted = (task: TaskRecord, completed: boolean, changes: ChangeSet, completedBy: string | null) => {
  if (task.completed === completed) return;
  task.completed = completed;
  task.completedBy = completed ? completedBy : null;
  changes.touch(task);
};

// Completes ancestors from `fromIndex` upward while all of their direct children are completed.
const completeUpward = (
  ordered: TaskRecord[],
  tree: OutlineTree,
  fromIndex: number,
  changes: ChangeSet,
  completedBy: string | null
) => {
  for (let index = fromIndex; index !== -1; index = tree.parents[index]) {
    if (!tree.children[index].every((child) => ordered[child].completed)) return;
    setCompleted(ordered[index], true, changes, completedBy);
  }
};

// Clears completed ancestors from `fromIndex` upward; stops at the first one already incomplete.
const uncompleteUpward = (ordered: TaskRecord[], tree: OutlineTree, fromIndex: number, changes: ChangeSet) => {
  for (let index = fromIndex; index !== -1 && ordered[index].completed; index = tree.parents[index]) {
    setCompleted(ordered[index], false, changes, null);
  }
};

/**
 * Structural edits of a project outline.
 *
 * Every mutation checks that its project and task exist, then runs inside the
 * project's gate lane and a single store transaction: the project row is locked,
 * the chain is linearized, the edit and its completion cascade are applied and
 * every changed row is written before commit. The resulting event is published
 * after the lane is released.
 */
export const createOutlineEngine = ({ store, gate, events, clock = now }: OutlineEngineDeps) => {
  const rethrow = (context: OutlineErrorContext, error: unknown) => {
    if (isOutlineError(error)) {
      log.debug(`${context.operation} rejected`, { ...context, code: error.code });
      return error;
    }
    log.error(`${context.operation} failed`, { ...context, error });
    return persistenceFailure(context, error);
  };

  const ensureExists = async (context: OutlineErrorContext) => {
    const project = await store.findProject(context.projectId);
    if (!project) throw projectNotFound(context);
    if (context.taskId === undefined) return;
    const task = await store.findTask(context.projectId, context.taskId);
    if (!task) throw taskNotFound(context);
  };

  const announce = async (projectId: string, event: OutlineEvent, origin?: string) => {
    if (!events) return;
    try {
      await events.publish(projectId, event, origin);
    } catch (error) {
      log.warn('event fan-out failed', { projectId, type: event.type, error });
    }
  };

  const mutate = async <T>(
    context: OutlineErrorContext,
    work: (repo: OutlineRepository, changes: ChangeSet) => Promise<Mutation<T>>,
    options: MutationOptions = {}
  ): Promise<T> => {
    let mutation: Mutation<T>;
    try {
      await ensureExists(context);
      mutation = await gate.run(context.projectId, () =>
        store.transaction(async (repo) => {
          const changes = createChangeSet(clock());
          const outcome = await work(repo, changes);
          await changes.flush(repo);
          return outcome;
        })
      );
    } catch (error) {
      throw rethrow(context, error);
    }
    await announce(context.projectId, mutation.event, options.origin);
    return mutation.result;
  };

  const loadOutline = async (repo: OutlineRepository, context: OutlineErrorContext): Promise<Outline> => {
    const project = await repo.lockProject(context.projectId);
    if (!project) throw projectNotFound(context);
    const rows = await repo.listTasks(context.projectId);
    const chain = inspectChain(rows, project.firstTask);
    if (chain.cyclic || chain.unreachable.length > 0) {
      log.warn('outline chain is inconsistent', {
        projectId: context.projectId,
        cyclic: chain.cyclic,
        unreachable: chain.unreachable.map((task) => task.id),
      });
    }
    return { project, rows, ordered: chain.ordered };
  };

  const locate = ({ ordered }: Outline, context: OutlineErrorContext) => {
    const index = ordered.findIndex((task) => task.id === context.taskId);
    if (index === -1) throw taskNotFound(context);
    return index;
  };

  const taskContext = (operation: OutlineOperation, projectId: string, taskId: number): OutlineErrorContext => ({
    operation,
    projectId,
    taskId,
  });

  const addTask = async (
    projectId: string,
    userId: string,
    prevTaskId?: number | null,
    options?: MutationOptions
  ): Promise<TaskRecord> => {
    const context: OutlineErrorContext = { operation: 'addTask', projectId };
    return mutate(
      context,
      async (repo, changes) => {
        const { project, rows, ordered } = await loadOutline(repo, context);
        const task: TaskRecord = {
          projectId,
          id: maxOf(rows.map((row) => row.id), 0) + 1,
          level: 0,
          value: '',
          next: null,
          completed: false,
          completedBy: null,
          createdBy: userId,
          createdAt: changes.timestamp,
          updatedAt: null,
        };

        const anchorIndex = (prevTaskId ?? null) === null ? -1 : ordered.findIndex((row) => row.id === prevTaskId);
        if (anchorIndex !== -1) {
          // The new task becomes the anchor's next sibling, after the anchor's whole subtree.
          const last = getLastSubtaskOrSelf(ordered, anchorIndex);
          task.level = ordered[anchorIndex].level;
          task.next = last.next;
          last.next = task.id;
          changes.touch(last);
          const tree = buildOutlineTree(ordered);
          uncompleteUpward(ordered, tree, tree.parents[anchorIndex], changes);
        } else if (ordered.length > 0) {
          const tail = ordered[ordered.length - 1];
          tail.next = task.id;
          changes.touch(tail);
        } else {
          project.firstTask = task.id;
          project.updatedAt = changes.timestamp;
          await repo.updateProject(project);
        }

        await repo.insertTask(task);
        return { result: task, event: { type: 'addedTask', projectId, task } };
      },
      options
    );
  };

  const changeValue = async (
    projectId: string,
    taskId: number,
    value: string,
    options?: MutationOptions
  ): Promise<TaskRecord> => {
    const context = taskContext('changeValue', projectId, taskId);
    return mutate(
      context,
      async (repo, changes) => {
        const project = await repo.lockProject(projectId);
        if (!project) throw projectNotFound(context);
        const task = await repo.findTask(projectId, taskId);
        if (!task) throw taskNotFound(context);
        task.value = value;
        changes.touch(task);
        return {
          result: task,
          event: { type: 'changedValue', projectId, task: { id: taskId, newValue: value } },
        };
      },
      options
    );
  };

  const deleteTask = async (projectId: string, taskId: number, options?: MutationOptions): Promise<void> => {
    const context = taskContext('deleteTask', projectId, taskId);
    return mutate(
      context,
      async (repo, changes) => {
        const { project, rows, ordered } = await loadOutline(repo, context);
        const target = rows.find((row) => row.id === taskId);
        if (!target) throw taskNotFound(context);

        // Children move up one level to take the deleted task's place.
        const index = ordered.indexOf(target);
        if (index !== -1) {
          const end = getSubtreeEnd(ordered, index);
          for (let i = index + 1; i < end; i++) {
            ordered[i].level -= 1;
            changes.touch(ordered[i]);
          }
        }

        if (project.firstTask === taskId) {
          project.firstTask = target.next;
          project.updatedAt = changes.timestamp;
          await repo.updateProject(project);
        } else {
          const previous = rows.find((row) => row.next === taskId);
          if (previous) {
            previous.next = target.next;
            changes.touch(previous);
          }
        }

        await repo.removeTask(projectId, taskId);
        return { result: undefined, event: { type: 'deletedTask', projectId, task: { id: taskId } } };
      },
      options
    );
  };

  const increaseLevel = async (
    projectId: string,
    taskId: number,
    userId?: string,
    options?: MutationOptions
  ): Promise<void> => {
    const context = taskContext('increaseLevel', projectId, taskId);
    return mutate(
      context,
      async (repo, changes) => {
        const outline = await loadOutline(repo, context);
        const { ordered } = outline;
        const index = locate(outline, context);
        const target = ordered[index];
        const previous = index > 0 ? ordered[index - 1] : undefined;
        if (!previous || previous.level < target.level) throw maxLevelReached(context);

        target.level += 1;
        changes.touch(target);

        const tree = buildOutlineTree(ordered);
        const parentIndex = tree.parents[index];
        if (parentIndex !== -1) {
          const parent = ordered[parentIndex];
          if (!target.completed && parent.completed) {
            uncompleteUpward(ordered, tree, parentIndex, changes);
          } else if (target.completed && !parent.completed) {
            completeUpward(ordered, tree, parentIndex, changes, userId ?? null);
          }
        }

        return { result: undefined, event: { type: 'increasedLevel', projectId, id: taskId } };
      },
      options
    );
  };

  const decreaseLevel = async (
    projectId: string,
    taskId: number,
    userId?: string,
    options?: MutationOptions
  ): Promise<void> => {
    const context = taskContext('decreaseLevel', projectId, taskId);
    return mutate(
      context,
      async (repo, changes) => {
        const outline = await loadOutline(repo, context);
        const { ordered } = outline;
        const index = locate(outline, context);
        const target = ordered[index];
        if (target.level === 0) throw minLevelReached(context);

        const oldParentIndex = getParentIndex(ordered, index);
        const end = getSubtreeEnd(ordered, index);
        for (let i = index; i < end; i++) {
          ordered[i].level -= 1;
          changes.touch(ordered[i]);
        }

        const tree = buildOutlineTree(ordered);
        // Only the old parent is re-checked; its own ancestors are left as they are.
        if (oldParentIndex !== -1) {
          const remaining = tree.children[oldParentIndex];
          if (remaining.length > 0 && remaining.every((child) => ordered[child].completed)) {
            setCompleted(ordered[oldParentIndex], true, changes, userId ?? null);
          }
        }
        // Following siblings may now sit under the target.
        if (target.completed && tree.children[index].some((child) => !ordered[child].completed)) {
          uncompleteUpward(ordered, tree, index, changes);
        }

        return { result: undefined, event: { type: 'decreasedLevel', projectId, id: taskId } };
      },
      options
    );
  };

  const completeTask = async (
    projectId: string,
    taskId: number,
    userId?: string,
    options?: MutationOptions
  ): Promise<void> => {
    const context = taskContext('completeTask', projectId, taskId);
    return mutate(
      context,
      async (repo, changes) => {
        const outline = await loadOutline(repo, context);
        const { ordered } = outline;
        const index = locate(outline, context);
        const completedBy = userId ?? null;

        const end = getSubtreeEnd(ordered, index);
        for (let i = index; i < end; i++) setCompleted(ordered[i], true, changes, completedBy);

        const tree = buildOutlineTree(ordered);
        completeUpward(ordered, tree, tree.parents[index], changes, completedBy);

        return { result: undefined, event: { type: 'completedTask', projectId, id: taskId } };
      },
      options
    );
  };

  const uncompleteTask = async (projectId: string, taskId: number, options?: MutationOptions): Promise<void> => {
    const context = taskContext('uncompleteTask', projectId, taskId);
    return mutate(
      context,
      async (repo, changes) => {
        const outline = await loadOutline(repo, context);
        const { ordered } = outline;
        const index = locate(outline, context);

        const end = getSubtreeEnd(ordered, index);
        for (let i = index; i < end; i++) setCompleted(ordered[i], false, changes, null);

        const tree = buildOutlineTree(ordered);
        uncompleteUpward(ordered, tree, tree.parents[index], changes);

        return { result: undefined, event: { type: 'uncompletedTask', projectId, id: taskId } };
      },
      options
    );
  };

  // Takes no gate lane, so it can observe an ordering that is about to change.
  const getOrderedTasks = async (projectId: string): Promise<TaskRecord[]> => {
    const context: OutlineErrorContext = { operation: 'getOrderedTasks', projectId };
    try {
      const project = await store.findProject(projectId);
      if (!project) throw projectNotFound(context);
      return linearizeTasks(await store.listTasks(projectId), project.firstTask);
    } catch (error) {
      throw rethrow(context, error);
    }
  };

  return {
    addTask,
    changeValue,
    deleteTask,
    increaseLevel,
    decreaseLevel,
    completeTask,
    uncompleteTask,
    getOrderedTasks,
  };
};

export type OutlineEngine = ReturnType<typeof createOutlineEngine>;
