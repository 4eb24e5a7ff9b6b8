import { describe, it, expect } from 'vitest';
import { isOutlineError, maxLevelReached, OutlineError, persistenceFailure, projectNotFound, taskNotFound } from './errors';

describe('errors', () => {
  it('maps codes to statuses', () => {
    expect(projectNotFound({ operation: 'addTask', projectId: 'p1' }).status).toBe(404);
    expect(taskNotFound({ operation: 'deleteTask', projectId: 'p1', taskId: 3 }).status).toBe(404);
    expect(maxLevelReached({ operation: 'increaseLevel', projectId: 'p1', taskId: 1 }).status).toBe(409);
  });

  it('describes the failed operation and keeps the cause', () => {
    const cause = new Error('connection reset');
    const error = persistenceFailure({ operation: 'decreaseLevel', projectId: 'p1', taskId: 5 }, cause);
    expect(error).toBeInstanceOf(OutlineError);
    expect(error.code).toBe('PERSISTENCE_FAILURE');
    expect(error.status).toBe(500);
    expect(error.message).toBe('Error decreasing level of task 5 of Project p1');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ operation: 'decreaseLevel', projectId: 'p1', taskId: 5 });
  });

  it('recognises only outline errors', () => {
    expect(isOutlineError(projectNotFound({ operation: 'getOrderedTasks', projectId: 'p1' }))).toBe(true);
    expect(isOutlineError(new Error('plain'))).toBe(false);
  });
});
