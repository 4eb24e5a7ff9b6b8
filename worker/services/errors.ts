export type OutlineOperation =
  | 'addTask'
  | 'changeValue'
  | 'deleteTask'
  | 'increaseLevel'
  | 'decreaseLevel'
  | 'completeTask'
  | 'uncompleteTask'
  | 'getOrderedTasks';

export type OutlineErrorCode =
  | 'PROJECT_NOT_FOUND'
  | 'TASK_NOT_FOUND'
  | 'MAX_LEVEL_REACHED'
  | 'MIN_LEVEL_REACHED'
  | 'PERSISTENCE_FAILURE';

export type OutlineErrorContext = {
  operation: OutlineOperation;
  projectId: string;
  taskId?: number;
};

const statusByCode = {
  PROJECT_NOT_FOUND: 404,
  TASK_NOT_FOUND: 404,
  MAX_LEVEL_REACHED: 409,
  MIN_LEVEL_REACHED: 409,
  PERSISTENCE_FAILURE: 500,
} as const satisfies Record<OutlineErrorCode, number>;

export type OutlineErrorStatus = (typeof statusByCode)[OutlineErrorCode];

export class OutlineError extends Error {
  code: OutlineErrorCode;
  status: OutlineErrorStatus;
  context: OutlineErrorContext;

  constructor(code: OutlineErrorCode, message: string, context: OutlineErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'OutlineError';
    this.code = code;
    this.status = statusByCode[code];
    this.context = context;
  }
}

export const isOutlineError = (error: unknown): error is OutlineError => error instanceof OutlineError;

export const projectNotFound = (context: OutlineErrorContext) =>
  new OutlineError('PROJECT_NOT_FOUND', `Project ${context.projectId} not found.`, context);

export const taskNotFound = (context: OutlineErrorContext) =>
  new OutlineError(
    'TASK_NOT_FOUND',
    `Task ID ${context.taskId} of project ${context.projectId} not found.`,
    context
  );

export const maxLevelReached = (context: OutlineErrorContext) =>
  new OutlineError(
    'MAX_LEVEL_REACHED',
    `Maximum level reached for Task ${context.taskId} of Project ${context.projectId}`,
    context
  );

export const minLevelReached = (context: OutlineErrorContext) =>
  new OutlineError(
    'MIN_LEVEL_REACHED',
    `Minimum level reached for Task ${context.taskId} of Project ${context.projectId}`,
    context
  );

const describeOperation = ({ operation, projectId, taskId }: OutlineErrorContext) => {
  switch (operation) {
    case 'addTask':
      return `Error adding task to Project ${projectId}`;
    case 'changeValue':
      return `Error changing value of Task ${taskId} of Project ${projectId}`;
    case 'deleteTask':
      return `Error deleting Task ${taskId} of Project ${projectId}`;
    case 'increaseLevel':
      return `Error increasing level of task ${taskId} of Project ${projectId}`;
    case 'decreaseLevel':
      return `Error decreasing level of task ${taskId} of Project ${projectId}`;
    case 'completeTask':
      return `Error completing task ${taskId} of Project ${projectId}`;
    case 'uncompleteTask':
      return `Error uncompleting task ${taskId} of Project ${projectId}`;
    case 'getOrderedTasks':
      return `Error reading tasks of Project ${projectId}`;
  }
};

export const persistenceFailure = (context: OutlineErrorContext, cause: unknown) =>
  new OutlineError('PERSISTENCE_FAILURE', describeOperation(context), context, cause);
