type Lane = {
  tail: Promise<void>;
  size: number;
};

export type ProjectGate = {
  /** Runs `work` once every earlier call for the same project has settled. */
  run: <T>(projectId: string, work: () => Promise<T>) => Promise<T>;
  /** Calls for the project that are running or waiting. */
  pending: (projectId: string) => number;
};

/**
 * One FIFO lane per project. Work for different projects never waits on each
 * other; a lane is dropped as soon as it drains.
 */
export const createProjectGate = (): ProjectGate => {
  const lanes = new Map<string, Lane>();

  const run = <T>(projectId: string, work: () => Promise<T>): Promise<T> => {
    let lane = lanes.get(projectId);
    if (!lane) {
      lane = { tail: Promise.resolve(), size: 0 };
      lanes.set(projectId, lane);
    }
    const current = lane;
    current.size += 1;

    const next = current.tail.then(work, work);
    current.tail = next.then(
      () => undefined,
      () => undefined
    );

    return next.finally(() => {
      current.size -= 1;
      if (current.size === 0 && lanes.get(projectId) === current) lanes.delete(projectId);
    });
  };

  const pending = (projectId: string) => lanes.get(projectId)?.size ?? 0;

  return { run, pending };
};
